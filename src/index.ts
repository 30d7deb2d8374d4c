#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import { FrequencyCounter } from './client/FrequencyCounter';
import { AppConfig, RunMode } from './common/Config';
import { HTTPServer } from './server/HTTPServer';
import { OrderedMap } from './tree/OrderedMap';

async function runServer(config: AppConfig): Promise<void> {
  const table = new OrderedMap<string, string>();
  const httpServer = new HTTPServer(table, {
    port: config.httpPort,
    jsonBodyLimit: config.jsonBodyLimit,
  });

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down gracefully...');
    await httpServer.stop();
    console.log('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await httpServer.start();

  console.log('LLRB Ordered Map - Ready!');
  console.log(`  HTTP API: http://localhost:${httpServer.port}`);
}

async function runFrequency(config: AppConfig): Promise<void> {
  const counter = new FrequencyCounter(config.minWordLength);
  const stats = await counter.countStream(process.stdin);
  const top = counter.mostFrequent();

  if (top === null) {
    console.log(`No words of length >= ${config.minWordLength}`);
    return;
  }

  console.log(`${top.word} ${top.count}`);
  console.error(`words: ${stats.words}, distinct: ${stats.distinct}`);
}

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  if (options.config.mode === RunMode.FREQUENCY) {
    await runFrequency(options.config);
    return;
  }

  await runServer(options.config);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
