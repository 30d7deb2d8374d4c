import { AppConfig, DEFAULT_CONFIG, RunMode, resolveConfig } from '../common/Config';

export interface CLIOptions {
  readonly config: AppConfig;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const config = resolveConfig({
      mode: this.parseMode() ?? DEFAULT_CONFIG.mode,
      httpPort: this.getNumber('--http-port') ?? DEFAULT_CONFIG.httpPort,
      minWordLength: this.getNumber('--min-length') ?? DEFAULT_CONFIG.minWordLength,
      jsonBodyLimit: this.getString('--body-limit') ?? DEFAULT_CONFIG.jsonBodyLimit,
    });

    return { config, help: false };
  }

  private parseMode(): RunMode | undefined {
    const value = this.getString('--mode');
    if (!value) return undefined;

    const normalized = value.toLowerCase();
    switch (normalized) {
      case 'server': return RunMode.SERVER;
      case 'frequency': return RunMode.FREQUENCY;
      default: throw new Error(`Invalid mode: ${value}. Must be server or frequency`);
    }
  }

  private getString(flag: string): string | undefined {
    const prefix = `${flag}=`;
    const inline = this.args.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) {
      return inline.slice(prefix.length);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    if (!/^\d+$/.test(str)) {
      throw new Error(`Invalid number for ${flag}: ${str}`);
    }
    return parseInt(str, 10);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
LLRB Ordered Map

Usage: node dist/index.js [options]

Options:
  --help, -h              Show this help message
  --mode=MODE             server or frequency (default: server)

Server Options:
  --http-port=PORT        HTTP server port (default: 3000)
  --body-limit=SIZE       Maximum JSON body size (default: 1mb)

Frequency Options:
  --min-length=N          Ignore words shorter than N characters (default: 1)

Examples:
  # Serve an empty map over HTTP
  node dist/index.js --http-port=8080

  # Most frequent word of 8 or more characters in a text file
  node dist/index.js --mode=frequency --min-length=8 < words.txt
`);
  }
}
