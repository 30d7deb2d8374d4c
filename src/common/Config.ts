export enum RunMode {
  SERVER = 'server',
  FREQUENCY = 'frequency',
}

export interface AppConfig {
  mode: RunMode;
  httpPort: number;
  minWordLength: number;
  jsonBodyLimit: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  mode: RunMode.SERVER,
  httpPort: 3000,
  minWordLength: 1,
  jsonBodyLimit: '1mb',
};

export function resolveConfig(config?: Partial<AppConfig>): AppConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isInteger(resolved.httpPort) || resolved.httpPort < 0) {
    throw new Error('httpPort must be an integer >= 0');
  }
  if (resolved.httpPort > 65535) {
    throw new Error('httpPort must be <= 65535');
  }
  if (!Number.isInteger(resolved.minWordLength) || resolved.minWordLength < 0) {
    throw new Error('minWordLength must be an integer >= 0');
  }

  return resolved;
}
