import { createLogger } from '@scopeledger/shared';
import type { EnvSource, Logger } from '@scopeledger/shared';
import { loadLedgerEnvConfig } from './config';
import type { LedgerEnvConfig } from './config';

export type ProgramOptions = {
  env?: EnvSource;
  cwd?: string;
  now?: () => Date;
  /** Replaces the stderr pino logger. */
  logger?: Logger;
};

export type CommandContext = {
  config: LedgerEnvConfig;
  cwd: string;
  now: Date;
  logger: Logger;
};

/** Reads the environment lazily so `--help` works with a broken configuration. */
export function createCommandContext(options: ProgramOptions): CommandContext {
  const config = loadLedgerEnvConfig(options.env ?? process.env);
  return {
    config,
    cwd: options.cwd ?? process.cwd(),
    now: options.now ? options.now() : new Date(),
    logger: options.logger ?? createLogger({ name: 'scopeledger', level: config.logLevel })
  };
}
