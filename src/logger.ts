import pino from 'pino';
import { randomUUID } from 'node:crypto';

export type Logger = pino.Logger;

export interface LoggingConfig {
  level: string;
  file: string;
}

/**
 * Options for the per-run logger: pretty output on the terminal, JSON lines
 * appended to `file`, and a `runId` on every record so one check can be
 * picked out of the shared log file.
 */
export function buildLoggerOptions(config: LoggingConfig, runId: string): pino.LoggerOptions {
  return {
    name: 'restock-watch',
    level: config.level,
    base: { runId },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: {
      targets: [
        {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname,runId' },
          level: config.level,
        },
        {
          target: 'pino/file',
          options: { destination: config.file, mkdir: true },
          level: config.level,
        },
      ],
    },
  };
}

export function createLogger(config: LoggingConfig, runId: string = randomUUID()): Logger {
  return pino(buildLoggerOptions(config, runId));
}

/** Resolves once buffered records have been handed to the transports. */
export function flushLogger(log: Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    log.flush((err) => (err ? reject(err) : resolve()));
  });
}
