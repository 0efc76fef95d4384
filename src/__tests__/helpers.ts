import pino from 'pino';
import type { Logger } from '../logger.js';
import type { MonitorConfig } from '../config.js';
import { parseConfig } from '../config.js';

export const silentLogger = (): Logger => pino({ level: 'silent' });

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** A logger that keeps every JSON record in memory. */
export function capturingLogger(): { log: Logger; records: CapturedLog[] } {
  const records: CapturedLog[] = [];
  const log = pino(
    { level: 'debug' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { log, records };
}

export function testConfig(overrides: Record<string, unknown> = {}): MonitorConfig {
  return parseConfig({
    url: 'https://shop.example.com/new-arrivals',
    mode: 'static',
    selectors: { item: '.product', name: '.name', link: 'a', image: 'img', stock: '.stock' },
    discordWebhookUrl: 'https://discord.example.com/api/webhooks/1/test-token',
    notifyDelayMs: 0,
    ...overrides,
  });
}
