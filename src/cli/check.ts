import { Command } from 'commander';
import { loadConfig, resolveWebhookUrl, type ExtractionMode, type LoadedConfig, type MonitorConfig } from '../config.js';
import { ConfigError, StateError } from '../errors.js';
import { createExtractor, type ItemExtractor } from '../extract/index.js';
import { createLogger, flushLogger, type Logger } from '../logger.js';
import { runCheck } from '../monitor/check.js';
import { StateStore } from '../monitor/store.js';
import { REASON_LABELS } from '../monitor/state.js';
import { buildDiscordPayload, sendDiscordWebhook, type DiscordPayload, type WebhookResult } from '../notify/discord.js';
import type { Notifier } from '../notify/dispatch.js';

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface CheckCommandOptions {
  config?: string;
  mode?: string;
  dryRun?: boolean;
}

export interface CheckCommandDeps {
  env?: NodeJS.ProcessEnv;
  createLogger?: (config: MonitorConfig['logging']) => Logger;
  createExtractor?: (config: MonitorConfig, log: Logger) => ItemExtractor;
  createStore?: (path: string) => StateStore;
  send?: (webhookUrl: string, payload: DiscordPayload) => Promise<WebhookResult>;
  sleep?: (ms: number) => Promise<void>;
  printError?: (message: string) => void;
}

function parseMode(value: string | undefined): ExtractionMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'static' || value === 'rendered') return value;
  throw new ConfigError(`"--mode" must be static or rendered, got "${value}"`);
}

/**
 * One `check` invocation, returning the process exit code. Configuration
 * problems stop it before anything is extracted or written.
 */
export async function executeCheck(opts: CheckCommandOptions, deps: CheckCommandDeps = {}): Promise<number> {
  const printError = deps.printError ?? ((message: string) => console.error(message));

  let loaded: LoadedConfig;
  let webhookUrl: string;
  let modeOverride: ExtractionMode | undefined;
  try {
    modeOverride = parseMode(opts.mode);
    loaded = loadConfig(opts.config);
    webhookUrl = resolveWebhookUrl(loaded.config, deps.env ?? process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    printError(err.message);
    return EXIT_CONFIG_ERROR;
  }

  const config = modeOverride ? { ...loaded.config, mode: modeOverride } : loaded.config;
  const log = (deps.createLogger ?? createLogger)(config.logging);
  const send = deps.send ?? sendDiscordWebhook;

  const notifier: Notifier = opts.dryRun
    ? async (decision) => {
        log.info({ identity: decision.identity, reason: REASON_LABELS[decision.reason] }, 'Dry run: would notify');
        return { ok: true };
      }
    : (decision, detectedAt) =>
        send(webhookUrl, buildDiscordPayload(decision, { pageUrl: config.url, detectedAt, mentionRole: config.mentionRole }));

  try {
    const outcome = await runCheck({
      config,
      extractor: (deps.createExtractor ?? createExtractor)(config, log),
      store: (deps.createStore ?? ((path: string) => new StateStore(path)))(loaded.statePath),
      notifier,
      log,
      sleep: deps.sleep,
    });
    return outcome.status === 'extraction_failed' ? EXIT_RUN_FAILED : EXIT_OK;
  } catch (err) {
    if (!(err instanceof StateError)) throw err;
    log.error({ err, path: err.path }, 'State persistence failed; previous snapshot kept');
    return EXIT_RUN_FAILED;
  } finally {
    await flushLogger(log);
  }
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Inspect the listing page once and notify on restocks')
    .option('--config <path>', 'Custom config file path')
    .option('--mode <mode>', 'Override extraction mode (static | rendered)')
    .option('--dry-run', 'Log notifications instead of posting them')
    .action(async (opts: CheckCommandOptions) => {
      process.exitCode = await executeCheck(opts);
    });
}
