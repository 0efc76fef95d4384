import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isParsableSelector } from './extract/static.js';

export const DEFAULT_IN_STOCK_PATTERNS = ['add to cart', 'カートに入れる', '在庫あり', '在庫'];
export const DEFAULT_SOLD_OUT_PATTERNS = ['sold out', '売り切れ', '欠品'];
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; RestockWatch/0.1)';

const selectorsSchema = z
  .object({
    item: z.string().min(1),
    name: z.string().min(1).optional(),
    link: z.string().min(1).optional(),
    image: z.string().min(1).optional(),
    stock: z.string().min(1).optional(),
  })
  .strict();

const patternList = (defaults: string[]) => z.array(z.string().min(1)).default(defaults);

export const monitorConfigSchema = z
  .object({
    url: z.string().url(),
    mode: z.enum(['static', 'rendered']).default('rendered'),
    selectors: selectorsSchema,
    waitForSelector: z.string().min(1).optional(),
    inStockPatterns: patternList(DEFAULT_IN_STOCK_PATTERNS),
    soldOutPatterns: patternList(DEFAULT_SOLD_OUT_PATTERNS),
    assumeInStockIfNoLabel: z.boolean().default(false),
    notifyNewInStock: z.boolean().default(true),
    notifyNew: z.boolean().default(false),
    discordWebhookUrl: z.string().url().optional(),
    mentionRole: z.string().min(1).optional(),
    stateFile: z.string().min(1).default('state.json'),
    notifyDelayMs: z.number().int().nonnegative().default(1000),
    browser: z
      .object({
        headless: z.boolean().default(true),
        navigationTimeoutMs: z.number().int().positive().default(60000),
      })
      .strict()
      .default({}),
    http: z
      .object({
        timeoutMs: z.number().int().positive().default(30000),
        userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        file: z.string().min(1).default('logs/restock-watch.log'),
      })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    // Browser mode also takes Playwright-only syntax (text=, :has-text()), which cheerio can't judge.
    if (config.mode !== 'static') return;
    for (const [field, selector] of Object.entries(config.selectors)) {
      if (selector !== undefined && !isParsableSelector(selector)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['selectors', field],
          message: `is not a valid CSS selector: ${selector}`,
        });
      }
    }
  });

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;
export type ExtractionMode = MonitorConfig['mode'];
export type SelectorConfig = MonitorConfig['selectors'];

export interface LoadedConfig {
  config: MonitorConfig;
  /** Absolute path of the file the config came from. */
  path: string;
  /** `stateFile` resolved against the config file's directory. */
  statePath: string;
}

export function defaultConfigPath(): string {
  const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..');
  return resolve(projectRoot, 'config.json');
}

export function parseConfig(input: unknown): MonitorConfig {
  const result = monitorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `"${where}" ${issue.message}`;
    });
    throw new ConfigError(issues.join('; '));
  }
  return result.data;
}

export function loadConfig(path?: string): LoadedConfig {
  const configPath = resolve(path ?? defaultConfigPath());

  if (!existsSync(configPath)) {
    throw new ConfigError(`no config found at ${configPath} (create one with: restock-watch init)`);
  }

  const raw = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid JSON in ${configPath}`, { cause: err });
  }

  const config = parseConfig(parsed);
  const statePath = isAbsolute(config.stateFile)
    ? config.stateFile
    : resolve(dirname(configPath), config.stateFile);

  return { config, path: configPath, statePath };
}

export function saveConfig(config: MonitorConfig, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n');
}

/**
 * The webhook may live in the config file or in DISCORD_WEBHOOK_URL; the file wins.
 */
export function resolveWebhookUrl(
  config: Pick<MonitorConfig, 'discordWebhookUrl'>,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (config.discordWebhookUrl) return config.discordWebhookUrl;

  const fromEnv = env['DISCORD_WEBHOOK_URL']?.trim();
  if (!fromEnv) {
    throw new ConfigError(
      'Discord webhook URL not configured. Set "discordWebhookUrl" in config.json or the DISCORD_WEBHOOK_URL env var',
    );
  }
  if (!z.string().url().safeParse(fromEnv).success) {
    throw new ConfigError('DISCORD_WEBHOOK_URL is not a valid URL');
  }
  return fromEnv;
}
