import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { input, select, confirm } from '@inquirer/prompts';
import { defaultConfigPath, parseConfig, saveConfig, type ExtractionMode } from '../config.js';

function isUrl(value: string): true | string {
  try {
    new URL(value.trim());
    return true;
  } catch {
    return 'Must be a full URL (https://...)';
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a starter config.json')
    .option('--config <path>', 'Where to write the config')
    .action(async (opts: { config?: string }) => {
      const path = resolve(opts.config ?? defaultConfigPath());

      if (existsSync(path)) {
        const overwrite = await confirm({ message: `${path} exists. Overwrite?`, default: false });
        if (!overwrite) {
          console.log('Left existing config untouched.');
          return;
        }
      }

      const url = await input({ message: 'Listing page URL:', validate: isUrl });
      const mode = await select<ExtractionMode>({
        message: 'How should the page be loaded?',
        choices: [
          { name: 'Headless browser (pages that render with JavaScript)', value: 'rendered' },
          { name: 'Plain HTTP request (server-rendered HTML)', value: 'static' },
        ],
      });
      const item = await input({
        message: 'CSS selector for one product block:',
        default: '.product-item',
        validate: (v) => v.trim().length > 0 || 'Required',
      });
      const name = await input({ message: 'Name selector (inside the block):', default: '.product-name' });
      const link = await input({ message: 'Link selector:', default: 'a' });
      const image = await input({ message: 'Image selector:', default: 'img' });
      const stock = await input({ message: 'Stock label selector:', default: '.stock' });
      const webhook = await input({
        message: 'Discord webhook URL (leave empty to use DISCORD_WEBHOOK_URL):',
        validate: (v) => v.trim() === '' || isUrl(v),
      });

      const optional = (v: string) => (v.trim() ? v.trim() : undefined);
      const config = parseConfig({
        url: url.trim(),
        mode,
        selectors: {
          item: item.trim(),
          name: optional(name),
          link: optional(link),
          image: optional(image),
          stock: optional(stock),
        },
        discordWebhookUrl: optional(webhook),
      });

      saveConfig(config, path);
      console.log(`\nConfig written to ${path}`);
    });
}
