import { Command } from 'commander';
import { loadConfig, resolveWebhookUrl, type MonitorConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { buildDiscordPayload, sendDiscordWebhook } from '../notify/discord.js';

export function registerWebhookCommands(program: Command): void {
  const webhookCmd = program.command('webhook').description('Manage Discord notifications');

  webhookCmd
    .command('test')
    .description('Send a sample restock alert to the configured webhook')
    .option('--config <path>', 'Custom config file path')
    .action(async (opts: { config?: string }) => {
      let config: MonitorConfig;
      let webhookUrl: string;
      try {
        ({ config } = loadConfig(opts.config));
        webhookUrl = resolveWebhookUrl(config);
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error(err.message);
        process.exitCode = 2;
        return;
      }

      const payload = buildDiscordPayload(
        {
          identity: 'restock-watch-test',
          reason: 'restock',
          item: {
            name: 'Test item (restock-watch)',
            link: null,
            image: null,
            stockLabel: 'In stock',
            inStock: true,
            lastSeen: new Date().toISOString(),
          },
        },
        { pageUrl: config.url, detectedAt: new Date(), mentionRole: config.mentionRole },
      );

      console.log('Sending test alert...');
      const result = await sendDiscordWebhook(webhookUrl, payload);
      if (result.ok) {
        console.log('Test alert sent. Check your Discord channel.');
      } else {
        console.error(`Failed to send: ${result.error}`);
        process.exitCode = 1;
      }
    });
}
