#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { registerCheckCommand } from './check.js';
import { registerStateCommand } from './state.js';
import { registerInitCommand } from './init.js';
import { registerWebhookCommands } from './webhook.js';

const require = createRequire(import.meta.url);
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = require(resolve(__dirname, '../../package.json')) as { version: string };

const program = new Command();
program
  .name('restock-watch')
  .version(pkg.version)
  .description('Watch a product listing page and post Discord alerts on restocks and new arrivals');

registerCheckCommand(program);
registerStateCommand(program);
registerInitCommand(program);
registerWebhookCommands(program);

await program.parseAsync();
