import { Command } from 'commander';
import Table from 'cli-table3';
import { loadConfig } from '../config.js';
import { ConfigError, StateError } from '../errors.js';
import { StateStore } from '../monitor/store.js';
import type { Snapshot } from '../monitor/state.js';

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max - 3) + '...' : value;
}

export function renderSnapshotTable(snapshot: Snapshot): string {
  const table = new Table({
    head: ['Item', 'Stock label', 'In stock', 'Last seen'],
    style: { head: ['cyan'] },
  });

  for (const [identity, item] of Object.entries(snapshot.items)) {
    table.push([
      truncate(item.name ?? identity, 40),
      truncate(item.stockLabel ?? '-', 20),
      item.inStock ? 'yes' : 'no',
      item.lastSeen,
    ]);
  }

  return table.toString();
}

export function registerStateCommand(program: Command): void {
  program
    .command('state')
    .description('Show the stored per-item stock state')
    .option('--config <path>', 'Custom config file path')
    .action((opts: { config?: string }) => {
      try {
        const { statePath } = loadConfig(opts.config);
        const snapshot = new StateStore(statePath).load();

        if (snapshot.lastChecked === null) {
          console.log(`No snapshot at ${statePath} yet. Run: restock-watch check`);
          return;
        }

        console.log(renderSnapshotTable(snapshot));
        console.log(`\n${Object.keys(snapshot.items).length} items, last checked ${snapshot.lastChecked}`);
      } catch (err) {
        if (!(err instanceof ConfigError) && !(err instanceof StateError)) throw err;
        console.error(err.message);
        process.exitCode = 1;
      }
    });
}
