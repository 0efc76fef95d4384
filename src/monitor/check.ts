import type { MonitorConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { ItemExtractor, RawItem } from '../extract/types.js';
import type { Logger } from '../logger.js';
import { dispatchNotifications, sleep as defaultSleep, type DeliveryResult, type Notifier } from '../notify/dispatch.js';
import { classifyStock } from './classifier.js';
import {
  decideTransition,
  resolveIdentity,
  type ItemState,
  type NotificationDecision,
  type Snapshot,
} from './state.js';
import type { StateStore } from './store.js';

export interface CheckDependencies {
  config: MonitorConfig;
  extractor: ItemExtractor;
  store: StateStore;
  notifier: Notifier;
  log: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export type CheckOutcome =
  | {
      status: 'completed';
      itemCount: number;
      snapshot: Snapshot;
      decisions: NotificationDecision[];
      deliveries: DeliveryResult[];
    }
  | { status: 'extraction_failed'; error: string };

/**
 * Folds the extracted items into the next snapshot. Only identities seen in
 * `items` survive; everything else from `prior` is dropped. When a listing
 * shows the same identity twice, the later occurrence is the one stored and
 * the one the notification is decided on.
 */
export function evaluateItems(
  items: readonly RawItem[],
  prior: Snapshot,
  config: MonitorConfig,
  seenAt: Date,
  log: Logger,
): { items: Record<string, ItemState>; decisions: NotificationDecision[] } {
  const latest = new Map<string, RawItem>();
  for (const item of items) {
    const identity = resolveIdentity(item);
    if (identity === null) {
      log.debug({ item }, 'Skipping item without link or name');
      continue;
    }
    if (latest.has(identity)) {
      log.debug({ identity }, 'Duplicate identity in listing; keeping the later occurrence');
    }
    latest.set(identity, item);
  }

  const next = new Map<string, ItemState>();
  const decisions: NotificationDecision[] = [];

  for (const [identity, item] of latest) {
    const { record, decision } = decideTransition({
      identity,
      item,
      inStock: classifyStock(item.stockLabel, config),
      prior: priorRecord(prior, identity),
      policy: config,
      seenAt,
    });

    next.set(identity, record);
    if (decision) decisions.push(decision);
  }

  // fromEntries defines own properties, so names like "__proto__" survive as keys.
  return { items: Object.fromEntries(next), decisions };
}

function priorRecord(prior: Snapshot, identity: string): ItemState | null {
  return Object.hasOwn(prior.items, identity) ? (prior.items[identity] ?? null) : null;
}

export async function runCheck(deps: CheckDependencies): Promise<CheckOutcome> {
  const { config, extractor, store, log } = deps;
  const now = deps.now ?? (() => new Date());

  const prior = store.load();
  log.debug({ known: Object.keys(prior.items).length, lastChecked: prior.lastChecked }, 'Loaded state');

  let items: RawItem[];
  try {
    log.info({ mode: extractor.mode, url: config.url }, 'Extracting items');
    items = await extractor.extract(config.url);
  } catch (err) {
    log.error({ err, url: config.url }, 'Failed to fetch or parse the page; state left untouched');
    return { status: 'extraction_failed', error: errorMessage(err) };
  }
  log.info({ count: items.length }, 'Parsed items');

  const checkedAt = now();
  const evaluated = evaluateItems(items, prior, config, checkedAt, log);
  const snapshot: Snapshot = { items: evaluated.items, lastChecked: checkedAt.toISOString() };

  store.save(snapshot);
  log.info({ path: store.path, items: Object.keys(snapshot.items).length }, 'State saved');

  const deliveries = await dispatchNotifications(evaluated.decisions, {
    send: deps.notifier,
    log,
    delayMs: config.notifyDelayMs,
    detectedAt: checkedAt,
    sleep: deps.sleep ?? defaultSleep,
  });

  const delivered = deliveries.filter((d) => d.ok).length;
  log.info({ decisions: evaluated.decisions.length, delivered, failed: deliveries.length - delivered }, 'Check complete');

  return {
    status: 'completed',
    itemCount: items.length,
    snapshot,
    decisions: evaluated.decisions,
    deliveries,
  };
}
