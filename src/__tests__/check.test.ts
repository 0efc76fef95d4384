import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExtractionError } from '../errors.js';
import type { ItemExtractor, RawItem } from '../extract/types.js';
import { runCheck, type CheckDependencies } from '../monitor/check.js';
import { StateStore } from '../monitor/store.js';
import type { NotificationDecision, Snapshot } from '../monitor/state.js';
import type { Notifier } from '../notify/dispatch.js';
import { capturingLogger, silentLogger, testConfig } from './helpers.js';

const NOW = new Date('2026-03-01T09:00:00.000Z');

function fakeExtractor(items: RawItem[]): ItemExtractor {
  return { mode: 'static', extract: vi.fn(async () => items) };
}

function raw(name: string, stockLabel: string | null, link: string | null = null): RawItem {
  return { name, link, image: null, stockLabel };
}

describe('runCheck', () => {
  let dir: string;
  let store: StateStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'restock-watch-check-'));
    store = new StateStore(join(dir, 'state.json'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<CheckDependencies> = {}): CheckDependencies {
    return {
      config: testConfig(),
      extractor: fakeExtractor([]),
      store,
      notifier: vi.fn<Notifier>(async () => ({ ok: true, status: 204 })),
      log: silentLogger(),
      now: () => NOW,
      sleep: async () => {},
      ...overrides,
    };
  }

  it('notifies a restock and records the item as in stock', async () => {
    store.save({
      items: {
        A: { name: 'A', link: null, image: null, stockLabel: '売り切れ', inStock: false, lastSeen: '2026-02-28T09:00:00.000Z' },
      },
      lastChecked: '2026-02-28T09:00:00.000Z',
    });

    const notifier = vi.fn<Notifier>(async () => ({ ok: true, status: 204 }));
    const outcome = await runCheck(deps({ extractor: fakeExtractor([raw('A', '在庫あり')]), notifier }));

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.decisions.map((d) => d.reason)).toEqual(['restock']);
    expect(notifier).toHaveBeenCalledTimes(1);
    expect(store.load().items['A']?.inStock).toBe(true);
  });

  it('announces an unlabeled new item when unlabeled items are assumed in stock', async () => {
    const outcome = await runCheck(
      deps({
        config: testConfig({ assumeInStockIfNoLabel: true, notifyNewInStock: true }),
        extractor: fakeExtractor([raw('B', null)]),
      }),
    );

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.decisions).toHaveLength(1);
    expect(outcome.decisions[0]?.reason).toBe('new_in_stock');
    expect(outcome.decisions[0]?.identity).toBe('B');
  });

  it('treats an empty page as an empty snapshot', async () => {
    store.save({
      items: {
        gone: { name: 'gone', link: null, image: null, stockLabel: null, inStock: true, lastSeen: '2026-02-28T09:00:00.000Z' },
      },
      lastChecked: '2026-02-28T09:00:00.000Z',
    });
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));

    const outcome = await runCheck(deps({ notifier }));

    expect(outcome).toEqual({
      status: 'completed',
      itemCount: 0,
      snapshot: { items: {}, lastChecked: '2026-03-01T09:00:00.000Z' },
      decisions: [],
      deliveries: [],
    });
    expect(store.load()).toEqual({ items: {}, lastChecked: '2026-03-01T09:00:00.000Z' });
    expect(notifier).not.toHaveBeenCalled();
  });

  it('is idempotent once items are known', async () => {
    const extractor = fakeExtractor([raw('A', '在庫あり', '/p/a'), raw('B', '売り切れ', '/p/b')]);
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));

    await runCheck(deps({ extractor, notifier }));
    expect(notifier).toHaveBeenCalledTimes(1);

    const second = await runCheck(deps({ extractor, notifier }));
    const third = await runCheck(deps({ extractor, notifier }));

    expect(second.status === 'completed' && second.decisions).toEqual([]);
    expect(third.status === 'completed' && third.decisions).toEqual([]);
    expect(notifier).toHaveBeenCalledTimes(1);
  });

  it('keys items by link before name', async () => {
    await runCheck(deps({ extractor: fakeExtractor([raw('A', '在庫あり', '/p/a')]) }));
    expect(Object.keys(store.load().items)).toEqual(['/p/a']);
  });

  it('keeps going after a failed delivery and has already saved state', async () => {
    const { log, records } = capturingLogger();
    const savedBeforeSend: boolean[] = [];
    const notifier = vi.fn<Notifier>(async (decision: NotificationDecision) => {
      savedBeforeSend.push(existsSync(store.path) && decision.identity in store.load().items);
      return decision.identity === 'C'
        ? { ok: false, status: 500, error: 'HTTP 500: boom' }
        : { ok: true, status: 204 };
    });

    const outcome = await runCheck(
      deps({ extractor: fakeExtractor([raw('C', '在庫あり'), raw('D', '在庫あり')]), notifier, log }),
    );

    expect(notifier).toHaveBeenCalledTimes(2);
    expect(savedBeforeSend).toEqual([true, true]);
    expect(outcome.status === 'completed' && outcome.deliveries).toEqual([
      { identity: 'C', name: 'C', ok: false, status: 500, error: 'HTTP 500: boom' },
      { identity: 'D', name: 'D', ok: true, status: 204, error: undefined },
    ]);

    const failure = records.find((r) => r.msg === 'Failed to send notification');
    expect(failure?.identity).toBe('C');
    expect(failure?.status).toBe(500);
  });

  it('survives a notifier that throws', async () => {
    const notifier = vi.fn<Notifier>(async (decision: NotificationDecision) => {
      if (decision.identity === 'C') throw new Error('socket hang up');
      return { ok: true };
    });

    const outcome = await runCheck(
      deps({ extractor: fakeExtractor([raw('C', '在庫あり'), raw('D', '在庫あり')]), notifier }),
    );

    expect(outcome.status === 'completed' && outcome.deliveries.map((d) => d.ok)).toEqual([false, true]);
  });

  it('pauses between deliveries but not before the first', async () => {
    const sleep = vi.fn(async () => {});
    await runCheck(
      deps({
        config: testConfig({ notifyDelayMs: 1000 }),
        extractor: fakeExtractor([raw('A', '在庫あり'), raw('B', '在庫あり'), raw('C', '在庫あり')]),
        sleep,
      }),
    );

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('leaves state untouched when extraction fails', async () => {
    const previous: Snapshot = {
      items: {
        A: { name: 'A', link: null, image: null, stockLabel: '在庫あり', inStock: true, lastSeen: '2026-02-28T09:00:00.000Z' },
      },
      lastChecked: '2026-02-28T09:00:00.000Z',
    };
    store.save(previous);
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));
    const extractor: ItemExtractor = {
      mode: 'static',
      extract: async () => {
        throw new ExtractionError('GET https://shop.example.com/new-arrivals returned HTTP 503', { status: 503 });
      },
    };

    const outcome = await runCheck(deps({ extractor, notifier }));

    expect(outcome).toEqual({
      status: 'extraction_failed',
      error: 'GET https://shop.example.com/new-arrivals returned HTTP 503',
    });
    expect(store.load()).toEqual(previous);
    expect(notifier).not.toHaveBeenCalled();
  });

  it('decides and stores duplicate identities from the later occurrence', async () => {
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));
    const outcome = await runCheck(
      deps({ extractor: fakeExtractor([raw('A', '在庫あり', '/p/a'), raw('A again', '売り切れ', '/p/a')]), notifier }),
    );

    expect(notifier).not.toHaveBeenCalled();
    expect(outcome.status === 'completed' && outcome.snapshot.items['/p/a']).toMatchObject({
      name: 'A again',
      inStock: false,
    });
  });

  it('stops notifying for a repeated listing that shows one identity twice', async () => {
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));
    const listing = [raw('A', '売り切れ', '/p/a'), raw('A', '在庫あり', '/p/a')];

    const reasons: string[][] = [];
    for (let run = 0; run < 3; run++) {
      const outcome = await runCheck(deps({ extractor: fakeExtractor(listing), notifier }));
      reasons.push(outcome.status === 'completed' ? outcome.decisions.map((d) => d.reason) : []);
    }

    expect(reasons).toEqual([['new_in_stock'], [], []]);
    expect(notifier).toHaveBeenCalledTimes(1);
  });

  it('treats names that shadow Object.prototype keys as ordinary identities', async () => {
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));
    const listing = [raw('constructor', '在庫あり'), raw('__proto__', '在庫あり'), raw('toString', '売り切れ')];

    const first = await runCheck(deps({ extractor: fakeExtractor(listing), notifier }));
    expect(first.status === 'completed' && first.decisions.map((d) => [d.identity, d.reason])).toEqual([
      ['constructor', 'new_in_stock'],
      ['__proto__', 'new_in_stock'],
    ]);

    const stored = store.load().items;
    expect(Object.keys(stored)).toEqual(['constructor', '__proto__', 'toString']);
    expect(Object.getPrototypeOf(stored)).toBe(Object.prototype);

    const second = await runCheck(deps({ extractor: fakeExtractor(listing), notifier }));
    expect(second.status === 'completed' && second.decisions).toEqual([]);
    expect(notifier).toHaveBeenCalledTimes(2);
  });

  it('hands the notifier the same time that is stamped on the snapshot', async () => {
    const notifier = vi.fn<Notifier>(async () => ({ ok: true }));
    await runCheck(deps({ extractor: fakeExtractor([raw('A', '在庫あり')]), notifier }));

    expect(notifier).toHaveBeenCalledWith(expect.objectContaining({ identity: 'A' }), NOW);
    expect(store.load().lastChecked).toBe(NOW.toISOString());
  });
});
