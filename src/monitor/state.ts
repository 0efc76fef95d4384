import type { RawItem } from '../extract/types.js';

export interface ItemState {
  name: string | null;
  link: string | null;
  image: string | null;
  stockLabel: string | null;
  inStock: boolean;
  lastSeen: string;
}

export interface Snapshot {
  items: Record<string, ItemState>;
  lastChecked: string | null;
}

export type NotificationReason = 'restock' | 'new_in_stock' | 'new';

export const REASON_LABELS: Record<NotificationReason, string> = {
  restock: 'Restocked (sold out → in stock)',
  new_in_stock: 'New item, in stock',
  new: 'New item',
};

export interface NotificationDecision {
  identity: string;
  item: ItemState;
  reason: NotificationReason;
}

export interface NotificationPolicy {
  notifyNewInStock: boolean;
  notifyNew: boolean;
}

export function emptySnapshot(): Snapshot {
  return { items: {}, lastChecked: null };
}

/** Link first, then display name. Null when the item carries neither. */
export function resolveIdentity(item: Pick<RawItem, 'link' | 'name'>): string | null {
  return item.link || item.name || null;
}

export function decideTransition(input: {
  identity: string;
  item: RawItem;
  inStock: boolean;
  prior: ItemState | null;
  policy: NotificationPolicy;
  seenAt: Date;
}): { record: ItemState; decision: NotificationDecision | null } {
  const { identity, item, inStock, prior, policy } = input;

  const record: ItemState = {
    name: item.name,
    link: item.link,
    image: item.image,
    stockLabel: item.stockLabel,
    inStock,
    lastSeen: input.seenAt.toISOString(),
  };

  let reason: NotificationReason | null = null;
  if (prior) {
    if (!prior.inStock && inStock) reason = 'restock';
  } else if (inStock && policy.notifyNewInStock) {
    reason = 'new_in_stock';
  } else if (policy.notifyNew) {
    reason = 'new';
  }

  return {
    record,
    decision: reason ? { identity, item: record, reason } : null,
  };
}
