import type { Logger } from '../logger.js';
import type { NotificationDecision } from '../monitor/state.js';
import type { WebhookResult } from './discord.js';

/** `detectedAt` is the check time that was stamped into the saved snapshot. */
export type Notifier = (decision: NotificationDecision, detectedAt: Date) => Promise<WebhookResult>;

export interface DeliveryResult {
  identity: string;
  name: string | null;
  ok: boolean;
  status?: number;
  error?: string;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delivers decisions one at a time, pausing between attempts. A failed
 * delivery is logged and recorded; it never stops the ones after it.
 */
export async function dispatchNotifications(
  decisions: readonly NotificationDecision[],
  opts: {
    send: Notifier;
    log: Logger;
    delayMs: number;
    detectedAt: Date;
    sleep?: (ms: number) => Promise<void>;
  },
): Promise<DeliveryResult[]> {
  const pause = opts.sleep ?? sleep;
  const results: DeliveryResult[] = [];

  for (const [index, decision] of decisions.entries()) {
    if (index > 0 && opts.delayMs > 0) {
      await pause(opts.delayMs);
    }

    const target = { identity: decision.identity, name: decision.item.name };
    let outcome: WebhookResult;
    try {
      outcome = await opts.send(decision, opts.detectedAt);
    } catch (err) {
      outcome = { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    if (outcome.ok) {
      opts.log.info({ ...target, reason: decision.reason }, 'Notification sent');
    } else {
      opts.log.error({ ...target, status: outcome.status, err: outcome.error }, 'Failed to send notification');
    }

    results.push({ ...target, ok: outcome.ok, status: outcome.status, error: outcome.error });
  }

  return results;
}
