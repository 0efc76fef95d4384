import type { FetchLike } from '../fetch.js';
import { REASON_LABELS, type NotificationDecision } from '../monitor/state.js';

export interface DiscordEmbed {
  title: string;
  url: string;
  description: string;
  timestamp: string;
  fields: { name: string; value: string; inline: boolean }[];
  image?: { url: string };
}

export interface DiscordPayload {
  content?: string;
  embeds: DiscordEmbed[];
}

export interface WebhookResult {
  ok: boolean;
  status?: number;
  error?: string;
}

const WEBHOOK_TIMEOUT_MS = 15000;

function absolutize(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

export function formatDetectedAt(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC');
}

export function buildDiscordEmbed(
  decision: NotificationDecision,
  opts: { pageUrl: string; detectedAt: Date },
): DiscordEmbed {
  const { item } = decision;
  const reason = REASON_LABELS[decision.reason];

  const embed: DiscordEmbed = {
    title: item.name ?? 'New item',
    url: item.link ? absolutize(item.link, opts.pageUrl) : opts.pageUrl,
    description: reason,
    timestamp: opts.detectedAt.toISOString(),
    fields: [
      { name: 'Detected', value: formatDetectedAt(opts.detectedAt), inline: true },
      { name: 'Status', value: reason, inline: true },
    ],
  };
  if (item.image) {
    embed.image = { url: absolutize(item.image, opts.pageUrl) };
  }
  return embed;
}

export function buildDiscordPayload(
  decision: NotificationDecision,
  opts: { pageUrl: string; detectedAt: Date; mentionRole?: string },
): DiscordPayload {
  const payload: DiscordPayload = { embeds: [buildDiscordEmbed(decision, opts)] };
  if (opts.mentionRole) payload.content = opts.mentionRole;
  return payload;
}

export async function sendDiscordWebhook(
  webhookUrl: string,
  payload: DiscordPayload,
  fetchImpl: FetchLike = fetch,
): Promise<WebhookResult> {
  try {
    const res = await fetchImpl(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      return { ok: false, status: res.status, error: body ? `HTTP ${res.status}: ${body}` : `HTTP ${res.status}` };
    }

    return { ok: true, status: res.status };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return { ok: false, error };
  }
}
