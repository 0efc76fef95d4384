import * as cheerio from 'cheerio';
import type { SelectorConfig } from '../config.js';
import { ExtractionError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { FetchLike } from '../fetch.js';
import { toRawItem, type ItemExtractor, type RawItem } from './types.js';

/** Whether cheerio can compile `selector`; tried against a one-element document. */
export function isParsableSelector(selector: string): boolean {
  try {
    cheerio.load('<div></div>').root().find(selector);
    return true;
  } catch {
    return false;
  }
}

const LINK_ATTRS = ['href', 'data-href', 'data-url'];
const IMAGE_ATTRS = ['src', 'data-src'];

/**
 * Reads one RawItem per `selectors.item` block. A block that throws is
 * skipped, but when every block throws the page is reported as unreadable
 * rather than as an empty listing.
 */
export function parseListingHtml(html: string, selectors: SelectorConfig, log: Logger): RawItem[] {
  const $ = cheerio.load(html);
  const items: RawItem[] = [];
  const blocks = $(selectors.item);
  let failures = 0;
  let lastError: unknown;

  blocks.each((index, node) => {
    const el = $(node);
    try {
      const textOf = (selector: string | undefined): string | null => {
        if (!selector) return null;
        const found = el.find(selector).first();
        return found.length ? found.text() : null;
      };
      const attrOf = (selector: string | undefined, attrs: readonly string[]): string | null => {
        if (!selector) return null;
        const found = el.find(selector).first();
        if (!found.length) return null;
        for (const attr of attrs) {
          const value = found.attr(attr);
          if (value) return value;
        }
        return null;
      };

      const item = toRawItem({
        name: textOf(selectors.name),
        link: attrOf(selectors.link, LINK_ATTRS),
        image: attrOf(selectors.image, IMAGE_ATTRS),
        stockLabel: textOf(selectors.stock),
      });
      if (item) items.push(item);
    } catch (err) {
      failures++;
      lastError = err;
      log.warn({ index, err: errorMessage(err) }, 'Skipping element that failed to parse');
    }
  });

  if (blocks.length > 0 && failures === blocks.length) {
    throw new ExtractionError(`All ${failures} item elements failed to parse: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }
  return items;
}

export class StaticHtmlExtractor implements ItemExtractor {
  readonly mode = 'static';

  constructor(
    private readonly opts: {
      selectors: SelectorConfig;
      userAgent: string;
      timeoutMs: number;
      log: Logger;
      fetchImpl?: FetchLike;
    },
  ) {}

  async extract(pageUrl: string): Promise<RawItem[]> {
    const { log } = this.opts;
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    log.info({ url: pageUrl }, 'Fetching page over HTTP');
    let html: string;
    try {
      const res = await fetchImpl(pageUrl, {
        headers: { 'User-Agent': this.opts.userAgent },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!res.ok) {
        throw new ExtractionError(`GET ${pageUrl} returned HTTP ${res.status}`, { status: res.status });
      }
      html = await res.text();
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`GET ${pageUrl} failed: ${errorMessage(err)}`, { cause: err });
    }

    let items: RawItem[];
    try {
      items = parseListingHtml(html, this.opts.selectors, log);
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`Cannot parse ${pageUrl}: ${errorMessage(err)}`, { cause: err });
    }
    log.info({ count: items.length, selector: this.opts.selectors.item }, 'Parsed items from HTML');
    return items;
  }
}
