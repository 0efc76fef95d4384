import type { MonitorConfig, SelectorConfig } from '../config.js';
import { ExtractionError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { openBrowserSession, type BrowserSession, type LaunchBrowser } from '../browser/session.js';
import { toRawItem, type ItemExtractor, type RawItem } from './types.js';

const WAIT_FOR_SELECTOR_TIMEOUT_MS = 15000;

/** The slice of Playwright's ElementHandle the field reader needs. */
export interface DomElement {
  $(selector: string): Promise<DomElement | null>;
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
}

async function textOf(el: DomElement, selector: string | undefined): Promise<string | null> {
  if (!selector) return null;
  const found = await el.$(selector);
  return found ? found.innerText() : null;
}

async function attrOf(el: DomElement, selector: string | undefined, attrs: readonly string[]): Promise<string | null> {
  if (!selector) return null;
  const found = await el.$(selector);
  if (!found) return null;
  for (const attr of attrs) {
    const value = await found.getAttribute(attr);
    if (value) return value;
  }
  return null;
}

export async function readRenderedItem(el: DomElement, selectors: SelectorConfig): Promise<RawItem | null> {
  return toRawItem({
    name: await textOf(el, selectors.name),
    link: await attrOf(el, selectors.link, ['href', 'data-href', 'data-url']),
    image: await attrOf(el, selectors.image, ['src', 'data-src']),
    stockLabel: await textOf(el, selectors.stock),
  });
}

export async function readRenderedItems(
  elements: readonly DomElement[],
  selectors: SelectorConfig,
  log: Logger,
): Promise<RawItem[]> {
  const items: RawItem[] = [];
  let failures = 0;
  let lastError: unknown;

  for (const [index, el] of elements.entries()) {
    try {
      const item = await readRenderedItem(el, selectors);
      if (item) items.push(item);
    } catch (err) {
      failures++;
      lastError = err;
      log.warn({ index, err: errorMessage(err) }, 'Skipping element that failed to parse');
    }
  }

  if (elements.length > 0 && failures === elements.length) {
    throw new ExtractionError(`All ${failures} item elements failed to parse: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }
  return items;
}

export class RenderedDomExtractor implements ItemExtractor {
  readonly mode = 'rendered';

  constructor(
    private readonly opts: {
      config: Pick<MonitorConfig, 'selectors' | 'waitForSelector' | 'browser'>;
      log: Logger;
      launch?: LaunchBrowser;
    },
  ) {}

  async extract(pageUrl: string): Promise<RawItem[]> {
    const { config, log } = this.opts;

    let session: BrowserSession;
    try {
      session = await openBrowserSession({ headless: config.browser.headless, launch: this.opts.launch });
    } catch (err) {
      throw new ExtractionError(`Cannot open browser: ${errorMessage(err)}`, { cause: err });
    }

    const { page } = session;
    try {
      log.info({ url: pageUrl }, 'Navigating to page');
      await page.goto(pageUrl, { waitUntil: 'networkidle', timeout: config.browser.navigationTimeoutMs });

      if (config.waitForSelector) {
        await page
          .waitForSelector(config.waitForSelector, { timeout: WAIT_FOR_SELECTOR_TIMEOUT_MS })
          .catch((err: unknown) => {
            log.debug({ selector: config.waitForSelector, err: errorMessage(err) }, 'waitForSelector timed out or missed');
          });
      }

      const elements = await page.$$(config.selectors.item);
      log.info({ count: elements.length, selector: config.selectors.item }, 'Found item elements');

      return await readRenderedItems(elements, config.selectors, log);
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`Rendering ${pageUrl} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      await session.close().catch((err: unknown) => {
        log.warn({ err: errorMessage(err) }, 'Browser did not close cleanly');
      });
    }
  }
}
