import { chromium, type Browser, type Page } from 'rebrowser-playwright';
import { FingerprintGenerator } from 'fingerprint-generator';

export interface BrowserSession {
  page: Page;
  close(): Promise<void>;
}

export type LaunchBrowser = (headless: boolean) => Promise<Browser>;

export const launchChromium: LaunchBrowser = (headless) =>
  chromium.launch({
    headless,
    args: ['--disable-blink-features=AutomationControlled', '--no-first-run', '--disable-extensions'],
  });

/**
 * One page in a fresh context whose user agent and viewport come from a
 * generated desktop Chrome fingerprint. `close` tears down the whole browser.
 */
export async function openBrowserSession(opts: {
  headless: boolean;
  locale?: string;
  launch?: LaunchBrowser;
}): Promise<BrowserSession> {
  const locale = opts.locale ?? 'ja-JP';
  const browser = await (opts.launch ?? launchChromium)(opts.headless);

  try {
    const { fingerprint } = new FingerprintGenerator().getFingerprint({
      devices: ['desktop'],
      operatingSystems: ['windows', 'macos'],
      browsers: [{ name: 'chrome' }],
      locales: [locale, 'en-US'],
    });
    const context = await browser.newContext({
      userAgent: fingerprint.navigator.userAgent,
      locale,
      viewport: { width: fingerprint.screen.width, height: fingerprint.screen.height },
    });
    const page = await context.newPage();
    return { page, close: () => browser.close() };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
