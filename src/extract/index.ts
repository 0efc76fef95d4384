import type { MonitorConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { RenderedDomExtractor } from './rendered.js';
import { StaticHtmlExtractor } from './static.js';
import type { ItemExtractor } from './types.js';

export type { ItemExtractor, RawItem } from './types.js';

export function createExtractor(config: MonitorConfig, log: Logger): ItemExtractor {
  switch (config.mode) {
    case 'static':
      return new StaticHtmlExtractor({
        selectors: config.selectors,
        userAgent: config.http.userAgent,
        timeoutMs: config.http.timeoutMs,
        log,
      });
    case 'rendered':
      return new RenderedDomExtractor({ config, log });
  }
}
