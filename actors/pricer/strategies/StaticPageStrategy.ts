import { type CheerioAPI, load } from 'cheerio';
import { createLogger } from '../../../shared/logger';
import type { StaticFetcher } from '../fetcher';
import { PricerUtils } from '../pricerUtils';
import type { StaticStrategy, StrategyResult } from './types';

const log = createLogger('static-page');

/**
 * Text of the first element matching the selector, followed by its
 * `content` attribute (meta tags and some itemprop spans carry the value there)
 */
function readCandidates($: CheerioAPI, selector: string): string[] | null {
  try {
    const element = $(selector).first();
    if (element.length === 0) {
      return null;
    }
    return [element.text().trim(), element.attr('content') ?? ''];
  } catch (error) {
    log.warn(`Skipping invalid selector ${selector}:`, error);
    return null;
  }
}

/**
 * Try the selectors in order; the first element that yields a number wins
 */
export function findPriceInMarkup(
  html: string,
  selectors: readonly string[]
): StrategyResult {
  const $ = load(html);

  for (const selector of selectors) {
    const candidates = readCandidates($, selector);
    if (!candidates) {
      continue;
    }

    for (const text of candidates) {
      const price = PricerUtils.parsePrice(text);
      if (price !== null) {
        log.info(`Found price with selector ${selector}: ${text}`);
        return { found: true, price, selector };
      }
    }
    log.debug(
      `Selector ${selector} matched without a price: "${candidates[0]}"`
    );
  }

  return {
    found: false,
    reason: `No price found with ${selectors.length} selectors`,
  };
}

export async function runStaticStrategy(
  url: string,
  strategy: StaticStrategy,
  fetcher: StaticFetcher
): Promise<StrategyResult> {
  const response = await fetcher.get(
    url,
    { ...strategy.headers },
    strategy.timeoutMs
  );

  if (response.kind === 'failure') {
    return { found: false, reason: `Transport error: ${response.message}` };
  }

  log.info(`Page fetched, status code: ${response.statusCode}`);
  if (response.statusCode < 200 || response.statusCode >= 300) {
    return {
      found: false,
      reason: `Failed to fetch page, status code: ${response.statusCode}`,
    };
  }

  return findPriceInMarkup(response.body, strategy.selectors);
}
