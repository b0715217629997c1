import { createLogger } from '../../shared/logger';
import type { StaticFetcher } from './fetcher';
import { PricerUtils } from './pricerUtils';
import type { TrackedItem, UrlChangeEvent } from './types';

const log = createLogger('redirect');

export const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export interface RedirectProbeResult {
  item: TrackedItem;
  event: UrlChangeEvent | null;
}

/**
 * Check whether the retailer now redirects the item's URL.
 *
 * A redirect moves `url` into `previousUrl` and emits a `url` event.
 * Transport failures keep the item as it was.
 */
export async function probeRedirect(
  item: TrackedItem,
  fetcher: StaticFetcher,
  options: { timeoutMs: number; observedAt: string }
): Promise<RedirectProbeResult> {
  log.info(`Verifying product URL: ${item.url}`);
  const result = await fetcher.head(item.url, options.timeoutMs);

  if (result.kind === 'failure') {
    log.warn(
      `Could not verify ${item.url} (${result.reason}):`,
      result.message
    );
    return { item, event: null };
  }

  if (!REDIRECT_STATUS_CODES.has(result.statusCode) || !result.location) {
    return { item, event: null };
  }

  const target = PricerUtils.resolveLocation(result.location, item.url);
  if (target === item.url) {
    return { item, event: null };
  }

  log.warn(`URL has changed: ${item.url} -> ${target}`);
  return {
    item: { ...item, previousUrl: item.url, url: target },
    event: {
      kind: 'url',
      itemId: item.id,
      itemName: item.name,
      itemUrl: item.url,
      oldValue: item.url,
      newValue: target,
      timestamp: options.observedAt,
    },
  };
}
