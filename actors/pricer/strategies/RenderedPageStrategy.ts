import { createLogger } from '../../../shared/logger';
import { type Renderer, withRenderSession } from '../browser';
import type { DebugArtifacts } from '../debugArtifacts';
import { PricerUtils } from '../pricerUtils';
import type { RenderedStrategy, StrategyResult } from './types';

const log = createLogger('rendered-page');

export async function runRenderedStrategy(
  url: string,
  strategy: RenderedStrategy,
  renderer: Renderer,
  debugArtifacts?: DebugArtifacts
): Promise<StrategyResult> {
  log.info('Falling back to headless browser for price extraction');

  return withRenderSession(
    renderer,
    url,
    strategy.navigationTimeoutMs,
    async (session) => {
      let remaining = [...strategy.selectors];
      // One wait budget shared by every lookup on this page
      const deadline = Date.now() + strategy.selectorWaitMs;

      while (remaining.length > 0) {
        const waitMs = deadline - Date.now();
        if (waitMs <= 0) {
          break;
        }

        const match = await session.findFirstMatching(remaining, waitMs);
        if (!match) {
          break;
        }

        log.info(
          `Found price text with selector ${match.selector}: ${match.text}`
        );
        const price = PricerUtils.parsePrice(match.text);
        if (price !== null) {
          return { found: true, price, selector: match.selector };
        }

        // Keep looking among the lower-priority selectors
        const index = remaining.indexOf(match.selector);
        if (index === -1) {
          break;
        }
        remaining = remaining.slice(index + 1);
      }

      log.warn('Could not find price with any selector');
      if (debugArtifacts) {
        await debugArtifacts.capture(session);
      }

      return {
        found: false,
        reason: `No selector resolved to a price within ${strategy.selectorWaitMs}ms`,
      };
    }
  );
}
