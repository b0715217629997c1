import { createLogger } from '../../../shared/logger';
import type { Renderer } from '../browser';
import type { DebugArtifacts } from '../debugArtifacts';
import type { StaticFetcher } from '../fetcher';
import {
  RENDERED_PRICE_SELECTORS,
  STATIC_PRICE_SELECTORS,
  STATIC_REQUEST_HEADERS,
} from '../selectors';
import { runRenderedStrategy } from './RenderedPageStrategy';
import { runStaticStrategy } from './StaticPageStrategy';
import type {
  ExtractionOutcome,
  ExtractionStrategy,
  PriceExtractor,
  StrategyAttempt,
  StrategyResult,
} from './types';

export { findPriceInMarkup, runStaticStrategy } from './StaticPageStrategy';
export { runRenderedStrategy } from './RenderedPageStrategy';
export type {
  ExtractionOutcome,
  ExtractionStrategy,
  PriceExtractor,
  RenderedStrategy,
  StaticStrategy,
  StrategyAttempt,
  StrategyResult,
} from './types';

const log = createLogger('extraction');

export interface ExtractionDependencies {
  fetcher: StaticFetcher;
  renderer: Renderer;
  debugArtifacts?: DebugArtifacts;
}

/**
 * Runs strategies in priority order and stops at the first price
 */
export class PriceExtractionChain implements PriceExtractor {
  constructor(
    private readonly strategies: readonly ExtractionStrategy[],
    private readonly deps: ExtractionDependencies
  ) {}

  async extract(url: string): Promise<ExtractionOutcome> {
    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategies) {
      const startedAt = Date.now();
      const result = await this.runStrategy(url, strategy);
      attempts.push({
        strategy: strategy.name,
        kind: strategy.kind,
        result,
        durationMs: Date.now() - startedAt,
      });

      if (result.found) {
        return { price: result.price, strategy: strategy.name, attempts };
      }
      log.warn(`${strategy.name} found no price for ${url}: ${result.reason}`);
    }

    return { price: null, strategy: null, attempts };
  }

  private async runStrategy(
    url: string,
    strategy: ExtractionStrategy
  ): Promise<StrategyResult> {
    try {
      switch (strategy.kind) {
        case 'static':
          return await runStaticStrategy(url, strategy, this.deps.fetcher);
        case 'rendered':
          return await runRenderedStrategy(
            url,
            strategy,
            this.deps.renderer,
            this.deps.debugArtifacts
          );
        default: {
          const unknown: never = strategy;
          throw new Error(
            `Unknown extraction strategy: ${JSON.stringify(unknown)}`
          );
        }
      }
    } catch (error) {
      log.error(`Error with ${strategy.name}:`, error);
      const message = error instanceof Error ? error.message : String(error);
      return {
        found: false,
        reason: `${strategy.kind} strategy failed: ${message}`,
      };
    }
  }
}

export interface StrategyTimeouts {
  fetchTimeoutMs: number;
  renderTimeoutMs: number;
  selectorWaitMs: number;
}

/**
 * Static markup first, headless browser as the fallback
 */
export function createDefaultStrategies(
  timeouts: StrategyTimeouts
): ExtractionStrategy[] {
  return [
    {
      kind: 'static',
      name: 'static-html',
      selectors: STATIC_PRICE_SELECTORS,
      headers: STATIC_REQUEST_HEADERS,
      timeoutMs: timeouts.fetchTimeoutMs,
    },
    {
      kind: 'rendered',
      name: 'headless-browser',
      selectors: RENDERED_PRICE_SELECTORS,
      navigationTimeoutMs: timeouts.renderTimeoutMs,
      selectorWaitMs: timeouts.selectorWaitMs,
    },
  ];
}
