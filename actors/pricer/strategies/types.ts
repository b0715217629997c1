// ================================================
// STRATEGY TYPES
// ================================================

/** Plain HTTP fetch plus selector probing over the static markup */
export interface StaticStrategy {
  kind: 'static';
  name: string;
  selectors: readonly string[];
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
}

/** Headless browser render, waiting for a selector to appear */
export interface RenderedStrategy {
  kind: 'rendered';
  name: string;
  selectors: readonly string[];
  navigationTimeoutMs: number;
  selectorWaitMs: number;
}

export type ExtractionStrategy = StaticStrategy | RenderedStrategy;

export type StrategyKind = ExtractionStrategy['kind'];

// ================================================
// RESULT TYPES
// ================================================

export type StrategyResult =
  | { found: true; price: number; selector: string }
  | { found: false; reason: string };

export interface StrategyAttempt {
  strategy: string;
  kind: StrategyKind;
  result: StrategyResult;
  durationMs: number;
}

export interface ExtractionOutcome {
  price: number | null;
  /** Name of the strategy that produced the price */
  strategy: string | null;
  attempts: StrategyAttempt[];
}

export interface PriceExtractor {
  extract(url: string): Promise<ExtractionOutcome>;
}
