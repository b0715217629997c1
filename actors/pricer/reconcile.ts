import type {
  PriceChangeEvent,
  ReconcileOutcome,
  TrackedItem,
} from './types';

export interface ReconcileResult {
  item: TrackedItem;
  event: PriceChangeEvent | null;
  outcome: ReconcileOutcome;
}

/**
 * Compare an observed price with the item's history.
 *
 * Pure: returns a new item instead of mutating the given one. Prices are
 * compared by exact equality.
 */
export function reconcilePrice(
  item: TrackedItem,
  observedPrice: number | null,
  observedAt: string
): ReconcileResult {
  if (observedPrice === null) {
    return { item, event: null, outcome: 'unresolved' };
  }

  if (item.currentPrice === null) {
    return {
      item: { ...item, currentPrice: observedPrice, lastChecked: observedAt },
      event: null,
      outcome: 'initial',
    };
  }

  if (observedPrice === item.currentPrice) {
    return {
      item: { ...item, lastChecked: observedAt },
      event: null,
      outcome: 'unchanged',
    };
  }

  const updated: TrackedItem = {
    ...item,
    previousPrice: item.currentPrice,
    currentPrice: observedPrice,
    lastChecked: observedAt,
  };

  return {
    item: updated,
    event: {
      kind: 'price',
      itemId: item.id,
      itemName: item.name,
      itemUrl: item.url,
      oldValue: item.currentPrice,
      newValue: observedPrice,
      timestamp: observedAt,
    },
    outcome: 'changed',
  };
}
