import { describe, expect, it } from 'vitest';
import { reconcilePrice } from './reconcile';
import type { TrackedItem } from './types';

const URL_A = 'https://shop.example.com/p/1';

function makeItem(overrides: Partial<TrackedItem> = {}): TrackedItem {
  return {
    id: URL_A,
    name: 'Desk Lamp',
    url: URL_A,
    previousUrl: null,
    currentPrice: null,
    previousPrice: null,
    lastChecked: null,
    ...overrides,
  };
}

describe('reconcilePrice', () => {
  it('should leave the item untouched when the price is unresolved', () => {
    const item = makeItem({ currentPrice: 20, lastChecked: '2026-01-01T00:00:00.000Z' });
    const result = reconcilePrice(item, null, '2026-01-02T00:00:00.000Z');

    expect(result.outcome).toBe('unresolved');
    expect(result.event).toBeNull();
    expect(result.item).toEqual(item);
  });

  it('should record the first observation without an event', () => {
    const result = reconcilePrice(makeItem(), 49.99, '2026-01-02T00:00:00.000Z');

    expect(result.outcome).toBe('initial');
    expect(result.event).toBeNull();
    expect(result.item.currentPrice).toBe(49.99);
    expect(result.item.previousPrice).toBeNull();
    expect(result.item.lastChecked).toBe('2026-01-02T00:00:00.000Z');
  });

  it('should only emit on the first of two identical observations', () => {
    const item = makeItem({ currentPrice: 100 });
    const first = reconcilePrice(item, 80, 't1');
    const second = reconcilePrice(first.item, 80, 't2');

    expect(first.event).not.toBeNull();
    expect(second.outcome).toBe('unchanged');
    expect(second.event).toBeNull();
    expect(second.item.lastChecked).toBe('t2');
    expect(second.item.previousPrice).toBe(100);
  });

  it('should emit a price event carrying the prior price', () => {
    const item = makeItem({ currentPrice: 100, previousPrice: 120 });
    const result = reconcilePrice(item, 80, '2026-01-02T00:00:00.000Z');

    expect(result.outcome).toBe('changed');
    expect(result.item.previousPrice).toBe(100);
    expect(result.item.currentPrice).toBe(80);
    expect(result.event).toEqual({
      kind: 'price',
      itemId: URL_A,
      itemName: 'Desk Lamp',
      itemUrl: URL_A,
      oldValue: 100,
      newValue: 80,
      timestamp: '2026-01-02T00:00:00.000Z',
    });
  });

  it('should treat sub-cent differences as a change', () => {
    const result = reconcilePrice(makeItem({ currentPrice: 10 }), 10.001, 't');
    expect(result.outcome).toBe('changed');
  });

  it('should not mutate the input item', () => {
    const item = makeItem({ currentPrice: 100 });
    reconcilePrice(item, 80, 't');
    expect(item.currentPrice).toBe(100);
    expect(item.lastChecked).toBeNull();
  });
});
