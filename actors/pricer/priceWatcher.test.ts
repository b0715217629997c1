import { describe, expect, it, vi } from 'vitest';
import { InvalidUrlError } from './errors';
import { PriceWatcher } from './priceWatcher';
import type { ExtractionOutcome, PriceExtractor } from './strategies';
import { fakeFetcher, makeItem, MemoryStore, RecordingNotifier } from './testing/fakes';
import type { TrackedItemMap } from './types';

const URL_A = 'https://shop.example.com/item/a';
const URL_B = 'https://shop.example.com/item/b';
const CHECKED_AT = new Date('2026-03-01T12:00:00.000Z');

function fixedExtractor(prices: Record<string, number | null>) {
  return {
    extract: vi.fn(async (url: string): Promise<ExtractionOutcome> => {
      const price = prices[url] ?? null;
      return {
        price,
        strategy: price === null ? null : 'static-html',
        attempts: [],
      };
    }),
  } satisfies PriceExtractor;
}

function okPage() {
  return fakeFetcher({ kind: 'response', statusCode: 200, body: '' });
}

async function createWatcher(options: {
  items?: TrackedItemMap;
  prices?: Record<string, number | null>;
  fetcher?: ReturnType<typeof fakeFetcher>;
  notifier?: RecordingNotifier | null;
}) {
  const store = new MemoryStore(options.items ?? {});
  const extractor = fixedExtractor(options.prices ?? {});
  const notifier = options.notifier === undefined ? new RecordingNotifier() : options.notifier;
  const watcher = new PriceWatcher({
    store,
    extractor,
    fetcher: options.fetcher ?? okPage(),
    notifier,
    redirectTimeoutMs: 500,
    now: () => CHECKED_AT,
  });
  await watcher.load();
  return { watcher, store, extractor, notifier };
}

describe('PriceWatcher', () => {
  describe('addItem', () => {
    it('should track a new URL with a default name', async () => {
      const { watcher } = await createWatcher({});

      expect(watcher.addItem(`  ${URL_A} `)).toBe(true);
      expect(watcher.listItems()).toEqual([
        makeItem(URL_A, { name: 'Item from shop.example.com' }),
      ]);
    });

    it('should keep an explicit name', async () => {
      const { watcher } = await createWatcher({});

      watcher.addItem(URL_A, 'Desk Lamp');

      expect(watcher.listItems()[0].name).toBe('Desk Lamp');
    });

    it('should not add a URL twice', async () => {
      const { watcher } = await createWatcher({ items: { [URL_A]: makeItem(URL_A) } });

      expect(watcher.addItem(URL_A, 'Other')).toBe(false);
      expect(watcher.listItems()).toHaveLength(1);
      expect(watcher.listItems()[0].name).toBe('Test Product');
    });

    it('should reject a malformed URL', async () => {
      const { watcher } = await createWatcher({});

      expect(() => watcher.addItem('not a url')).toThrow(InvalidUrlError);
      expect(() => watcher.addItem('not a url')).toThrow('Invalid URL format: not a url');
      expect(watcher.listItems()).toEqual([]);
    });
  });

  describe('removeItem', () => {
    it('should remove a tracked item', async () => {
      const { watcher } = await createWatcher({ items: { [URL_A]: makeItem(URL_A) } });

      expect(watcher.removeItem(URL_A)).toBe(true);
      expect(watcher.listItems()).toEqual([]);
    });

    it('should report an unknown id', async () => {
      const { watcher } = await createWatcher({});

      expect(watcher.removeItem(URL_A)).toBe(false);
    });
  });

  describe('checkPrices', () => {
    it('should emit a price event, save once and notify once', async () => {
      const { watcher, store, notifier } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A, { currentPrice: 100 }) },
        prices: { [URL_A]: 80 },
      });

      const result = await watcher.checkPrices();

      expect(result.events).toEqual([
        {
          kind: 'price',
          itemId: URL_A,
          itemName: 'Test Product',
          itemUrl: URL_A,
          oldValue: 100,
          newValue: 80,
          timestamp: '2026-03-01T12:00:00.000Z',
        },
      ]);
      expect(result).toMatchObject({ itemsChecked: 1, persisted: true, notified: true });
      expect(store.saved).toHaveLength(1);
      expect(store.saved[0][URL_A]).toMatchObject({
        currentPrice: 80,
        previousPrice: 100,
        lastChecked: '2026-03-01T12:00:00.000Z',
      });
      expect(notifier?.batches).toEqual([result.events]);
    });

    it('should record a first price without an event', async () => {
      const { watcher, store, notifier } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A) },
        prices: { [URL_A]: 49.99 },
      });

      const result = await watcher.checkPrices();

      expect(result.events).toEqual([]);
      expect(result.notified).toBeNull();
      expect(result.reports[0]).toEqual({
        itemId: URL_A,
        name: 'Test Product',
        outcome: 'initial',
        price: 49.99,
        strategy: 'static-html',
        redirected: false,
      });
      expect(store.saved[0][URL_A]).toMatchObject({ currentPrice: 49.99, previousPrice: null });
      expect(notifier?.batches).toEqual([]);
    });

    it('should leave an item untouched when no price is found', async () => {
      const item = makeItem(URL_A, { currentPrice: 20, lastChecked: '2026-02-01T00:00:00.000Z' });
      const { watcher, store } = await createWatcher({ items: { [URL_A]: item } });

      const result = await watcher.checkPrices();

      expect(result.reports[0].outcome).toBe('unresolved');
      expect(result.events).toEqual([]);
      expect(store.saved[0][URL_A]).toEqual(item);
    });

    it('should follow a redirect before extracting', async () => {
      const fetcher = fakeFetcher(
        { kind: 'response', statusCode: 200, body: '' },
        { kind: 'response', statusCode: 301, location: URL_B }
      );
      const { watcher, store, extractor, notifier } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A, { currentPrice: 10 }) },
        prices: { [URL_B]: 12 },
        fetcher,
      });

      const result = await watcher.checkPrices();

      expect(fetcher.head).toHaveBeenCalledWith(URL_A, 500);
      expect(extractor.extract).toHaveBeenCalledWith(URL_B);
      expect(result.events.map((event) => event.kind)).toEqual(['url', 'price']);
      expect(result.reports[0].redirected).toBe(true);
      expect(store.saved[0][URL_A]).toMatchObject({
        id: URL_A,
        url: URL_B,
        previousUrl: URL_A,
        currentPrice: 12,
        previousPrice: 10,
      });
      expect(notifier?.batches).toHaveLength(1);
      expect(notifier?.batches[0]).toHaveLength(2);
    });

    it('should check every item and keep going past failures', async () => {
      const { watcher } = await createWatcher({
        items: {
          [URL_A]: makeItem(URL_A, { currentPrice: 5 }),
          [URL_B]: makeItem(URL_B, { currentPrice: 7 }),
        },
        prices: { [URL_B]: 6 },
      });

      const result = await watcher.checkPrices();

      expect(result.itemsChecked).toBe(2);
      expect(result.reports.map((report) => report.outcome)).toEqual([
        'unresolved',
        'changed',
      ]);
    });

    it('should not notify when saving fails', async () => {
      const { watcher, store, notifier } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A, { currentPrice: 100 }) },
        prices: { [URL_A]: 80 },
      });
      store.failSaves = true;

      const first = await watcher.checkPrices();
      await watcher.load();
      const second = await watcher.checkPrices();

      expect(first.events).toHaveLength(1);
      expect(first).toMatchObject({ persisted: false, notified: null });
      expect(second).toMatchObject({ persisted: false, notified: null });
      expect(store.saved).toEqual([]);
      expect(notifier?.batches).toEqual([]);
    });

    it('should report a failed notification', async () => {
      const { watcher, store } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A, { currentPrice: 100 }) },
        prices: { [URL_A]: 90 },
        notifier: new RecordingNotifier({ success: false, error: 'rejected' }),
      });

      const result = await watcher.checkPrices();

      expect(result.notified).toBe(false);
      expect(result.persisted).toBe(true);
      expect(store.saved).toHaveLength(1);
    });

    it('should skip notification without a notifier', async () => {
      const { watcher } = await createWatcher({
        items: { [URL_A]: makeItem(URL_A, { currentPrice: 100 }) },
        prices: { [URL_A]: 90 },
        notifier: null,
      });

      const result = await watcher.checkPrices();

      expect(result.events).toHaveLength(1);
      expect(result.notified).toBeNull();
    });

    it('should save an empty store without notifying', async () => {
      const { watcher, store, notifier } = await createWatcher({});

      const result = await watcher.checkPrices();

      expect(result).toEqual({
        itemsChecked: 0,
        reports: [],
        events: [],
        persisted: true,
        notified: null,
      });
      expect(store.saved).toEqual([{}]);
      expect(notifier?.batches).toEqual([]);
    });
  });
});
