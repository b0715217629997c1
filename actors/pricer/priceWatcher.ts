import { createLogger } from '../../shared/logger';
import { InvalidUrlError } from './errors';
import type { StaticFetcher } from './fetcher';
import { PricerUtils } from './pricerUtils';
import { reconcilePrice } from './reconcile';
import { probeRedirect } from './redirect';
import type { PriceExtractor } from './strategies';
import type {
  ChangeEvent,
  CheckResult,
  ItemCheckReport,
  Notifier,
  PriceStore,
  TrackedItem,
  TrackedItemMap,
} from './types';

const log = createLogger('watcher');

export interface PriceWatcherDependencies {
  store: PriceStore;
  extractor: PriceExtractor;
  fetcher: StaticFetcher;
  notifier?: Notifier | null;
  redirectTimeoutMs: number;
  now?: () => Date;
}

/**
 * Tracked items plus the check cycle: redirect probe, extraction,
 * reconciliation, one save, at most one notification.
 */
export class PriceWatcher {
  private items: TrackedItemMap = {};
  private readonly now: () => Date;

  constructor(private readonly deps: PriceWatcherDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    this.items = await this.deps.store.load();
    log.info(
      `Loaded ${Object.keys(this.items).length} tracked items from ${this.deps.store.description}`
    );
  }

  async save(): Promise<void> {
    await this.deps.store.save(this.items);
  }

  /**
   * Track a new URL. Returns false when it is already tracked.
   */
  addItem(url: string, name?: string): boolean {
    const parsed = PricerUtils.parseProductUrl(url);
    if (!parsed) {
      throw new InvalidUrlError(url);
    }

    const id = url.trim();
    if (id in this.items) {
      log.warn(`Item already being tracked: ${id}`);
      return false;
    }

    const itemName = name?.trim() || PricerUtils.defaultItemName(parsed);
    this.items[id] = {
      id,
      name: itemName,
      url: id,
      previousUrl: null,
      currentPrice: null,
      previousPrice: null,
      lastChecked: null,
    };
    log.info(`Added item: ${itemName} (${id})`);
    return true;
  }

  /**
   * Stop tracking an item. Returns false when the id is unknown.
   */
  removeItem(id: string): boolean {
    const item = this.items[id];
    if (!item) {
      log.warn(`Item not found: ${id}`);
      return false;
    }

    delete this.items[id];
    log.info(`Removed item: ${item.name}`);
    return true;
  }

  listItems(): TrackedItem[] {
    return Object.values(this.items);
  }

  async checkPrices(): Promise<CheckResult> {
    const reports: ItemCheckReport[] = [];
    const events: ChangeEvent[] = [];
    const ids = Object.keys(this.items);

    log.info(`Checking prices for ${ids.length} items...`);

    for (const id of ids) {
      const report = await this.checkItem(id, events);
      reports.push(report);
    }

    const persisted = await this.persist();
    let notified: boolean | null = null;
    if (persisted) {
      notified = await this.flush(events);
    } else if (events.length > 0) {
      log.warn(
        `Notification skipped for ${events.length} changes: state was not saved`
      );
    }

    log.info(
      `Check complete: ${reports.length} items, ${events.length} changes`,
      { persisted, notified }
    );

    return { itemsChecked: ids.length, reports, events, persisted, notified };
  }

  private async checkItem(
    id: string,
    events: ChangeEvent[]
  ): Promise<ItemCheckReport> {
    const original = this.items[id];
    log.info(`Checking price for: ${original.name}`);

    const redirect = await probeRedirect(original, this.deps.fetcher, {
      timeoutMs: this.deps.redirectTimeoutMs,
      observedAt: this.now().toISOString(),
    });
    if (redirect.event) {
      events.push(redirect.event);
    }

    const extraction = await this.deps.extractor.extract(redirect.item.url);
    const reconciled = reconcilePrice(
      redirect.item,
      extraction.price,
      this.now().toISOString()
    );
    this.items[id] = reconciled.item;

    switch (reconciled.outcome) {
      case 'unresolved':
        log.warn(`Could not get price for ${original.name}`);
        break;
      case 'initial':
        log.info(
          `Initial price for ${original.name}: ${PricerUtils.formatPrice(extraction.price)}`
        );
        break;
      case 'changed':
        log.info(
          `Price changed for ${original.name}: ${PricerUtils.formatPrice(original.currentPrice)} -> ${PricerUtils.formatPrice(extraction.price)}`
        );
        break;
      case 'unchanged':
        log.info(
          `Price unchanged for ${original.name}: ${PricerUtils.formatPrice(extraction.price)}`
        );
        break;
    }
    if (reconciled.event) {
      events.push(reconciled.event);
    }

    return {
      itemId: id,
      name: reconciled.item.name,
      outcome: reconciled.outcome,
      price: extraction.price,
      strategy: extraction.strategy,
      redirected: redirect.event !== null,
    };
  }

  private async persist(): Promise<boolean> {
    try {
      await this.save();
      return true;
    } catch (error) {
      log.error(`Failed to save to ${this.deps.store.description}:`, error);
      return false;
    }
  }

  private async flush(events: ChangeEvent[]): Promise<boolean | null> {
    if (events.length === 0) {
      return null;
    }

    const { notifier } = this.deps;
    if (!notifier) {
      log.info(
        `Notification skipped for ${events.length} changes: no notifier configured`
      );
      return null;
    }

    try {
      const result = await notifier.notify(events);
      if (!result.success) {
        log.error(
          `Failed to send ${notifier.channel} notification:`,
          result.error
        );
      }
      return result.success;
    } catch (error) {
      log.error(`Failed to send ${notifier.channel} notification:`, error);
      return false;
    }
  }
}
