// ================================================
// TRACKED ITEMS
// ================================================

export interface TrackedItem {
  /** URL the item was added with; never changes */
  id: string;
  name: string;
  /** Current canonical URL, rewritten when the retailer redirects */
  url: string;
  previousUrl: string | null;
  currentPrice: number | null;
  previousPrice: number | null;
  /** ISO-8601 time of the last successful price observation */
  lastChecked: string | null;
}

export type TrackedItemMap = Record<string, TrackedItem>;

// ================================================
// CHANGE EVENTS
// ================================================

interface ChangeEventBase {
  itemId: string;
  itemName: string;
  itemUrl: string;
  timestamp: string;
}

export interface PriceChangeEvent extends ChangeEventBase {
  kind: 'price';
  oldValue: number;
  newValue: number;
}

export interface UrlChangeEvent extends ChangeEventBase {
  kind: 'url';
  oldValue: string;
  newValue: string;
}

export type ChangeEvent = PriceChangeEvent | UrlChangeEvent;

// ================================================
// CHECK CYCLE
// ================================================

export type ReconcileOutcome =
  | 'unresolved'
  | 'initial'
  | 'changed'
  | 'unchanged';

export interface ItemCheckReport {
  itemId: string;
  name: string;
  outcome: ReconcileOutcome;
  price: number | null;
  /** Strategy that produced the price, when one did */
  strategy: string | null;
  redirected: boolean;
}

export interface CheckResult {
  itemsChecked: number;
  reports: ItemCheckReport[];
  events: ChangeEvent[];
  persisted: boolean;
  /** null when there was nothing to send or no notifier is configured */
  notified: boolean | null;
}

// ================================================
// COLLABORATORS
// ================================================

export interface PriceStore {
  readonly description: string;
  load(): Promise<TrackedItemMap>;
  save(items: TrackedItemMap): Promise<void>;
}

export interface NotifyResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface Notifier {
  readonly channel: string;
  notify(events: ChangeEvent[]): Promise<NotifyResult>;
}
