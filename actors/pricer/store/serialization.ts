import { z } from 'zod';
import { createLogger } from '../../../shared/logger';
import type { TrackedItem, TrackedItemMap } from '../types';

const log = createLogger('store');

// On-disk layout of one tracked item
const storedItemSchema = z.object({
  name: z.string(),
  url: z.string().min(1),
  previous_url: z.string().nullable().default(null),
  current_price: z.number().nullable().default(null),
  previous_price: z.number().nullable().default(null),
  last_checked: z.string().nullable().default(null),
});

type StoredItem = z.infer<typeof storedItemSchema>;

const storedDocumentSchema = z.record(z.unknown());

export function serializeItems(items: TrackedItemMap): string {
  const document: Record<string, StoredItem> = {};
  for (const [id, item] of Object.entries(items)) {
    document[id] = {
      name: item.name,
      url: item.url,
      previous_url: item.previousUrl,
      current_price: item.currentPrice,
      previous_price: item.previousPrice,
      last_checked: item.lastChecked,
    };
  }
  return JSON.stringify(document, null, 2);
}

/**
 * Parse a stored document. Throws on malformed JSON or a non-object root;
 * individual invalid records are skipped with a warning.
 */
export function deserializeItems(raw: string): TrackedItemMap {
  const document = storedDocumentSchema.parse(JSON.parse(raw));
  const items: TrackedItemMap = {};

  for (const [id, value] of Object.entries(document)) {
    const record = storedItemSchema.safeParse(value);
    if (!record.success) {
      log.warn(
        `Skipping invalid stored item ${id}:`,
        record.error.issues[0]?.message
      );
      continue;
    }

    const stored = record.data;
    const item: TrackedItem = {
      id,
      name: stored.name,
      url: stored.url,
      previousUrl: stored.previous_url,
      currentPrice: stored.current_price,
      previousPrice: stored.previous_price,
      lastChecked: stored.last_checked,
    };
    items[id] = item;
  }

  return items;
}
