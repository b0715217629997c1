import { createClient } from '@supabase/supabase-js';
import { createLogger } from '../../../shared/logger';
import type { PriceStore, TrackedItemMap } from '../types';
import { deserializeItems, serializeItems } from './serialization';

const log = createLogger('supabase-store');

// ================================================
// STORAGE BUCKET
// ================================================

export type ReadResult =
  | { kind: 'found'; text: string }
  | { kind: 'missing' }
  | { kind: 'error'; message: string };

/** The slice of a storage bucket the store needs */
export interface StorageBucket {
  readText(objectKey: string): Promise<ReadResult>;
  writeText(objectKey: string, text: string): Promise<void>;
}

function isNotFound(message: string): boolean {
  return /not.?found|does not exist|404/i.test(message);
}

export interface SupabaseBucketOptions {
  url: string;
  serviceRoleKey: string;
  bucket: string;
}

/**
 * Storage bucket backed by Supabase Storage
 */
export function createSupabaseBucket(
  options: SupabaseBucketOptions
): StorageBucket {
  const client = createClient(options.url, options.serviceRoleKey, {
    auth: { persistSession: false },
  });
  const storage = client.storage.from(options.bucket);

  return {
    async readText(objectKey) {
      const response = await storage.download(objectKey);
      if (response.error) {
        const { message } = response.error;
        return isNotFound(message)
          ? { kind: 'missing' }
          : { kind: 'error', message };
      }
      return { kind: 'found', text: await response.data.text() };
    },

    async writeText(objectKey, text) {
      const { error } = await storage.upload(objectKey, text, {
        contentType: 'application/json',
        upsert: true,
      });
      if (error) {
        throw new Error(`Failed to upload ${objectKey}: ${error.message}`);
      }
    },
  };
}

// ================================================
// STORE
// ================================================

/**
 * Tracked items as one JSON object in a storage bucket
 */
export class SupabaseStore implements PriceStore {
  constructor(
    private readonly bucket: StorageBucket,
    private readonly objectKey: string
  ) {}

  get description(): string {
    return `storage object ${this.objectKey}`;
  }

  async load(): Promise<TrackedItemMap> {
    const result = await this.bucket.readText(this.objectKey);

    switch (result.kind) {
      case 'missing':
        log.info(`No stored object ${this.objectKey}, starting empty`);
        return {};
      case 'error':
        log.warn(
          `Could not download ${this.objectKey}, starting empty:`,
          result.message
        );
        return {};
      case 'found':
        try {
          return deserializeItems(result.text);
        } catch (error) {
          log.warn(
            `Corrupt stored object ${this.objectKey}, starting empty:`,
            error
          );
          return {};
        }
    }
  }

  async save(items: TrackedItemMap): Promise<void> {
    await this.bucket.writeText(this.objectKey, serializeItems(items));
    log.info(
      `Uploaded ${Object.keys(items).length} items to ${this.objectKey}`
    );
  }
}
