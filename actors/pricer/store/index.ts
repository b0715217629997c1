import type { StoreConfig } from '../config';
import type { PriceStore } from '../types';
import { FileStore } from './fileStore';
import { createSupabaseBucket, SupabaseStore } from './supabaseStore';

export { FileStore } from './fileStore';
export { createSupabaseBucket, SupabaseStore } from './supabaseStore';
export type { ReadResult, StorageBucket } from './supabaseStore';
export { deserializeItems, serializeItems } from './serialization';

export function createStore(config: StoreConfig): PriceStore {
  switch (config.backend) {
    case 'file':
      return new FileStore(config.path);
    case 'supabase':
      return new SupabaseStore(
        createSupabaseBucket({
          url: config.url,
          serviceRoleKey: config.serviceRoleKey,
          bucket: config.bucket,
        }),
        config.objectKey
      );
  }
}
