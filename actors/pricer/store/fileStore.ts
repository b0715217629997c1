import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../../../shared/logger';
import type { PriceStore, TrackedItemMap } from '../types';
import { deserializeItems, serializeItems } from './serialization';

const log = createLogger('file-store');

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Tracked items as a pretty-printed JSON file on local disk
 */
export class FileStore implements PriceStore {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return `file ${this.filePath}`;
  }

  async load(): Promise<TrackedItemMap> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.info(`No data file at ${this.filePath}, starting empty`);
      } else {
        log.warn(`Could not read ${this.filePath}, starting empty:`, error);
      }
      return {};
    }

    try {
      return deserializeItems(raw);
    } catch (error) {
      log.warn(`Corrupt data file ${this.filePath}, starting empty:`, error);
      return {};
    }
  }

  async save(items: TrackedItemMap): Promise<void> {
    const directory = path.dirname(this.filePath);
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(this.filePath, serializeItems(items), 'utf-8');
    log.info(`Saved ${Object.keys(items).length} items to ${this.filePath}`);
  }
}
