import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../../shared/logger';
import type { RenderSession } from './browser';

const log = createLogger('debug-artifacts');

const SCREENSHOT_PREFIX = 'debug-screenshot-';

export interface DebugArtifactsOptions {
  directory: string;
  /** Screenshots kept after pruning; 0 disables capturing */
  limit: number;
  now?: () => Date;
}

/**
 * Screenshots of pages where no price could be found, capped to the
 * newest `limit` files by modification time.
 */
export class DebugArtifacts {
  private readonly directory: string;
  private readonly limit: number;
  private readonly now: () => Date;

  constructor(options: DebugArtifactsOptions) {
    this.directory = options.directory;
    this.limit = options.limit;
    this.now = options.now ?? (() => new Date());
  }

  async capture(session: RenderSession): Promise<string | null> {
    if (this.limit <= 0) {
      return null;
    }

    const filename = `${SCREENSHOT_PREFIX}${this.now().getTime()}.png`;
    const screenshotPath = path.join(this.directory, filename);

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await session.screenshot(screenshotPath);
      log.info(`Saved debug screenshot to ${screenshotPath}`);
    } catch (error) {
      log.error('Could not save screenshot:', error);
      return null;
    }

    await this.prune();
    return screenshotPath;
  }

  /**
   * Delete the oldest screenshots beyond the limit. Returns removed paths.
   */
  async prune(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      log.warn(`Could not read ${this.directory}:`, error);
      return [];
    }

    const screenshots = await Promise.all(
      entries
        .filter((name) => name.startsWith(SCREENSHOT_PREFIX))
        .map(async (name) => {
          const filePath = path.join(this.directory, name);
          const stats = await fs.stat(filePath);
          return { filePath, modifiedAt: stats.mtimeMs };
        })
    );

    const excess = screenshots
      .sort((a, b) => b.modifiedAt - a.modifiedAt)
      .slice(Math.max(this.limit, 0));

    const removed: string[] = [];
    for (const { filePath } of excess) {
      try {
        await fs.unlink(filePath);
        removed.push(filePath);
      } catch (error) {
        log.warn(`Could not remove ${filePath}:`, error);
      }
    }

    if (removed.length > 0) {
      log.debug(`Pruned ${removed.length} old debug screenshots`);
    }
    return removed;
  }
}
