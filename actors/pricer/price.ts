#!/usr/bin/env tsx

import { logger } from '../../shared/logger';
import { PlaywrightRenderer } from './browser';
import { type CliContext, parseArgs, printHelp, runCommand } from './cli';
import { ConfigError } from './errors';
import { type PricerConfig, loadConfig } from './config';
import { DebugArtifacts } from './debugArtifacts';
import { HttpFetcher } from './fetcher';
import { createNotifier } from './notifier';
import { PriceWatcher } from './priceWatcher';
import { createStore } from './store';
import { createDefaultStrategies, PriceExtractionChain } from './strategies';

function createContext(config: PricerConfig): CliContext {
  const fetcher = new HttpFetcher();
  const extractor = new PriceExtractionChain(createDefaultStrategies(config), {
    fetcher,
    renderer: new PlaywrightRenderer({ headless: config.headless }),
    debugArtifacts: new DebugArtifacts({
      directory: config.debugScreenshotDir,
      limit: config.debugScreenshotLimit,
    }),
  });

  const watcher = new PriceWatcher({
    store: createStore(config.store),
    extractor,
    fetcher,
    notifier: createNotifier(config.email),
    redirectTimeoutMs: config.redirectTimeoutMs,
  });

  return { watcher, extractor };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  let config: PricerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const exitCode = await runCommand(args, createContext(config));
  process.exit(exitCode);
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
