import { logger } from '../../shared/logger';
import { InvalidUrlError } from './errors';
import { PricerUtils } from './pricerUtils';
import type { PriceWatcher } from './priceWatcher';
import type { PriceExtractor } from './strategies';

// ================================================
// ARGUMENT PARSING
// ================================================

export interface CliArgs {
  /** First positional argument; `check` when none is given */
  command: string;
  target?: string;
  name?: string;
  help: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  const result: CliArgs = { command: 'check', help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--name' || arg === '-n') {
      result.name = args[i + 1];
      i++;
    } else if (arg.startsWith('--name=')) {
      result.name = arg.slice('--name='.length);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  if (positional.length > 0) {
    result.command = positional[0].toLowerCase();
  }
  if (positional.length > 1) {
    result.target = positional[1];
  }
  return result;
}

// ================================================
// HELP TEXT
// ================================================

export function printHelp(): void {
  logger.info(`
Price Watcher - Track product prices and get alerted on changes

Usage:
  npm run price -- <command>

Commands:
  add <url> [--name <name>]   Start tracking a product URL
  remove <url>                Stop tracking a product URL
  list                        Show tracked items
  check                       Check all prices once (default)
  probe <url>                 Run price extraction on a URL without saving

Options:
  --name, -n                  Display name for an added item
  --help, -h                  Show this help message

Examples:
  npm run price -- add https://www.walmart.com/ip/123 --name "Desk Lamp"
  npm run price -- check
`);
}

// ================================================
// COMMANDS
// ================================================

export interface CliContext {
  watcher: PriceWatcher;
  extractor: PriceExtractor;
}

async function addCommand(
  context: CliContext,
  url: string | undefined,
  name: string | undefined
): Promise<number> {
  if (!url) {
    logger.error('Usage: add <url> [--name <name>]');
    return 1;
  }

  await context.watcher.load();
  try {
    if (!context.watcher.addItem(url, name)) {
      logger.info(`Already tracking ${url.trim()}`);
      return 0;
    }
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  await context.watcher.save();
  return 0;
}

async function removeCommand(
  context: CliContext,
  url: string | undefined
): Promise<number> {
  if (!url) {
    logger.error('Usage: remove <url>');
    return 1;
  }

  await context.watcher.load();
  if (!context.watcher.removeItem(url.trim())) {
    return 1;
  }
  await context.watcher.save();
  return 0;
}

async function listCommand(context: CliContext): Promise<number> {
  await context.watcher.load();
  const items = context.watcher.listItems();

  if (items.length === 0) {
    logger.info('No items are being tracked.');
    return 0;
  }

  logger.info(`Tracked items (${items.length}):`);
  for (const item of items) {
    const price =
      item.currentPrice === null
        ? 'Not checked yet'
        : PricerUtils.formatPrice(item.currentPrice);
    logger.info(`
  ${item.name}
    URL: ${item.url}
    Current price: ${price}
    Last checked: ${item.lastChecked ?? 'Never'}`);
  }
  return 0;
}

async function checkCommand(context: CliContext): Promise<number> {
  await context.watcher.load();
  const result = await context.watcher.checkPrices();

  logger.info('📊 Price check results:');
  logger.info(`  📦 Items checked: ${result.itemsChecked}`);
  logger.info(`  🔔 Changes detected: ${result.events.length}`);
  const unresolved = result.reports.filter(
    (report) => report.outcome === 'unresolved'
  );
  if (unresolved.length > 0) {
    logger.warn(`  ❌ No price found (${unresolved.length}):`);
    for (const report of unresolved) {
      logger.warn(`    - ${report.name}`);
    }
  }
  if (!result.persisted) {
    logger.error('  💾 Results were not saved');
  }
  return 0;
}

async function probeCommand(
  context: CliContext,
  url: string | undefined
): Promise<number> {
  if (!url || !PricerUtils.parseProductUrl(url)) {
    logger.error(`Invalid URL format: ${url ?? ''}`);
    return 1;
  }

  const outcome = await context.extractor.extract(url.trim());
  for (const attempt of outcome.attempts) {
    const summary = attempt.result.found
      ? `${PricerUtils.formatPrice(attempt.result.price)} via ${attempt.result.selector}`
      : attempt.result.reason;
    logger.info(`  ${attempt.strategy} (${attempt.durationMs}ms): ${summary}`);
  }
  logger.info(
    outcome.strategy
      ? `Price: ${PricerUtils.formatPrice(outcome.price)} (${outcome.strategy})`
      : 'No price found'
  );
  return 0;
}

/**
 * Run one parsed command. Returns the process exit code.
 */
export async function runCommand(
  args: CliArgs,
  context: CliContext
): Promise<number> {
  switch (args.command) {
    case 'add':
      return addCommand(context, args.target, args.name);
    case 'remove':
      return removeCommand(context, args.target);
    case 'list':
      return listCommand(context);
    case 'check':
      return checkCommand(context);
    case 'probe':
      return probeCommand(context, args.target);
    default:
      logger.error(`Unknown command: ${args.command}`);
      logger.info('Available commands: add, remove, list, check, probe');
      return 1;
  }
}
