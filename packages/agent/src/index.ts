#!/usr/bin/env -S node --import tsx

import { MAX_TIMER_MS } from '@hostsnap/shared';
import { cmdCategoriesList } from './cli/categories.js';
import { parseCategoryList } from './cli/common.js';
import { cmdDiff } from './cli/diff.js';
import { cmdFields } from './cli/fields.js';
import { cmdSnapshot } from './cli/snapshot.js';
import { cmdWatch } from './cli/watch.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { AggregateRefreshError, ConfigError, errorMessage } from './runtime/errors.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: hostsnap <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  snapshot            Refresh all categories once and print the snapshot JSON');
  console.log('  fields <category>   Query one category and print its fields and rows');
  console.log('  categories          List categories and whether this host supports them');
  console.log('  watch               Refresh on an interval and report what changed');
  console.log('  diff <a> <b>        Compare two saved snapshot files');
  console.log('  help                Show this message');
  console.log('');
  console.log('Snapshot options:');
  console.log('  --sync               Refresh categories one at a time');
  console.log('  --categories <a,b>   Only these categories');
  console.log('  --out <file>         Write the snapshot to a file');
  console.log('  --strict             Exit 1 if any category failed');
  console.log('');
  console.log('Watch options:');
  console.log('  --interval <ms>      Time between refreshes (min 1000)');
  console.log('  --sync               Refresh categories one at a time');
  console.log('  --categories <a,b>   Only these categories');
}

function parseInterval(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const ms = Number(raw);
  if (!Number.isInteger(ms) || ms < 1000 || ms > MAX_TIMER_MS) {
    throw new ConfigError(`--interval must be an integer between 1000 and ${MAX_TIMER_MS}, got "${raw}"`);
  }
  return ms;
}

function categoriesArg() {
  const raw = getArg('--categories');
  return raw === undefined ? undefined : parseCategoryList(raw);
}

function fail(err: unknown): void {
  if (err instanceof AggregateRefreshError) {
    console.error(err.message);
  } else {
    logger.error({ err: errorMessage(err) }, 'Command failed');
    console.error(`Error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
}

async function runWatch(): Promise<void> {
  const handle = await cmdWatch({
    intervalMs: parseInterval(getArg('--interval')),
    sync: hasFlag('--sync'),
    categories: categoriesArg(),
  });

  const shutdown = (): void => {
    handle.stop().catch(fail);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  if (command === '--version' || command === '-v' || hasFlag('--version')) {
    console.log(VERSION);
    return;
  }

  if (!command || command === 'help' || command === '--help') {
    printUsage();
    return;
  }

  logger.level = loadConfig().logLevel;

  switch (command) {
    case 'snapshot':
      await cmdSnapshot({
        sync: hasFlag('--sync'),
        strict: hasFlag('--strict'),
        categories: categoriesArg(),
        out: getArg('--out'),
      });
      break;
    case 'fields': {
      const category = args[1];
      if (!category) {
        console.error('Usage: hostsnap fields <category>');
        process.exitCode = 1;
        return;
      }
      const result = await cmdFields(category);
      if (!result) process.exitCode = 1;
      break;
    }
    case 'categories':
      cmdCategoriesList();
      break;
    case 'watch':
      await runWatch();
      break;
    case 'diff': {
      const [, before, after] = args;
      if (!before || !after) {
        console.error('Usage: hostsnap diff <before.json> <after.json>');
        process.exitCode = 1;
        return;
      }
      cmdDiff(before, after);
      break;
    }
    default:
      printUsage();
      console.error(`\nUnknown command: ${command}`);
      process.exitCode = 1;
  }
}

main().catch(fail);
