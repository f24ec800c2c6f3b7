#!/usr/bin/env node
import 'dotenv/config';
/**
 * grid-sentiment CLI
 *
 * Ingest collector output, score it, and query the observation store.
 */

import { readFileSync } from 'node:fs';

import { Command } from 'commander';

import { GridSentiment, VERSION } from '../index.js';
import { expandHome, loadConfig, type AppConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { ObservationRecord, PipelineReport } from '../types/index.js';

type GlobalOptions = {
  config?: string;
  db?: string;
  verbose?: boolean;
};

function buildContext(command: Command): { grid: GridSentiment; config: AppConfig; logger: Logger } {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig(globals.config);
  if (globals.db) {
    config.storage.dbPath = expandHome(globals.db);
  }
  const logger = new Logger(globals.verbose ? 'debug' : config.logging.level);
  return { grid: new GridSentiment({ config, logger }), config, logger };
}

function readRawRows(path: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array of observations`);
  }
  return parsed;
}

function parseHours(value: string, label: string): number {
  const hours = Number(value);
  if (!Number.isInteger(hours) || hours < 0) {
    throw new Error(`${label} must be a non-negative integer, got '${value}'`);
  }
  return hours;
}

function formatReport(report: PipelineReport): string {
  const lines = [
    `Fetched: ${report.fetched}`,
    `Accepted: ${report.accepted}`,
    `Outside lookback: ${report.outsideLookback}`,
    `Inserted: ${report.inserted}`,
    `Replaced: ${report.replaced}`,
    `Duplicates: ${report.duplicated}`,
    `Scored: ${report.scored}`,
    `Pending (insufficient history): ${report.unscorable}`,
    `Rejected (unknown zone): ${report.rejected}`,
    `Invalid: ${report.invalid}`,
  ];
  if (report.rejections.length > 0) {
    lines.push('Rejections:');
    for (const rejection of report.rejections) {
      lines.push(`- #${rejection.index} [${rejection.reason}] ${rejection.message}`);
    }
  }
  return lines.join('\n');
}

function formatRecord(record: ObservationRecord): string {
  const score = record.sentimentScore === null ? 'unscored' : record.sentimentScore.toFixed(1);
  const category = record.sentimentCategory ?? '-';
  return `${record.timestamp}  ${record.zone.padEnd(10)}  ${record.price.toFixed(2).padStart(9)}  ${record.load
    .toFixed(0)
    .padStart(7)}  ${score.padStart(8)}  ${category}`;
}

function run(
  command: Command,
  action: (context: { grid: GridSentiment; config: AppConfig; logger: Logger }) => void
): void {
  const context = buildContext(command);
  try {
    action(context);
  } finally {
    context.grid.close();
  }
}

const program = new Command();

program
  .name('grid-sentiment')
  .description('Hourly electricity market sentiment from price and load')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--db <path>', 'Path to the observation database')
  .option('-v, --verbose', 'Enable debug logging');

program
  .command('ingest')
  .description('Normalize, store and score a JSON array of raw observations')
  .argument('<file>', 'JSON file written by the collector')
  .option('-l, --lookback <hours>', 'Only keep rows within this many hours of the newest row')
  .option('--no-lookback', 'Keep every row in the file')
  .option('--json', 'Print the report as JSON')
  .action((file: string, options: { lookback?: string | false; json?: boolean }, command: Command) => {
    run(command, ({ grid, config, logger }) => {
      const lookbackHours =
        options.lookback === false
          ? undefined
          : options.lookback === undefined
            ? config.collector.lookbackHours
            : parseHours(options.lookback, 'lookback');
      const rows = readRawRows(file);
      logger.info(`Loaded ${rows.length} row(s) from ${file}`);
      const report = grid.submit(rows, { lookbackHours });
      console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report));
    });
  });

program
  .command('latest')
  .description('Show the most recent observation for a zone')
  .argument('<zone>', 'Zone or hub name')
  .option('--json', 'Print as JSON')
  .action((zone: string, options: { json?: boolean }, command: Command) => {
    run(command, ({ grid }) => {
      const record = grid.latest(zone);
      if (!record) {
        console.log(options.json ? 'null' : `No data for ${zone}.`);
        return;
      }
      console.log(options.json ? JSON.stringify(record, null, 2) : formatRecord(record));
    });
  });

program
  .command('history')
  .description('Show recent observations for a zone, ending at its latest record')
  .argument('<zone>', 'Zone or hub name')
  .option('-n, --hours <number>', 'Hours of history (capped at the configured maximum)', '24')
  .option('--json', 'Print as JSON')
  .action((zone: string, options: { hours: string; json?: boolean }, command: Command) => {
    run(command, ({ grid }) => {
      const records = grid.history(zone, parseHours(options.hours, 'hours'));
      if (options.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      if (records.length === 0) {
        console.log(`No data for ${zone}.`);
        return;
      }
      for (const record of records) {
        console.log(formatRecord(record));
      }
    });
  });

program
  .command('zones')
  .description('List zones present in the store with their row counts')
  .option('--json', 'Print as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    run(command, ({ grid }) => {
      const zones = grid.allZones().map((zone) => ({ zone, rows: grid.store.count(zone) }));
      if (options.json) {
        console.log(JSON.stringify(zones, null, 2));
        return;
      }
      if (zones.length === 0) {
        console.log('No zones stored.');
        return;
      }
      for (const { zone, rows } of zones) {
        console.log(`${zone.padEnd(10)}  ${rows}`);
      }
      console.log(`Total: ${grid.store.count()}`);
    });
  });

program
  .command('rescore')
  .description('Retry scoring rows that were waiting for more history')
  .argument('[zone]', 'Limit to one zone')
  .action((zone: string | undefined, _options: unknown, command: Command) => {
    run(command, ({ grid }) => {
      const summary = grid.rescore(zone ? [zone] : undefined);
      console.log(`Scored ${summary.scored}, still pending ${summary.unscorable}.`);
    });
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  console.error(message);
  process.exitCode = 1;
});
