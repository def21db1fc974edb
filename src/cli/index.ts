#!/usr/bin/env node
import Table from 'cli-table3';
import { Command, Option } from 'commander';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DbKey, loadConfig, resolveResultPath } from '../config/config.js';
import { compareSnapshots, isIdentical } from '../core/comparator.js';
import { ConfigError, ConnectionError, StructuralError } from '../core/errors.js';
import { Orchestrator } from '../core/orchestrator.js';
import { parseSnapshot, serializeSnapshot } from '../core/snapshot.js';
import { AttributeMismatch, ComparisonResult } from '../types/comparison.js';
import { SchemaExporter, formatColumnType } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';

function formatValue(value: AttributeMismatch['primary']): string {
  if (value === null) return 'n/a';
  if (typeof value === 'boolean') return value ? 'Y' : 'N';
  return String(value);
}

export function renderResult(result: ComparisonResult): string {
  if (isIdentical(result)) {
    return `\n✅ No differences found between ${result.primary} and ${result.secondary}.`;
  }

  const table = new Table({
    head: ['Category', 'Table', 'Column', `DB1 (${result.primary})`, `DB2 (${result.secondary})`],
    wordWrap: true,
  });

  for (const entry of result.diffColumns) {
    table.push([
      'DIFF',
      entry.table,
      entry.column,
      entry.mismatches.map(m => `${m.attribute}=${formatValue(m.primary)}`).join('\n'),
      entry.mismatches.map(m => `${m.attribute}=${formatValue(m.secondary)}`).join('\n'),
    ]);
  }
  for (const entry of result.onlyInPrimary) {
    table.push(['ONLY IN DB1', entry.table, entry.column, formatColumnType(entry.attributes), '-']);
  }
  for (const entry of result.onlyInSecondary) {
    table.push(['ONLY IN DB2', entry.table, entry.column, '-', formatColumnType(entry.attributes)]);
  }

  const { diffColumns, onlyInPrimary, onlyInSecondary } = result.summary;
  return `\n❌ Found ${diffColumns} differing column(s), ${onlyInPrimary} only in DB1, ${onlyInSecondary} only in DB2:\n\n${table.toString()}`;
}

function handleError(error: unknown): never {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid snapshot file');
  } else if (error instanceof ConfigError) {
    logger.error({ errors: error.issues }, error.message);
  } else if (error instanceof StructuralError) {
    logger.error(
      { table: error.table, column: error.column, invariant: error.invariant },
      `Malformed snapshot: ${error.message}`
    );
  } else if (error instanceof ConnectionError) {
    logger.fatal({ label: error.label, attempts: error.attempts, err: error.cause }, error.message);
  } else {
    logger.error({ err: error }, 'Error during execution');
  }
  process.exit(1);
}

const dbOption = () => new Option('--db <db>', 'Which configured database to use').choices(['db1', 'db2']);

export async function runCli(argv: string[] = process.argv) {
  const program = new Command();

  program
    .name('ddl-compare')
    .description('Compare table and column metadata between two database schemas')
    .version('1.0.0');

  program
    .command('compare')
    .description('Connect to both databases, compare their column metadata and write a report')
    .requiredOption('-c, --config <path>', 'Path to the JSON configuration file')
    .option('-o, --output <path>', 'Report path (.xlsx, .csv or .json); overrides resultPath')
    .addOption(new Option('--primary <db>', 'Which database is the reference').choices(['db1', 'db2']))
    .action(async (options: { config: string; output?: string; primary?: DbKey }) => {
      try {
        const config = await loadConfig(options.config);
        if (options.primary) config.primaryDb = options.primary;
        if (options.output) config.resultPath = resolveResultPath(options.output);

        const outcome = await new Orchestrator(config).run();
        if (outcome.status === 'skipped') {
          console.log(`\n⚠️  Comparison skipped: no column metadata from ${outcome.emptySides.join(' and ')} database.`);
          return;
        }

        console.log(renderResult(outcome.result));
        await SchemaExporter.export(outcome.result, outcome.outputPath);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('snapshot')
    .description('Capture the column metadata of one configured database to a JSON file')
    .requiredOption('-c, --config <path>', 'Path to the JSON configuration file')
    .addOption(dbOption().makeOptionMandatory())
    .requiredOption('-o, --output <path>', 'Snapshot file to write')
    .action(async (options: { config: string; db: DbKey; output: string }) => {
      try {
        const config = await loadConfig(options.config);
        const snapshot = await new Orchestrator(config).captureSnapshot(config[options.db]);
        await fs.outputJson(options.output, serializeSnapshot(snapshot), { spaces: 2 });
        logger.info(`Snapshot of ${snapshot.label} written to ${options.output} (${snapshot.tables.size} tables)`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('diff')
    .description('Compare two previously captured snapshot files')
    .argument('<primary>', 'Snapshot file of the reference database')
    .argument('<secondary>', 'Snapshot file of the target database')
    .option('-o, --output <path>', 'Report path (.xlsx, .csv or .json)')
    .action(async (primaryPath: string, secondaryPath: string, options: { output?: string }) => {
      try {
        const primary = parseSnapshot(await fs.readJson(primaryPath));
        const secondary = parseSnapshot(await fs.readJson(secondaryPath));
        const result = compareSnapshots(primary, secondary);

        console.log(renderResult(result));
        if (options.output) {
          await SchemaExporter.export(result, resolveResultPath(options.output));
        }
      } catch (error) {
        handleError(error);
      }
    });

  await program.parseAsync(argv);
}

/** True when `argv1` resolves to this module, including through the npm `bin` symlink. */
export function isEntryPoint(argv1: string | undefined, moduleUrl: string): boolean {
  if (!argv1) return false;
  try {
    return fs.realpathSync(argv1) === fs.realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  runCli().catch(handleError);
}
