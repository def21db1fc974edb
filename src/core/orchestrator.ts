import { CompareConfig, resolveTargets } from '../config/config.js';
import { defaultEngines, EngineProvider } from '../engines/factory.js';
import { ComparisonResult } from '../types/comparison.js';
import { ConnectionConfig, MetadataSnapshot } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { SchemaComparator } from './comparator.js';

export type SnapshotSide = 'primary' | 'secondary';

export type RunOutcome =
  | { status: 'completed'; result: ComparisonResult; outputPath: string }
  | { status: 'skipped'; emptySides: SnapshotSide[]; outputPath: string };

function columnCount(snapshot: MetadataSnapshot): number {
  let count = 0;
  for (const table of snapshot.tables.values()) count += table.columns.length;
  return count;
}

export class Orchestrator {
  private comparator = new SchemaComparator();

  constructor(
    private config: CompareConfig,
    private engines: EngineProvider = defaultEngines
  ) {}

  async captureSnapshot(target: ConnectionConfig): Promise<MetadataSnapshot> {
    const connection = this.engines.createConnection(target);
    try {
      const inspector = this.engines.createInspector(connection, target);
      return await inspector.captureSnapshot();
    } finally {
      await connection.close();
    }
  }

  async run(): Promise<RunOutcome> {
    const { primary, secondary } = resolveTargets(this.config);
    const outputPath = this.config.resultPath;

    logger.info(`Comparing PRIMARY ${primary.label} against SECONDARY ${secondary.label}...`);

    try {
      const primarySnapshot = await this.captureSnapshot(primary);
      const secondarySnapshot = await this.captureSnapshot(secondary);

      const emptySides: SnapshotSide[] = [];
      if (columnCount(primarySnapshot) === 0) {
        logger.warn(`No column metadata returned from PRIMARY (${primary.label}). Aborting comparison.`);
        emptySides.push('primary');
      }
      if (columnCount(secondarySnapshot) === 0) {
        logger.warn(`No column metadata returned from SECONDARY (${secondary.label}). Aborting comparison.`);
        emptySides.push('secondary');
      }
      if (emptySides.length > 0) {
        return { status: 'skipped', emptySides, outputPath };
      }

      const result = this.comparator.compare(primarySnapshot, secondarySnapshot);
      logger.info(result.summary, 'DDL comparison completed successfully.');
      return { status: 'completed', result, outputPath };
    } catch (error) {
      logger.error({ err: error, primary: primary.label, secondary: secondary.label }, 'Schema comparison failed');
      throw error;
    }
  }
}
