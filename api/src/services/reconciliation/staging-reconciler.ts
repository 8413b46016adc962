import { quoteIdentifier, quoteRelation } from '../../database/sql';
import { createLogger } from '../../utils/logger';
import {
  ColumnMappingEntry,
  InvalidRelationError,
  NothingToInsertError,
  Queryable,
} from '../../types';
import { columnsOf, parseRelationName } from './schema-introspector';

const logger = createLogger('reconciler');

/**
 * Pair every target column (except the identifier) with the staging column of
 * the same name, compared case-insensitively. Unmatched target columns are
 * filled with NULL; staging-only columns are dropped.
 *
 * Staging columns that differ only by case collapse onto the last one listed.
 */
export function buildColumnMapping(
  targetColumns: string[],
  stagingColumns: string[],
  idColumn: string
): ColumnMappingEntry[] {
  const stagingByLowerName = new Map<string, string>();
  for (const column of stagingColumns) {
    stagingByLowerName.set(column.toLowerCase(), column);
  }

  return targetColumns
    .filter((column) => column !== idColumn)
    .map((column) => ({
      targetColumn: column,
      sourceColumn: stagingByLowerName.get(column.toLowerCase()) ?? null,
    }));
}

export function buildMergeStatement(
  targetRelation: string,
  stagingRelation: string,
  mapping: ColumnMappingEntry[]
): string {
  const insertColumns = mapping.map((entry) => quoteIdentifier(entry.targetColumn));
  const selectExpressions = mapping.map((entry) => {
    const source = entry.sourceColumn === null ? 'NULL' : quoteIdentifier(entry.sourceColumn);
    return `${source} AS ${quoteIdentifier(entry.targetColumn)}`;
  });

  return `INSERT INTO ${quoteRelation(parseRelationName(targetRelation))} (${insertColumns.join(', ')}) ` +
    `SELECT ${selectExpressions.join(', ')} FROM ${quoteRelation(parseRelationName(stagingRelation))}`;
}

export interface ReconcileOptions {
  idColumn: string;
}

/**
 * Append every staging row to the target relation with one set-based
 * INSERT ... SELECT. Returns the number of rows the engine reports inserted.
 */
export async function reconcile(
  db: Queryable,
  targetRelation: string,
  stagingRelation: string,
  options: ReconcileOptions
): Promise<number> {
  const targetColumns = await columnsOf(db, targetRelation);
  if (targetColumns.length === 0) {
    throw new InvalidRelationError(`Target relation ${targetRelation} does not exist or has no columns`, {
      relation: targetRelation,
    });
  }

  const stagingColumns = await columnsOf(db, stagingRelation);
  if (stagingColumns.length === 0) {
    throw new InvalidRelationError(`Staging relation ${stagingRelation} does not exist or has no columns`, {
      relation: stagingRelation,
    });
  }

  const mapping = buildColumnMapping(targetColumns, stagingColumns, options.idColumn);
  if (mapping.length === 0) {
    throw new NothingToInsertError(`Target relation ${targetRelation} has no columns besides ${options.idColumn}`, {
      relation: targetRelation,
    });
  }

  logger.debug({
    mapped: mapping.filter((entry) => entry.sourceColumn !== null).map((entry) => entry.targetColumn),
    nullFilled: mapping.filter((entry) => entry.sourceColumn === null).map((entry) => entry.targetColumn),
  }, 'Column mapping built');

  const result = await db.query(buildMergeStatement(targetRelation, stagingRelation, mapping));

  // Informational only: an unreadable count is reported as 0.
  if (result.rowCount === null) {
    logger.warn({ targetRelation }, 'Driver reported no affected-row count, reporting 0 inserted rows');
    return 0;
  }

  return result.rowCount;
}

export async function truncateStaging(db: Queryable, stagingRelation: string): Promise<void> {
  await db.query(`TRUNCATE TABLE ${quoteRelation(parseRelationName(stagingRelation))}`);
}
