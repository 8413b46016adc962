import { quoteIdentifier, quoteRelation } from '../../database/sql';
import { BadInputError, ExportSelector, ParameterizedQuery } from '../../types';
import { parseRelationName } from '../reconciliation/schema-introspector';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const toInteger = (token: string): number | null => {
  if (!INTEGER_PATTERN.test(token)) {
    return null;
  }
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
};

export function parseFeatureId(raw: string): number {
  const id = toInteger(raw.trim());
  if (id === null) {
    throw new BadInputError('Invalid id format', 'INVALID_ID_FORMAT', { id: raw });
  }
  return id;
}

/**
 * Parse `?ids=1,2,5`. Empty tokens are skipped; the result is de-duplicated
 * and sorted ascending.
 */
export function parseIdList(raw: unknown): number[] {
  if (raw === undefined) {
    throw new BadInputError('Query parameter "ids" is required', 'MISSING_IDS');
  }
  if (typeof raw !== 'string') {
    throw new BadInputError('Invalid ids format', 'INVALID_ID_FORMAT');
  }

  const ids = new Set<number>();
  for (const token of raw.split(',')) {
    const trimmed = token.trim();
    if (trimmed === '') {
      continue;
    }
    const id = toInteger(trimmed);
    if (id === null) {
      throw new BadInputError('Invalid ids format', 'INVALID_ID_FORMAT', { token: trimmed });
    }
    ids.add(id);
  }

  if (ids.size === 0) {
    throw new BadInputError('Id list is empty', 'EMPTY_ID_LIST');
  }

  return [...ids].sort((a, b) => a - b);
}

export interface SelectionTarget {
  relation: string;
  idColumn: string;
}

export function buildSelectionQuery(selector: ExportSelector, target: SelectionTarget): ParameterizedQuery {
  const base = `SELECT * FROM ${quoteRelation(parseRelationName(target.relation))}`;
  const idColumn = quoteIdentifier(target.idColumn);

  switch (selector.kind) {
    case 'all':
      return { text: base, values: [] };
    case 'id':
      return { text: `${base} WHERE ${idColumn} = $1`, values: [selector.id] };
    case 'ids':
      return { text: `${base} WHERE ${idColumn} = ANY($1::bigint[])`, values: [selector.ids] };
  }
}

export function buildCountQuery(selection: ParameterizedQuery): ParameterizedQuery {
  return {
    text: `SELECT count(*)::int AS matched FROM (${selection.text}) AS selection`,
    values: selection.values,
  };
}

export function archiveNameFor(selector: ExportSelector, prefix: string): string {
  switch (selector.kind) {
    case 'all':
      return `${prefix}_all.zip`;
    case 'id':
      return `${prefix}_id_${selector.id}.zip`;
    case 'ids':
      return `${prefix}_ids_${[...selector.ids].sort((a, b) => a - b).join(',')}.zip`;
  }
}
