import { InvalidRelationError, Queryable, QualifiedRelation } from '../../types';

/**
 * Split a schema-qualified relation name ("public.parcels").
 */
export function parseRelationName(fullName: string): QualifiedRelation {
  const dot = fullName.indexOf('.');
  const schema = dot === -1 ? '' : fullName.slice(0, dot);
  const table = dot === -1 ? '' : fullName.slice(dot + 1);

  if (!schema || !table) {
    throw new InvalidRelationError(`Relation name must be schema-qualified: "${fullName}"`, {
      relation: fullName,
    });
  }

  return { schema, table };
}

/**
 * Ordered column names of a relation. A relation that does not exist yields
 * an empty list.
 */
export async function columnsOf(db: Queryable, fullName: string): Promise<string[]> {
  const { schema, table } = parseRelationName(fullName);

  const result = await db.query(`
    SELECT column_name
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position
  `, [schema, table]);

  return result.rows.map((row) => String(row.column_name));
}
