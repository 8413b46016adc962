import { escapeIdentifier, escapeLiteral } from 'pg';
import { ParameterizedQuery, QualifiedRelation } from '../types';

export const quoteIdentifier = (name: string): string => escapeIdentifier(name);

export const quoteRelation = (relation: QualifiedRelation): string =>
  `${escapeIdentifier(relation.schema)}.${escapeIdentifier(relation.table)}`;

const renderInteger = (value: number): string => {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`Cannot render non-integer parameter: ${value}`);
  }
  return String(value);
};

const renderLiteral = (value: unknown): string => {
  if (typeof value === 'number') {
    return escapeLiteral(renderInteger(value));
  }
  if (typeof value === 'string') {
    return escapeLiteral(value);
  }
  if (Array.isArray(value)) {
    const items = value.map((item) => {
      if (typeof item !== 'number') {
        throw new TypeError('Only integer arrays can be rendered');
      }
      return renderInteger(item);
    });
    return escapeLiteral(`{${items.join(',')}}`);
  }
  throw new TypeError(`Unsupported parameter type: ${typeof value}`);
};

/**
 * Substitutes `$n` placeholders with escaped literals, for consumers that
 * cannot take bind parameters (ogr2ogr's -sql).
 */
export function inlineParameters(query: ParameterizedQuery): string {
  return query.text.replace(/\$(\d+)/g, (_match, position: string) => {
    const index = parseInt(position, 10) - 1;
    if (index < 0 || index >= query.values.length) {
      throw new RangeError(`No value bound for placeholder $${position}`);
    }
    return renderLiteral(query.values[index]);
  });
}
