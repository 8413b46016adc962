import { QueryOutcome, Queryable, Row, SpatialDatabase } from '../types';

interface Table {
  columns: string[];
  rows: Row[];
}

const unquote = (identifier: string): string => identifier.trim().replace(/^"(.*)"$/, '$1').replace(/""/g, '"');

const INSERT_SELECT = /^INSERT INTO "([^"]+)"\."([^"]+)" \((.*)\) SELECT (.*) FROM "([^"]+)"\."([^"]+)"$/s;
const TRUNCATE = /^TRUNCATE TABLE "([^"]+)"\."([^"]+)"$/;
const COUNT_SELECTION = /^SELECT count\(\*\)::int AS matched FROM \(SELECT \* FROM "([^"]+)"\."([^"]+)"(.*)\) AS selection$/s;

/**
 * Stand-in for PostgreSQL that understands exactly the statements the
 * gateway issues: catalog lookups, the staging merge, TRUNCATE and the
 * export count. Anything else is rejected.
 */
export class InMemorySpatialDatabase implements SpatialDatabase {
  readonly statements: string[] = [];
  reportRowCount = true;
  failOn?: RegExp;

  private tables = new Map<string, Table>();
  private nextId = 1;

  defineTable(name: string, columns: string[], rows: Row[] = []): void {
    this.tables.set(name, { columns: [...columns], rows: rows.map((row) => ({ ...row })) });
  }

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  columns(name: string): string[] {
    return [...this.table(name).columns];
  }

  rows(name: string): Row[] {
    return this.table(name).rows.map((row) => ({ ...row }));
  }

  async query(text: string, params: unknown[] = []): Promise<QueryOutcome> {
    const sql = text.trim();
    this.statements.push(sql);

    if (this.failOn?.test(sql)) {
      throw new Error(`Simulated database failure on: ${sql}`);
    }

    if (sql.includes('information_schema.columns')) {
      const [schema, table] = params;
      const found = this.tables.get(`${String(schema)}.${String(table)}`);
      const rows = (found?.columns ?? []).map((column) => ({ column_name: column }));
      return { rows, rowCount: rows.length };
    }

    if (sql === 'SELECT 1 AS check') {
      return { rows: [{ check: 1 }], rowCount: 1 };
    }

    const insert = INSERT_SELECT.exec(sql);
    if (insert) {
      return this.insertSelect(insert);
    }

    const truncate = TRUNCATE.exec(sql);
    if (truncate) {
      this.table(`${truncate[1]}.${truncate[2]}`).rows = [];
      return { rows: [], rowCount: this.reportRowCount ? 0 : null };
    }

    const count = COUNT_SELECTION.exec(sql);
    if (count) {
      const rows = this.table(`${count[1]}.${count[2]}`).rows;
      const matched = rows.filter((row) => this.matches(row, count[3], params)).length;
      return { rows: [{ matched }], rowCount: 1 };
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const snapshot = new Map<string, Table>();
    for (const [name, table] of this.tables) {
      snapshot.set(name, { columns: [...table.columns], rows: table.rows.map((row) => ({ ...row })) });
    }

    try {
      return await callback(this);
    } catch (error) {
      this.tables = snapshot;
      throw error;
    }
  }

  private table(name: string): Table {
    const table = this.tables.get(name);
    if (!table) {
      throw new Error(`relation "${name}" does not exist`);
    }
    return table;
  }

  private insertSelect(match: RegExpExecArray): QueryOutcome {
    const target = this.table(`${match[1]}.${match[2]}`);
    const staging = this.table(`${match[5]}.${match[6]}`);

    const insertColumns = match[3].split(', ').map(unquote);
    const sources = match[4].split(', ').map((expression) => {
      const [source] = expression.split(' AS ');
      return source === 'NULL' ? null : unquote(source);
    });

    for (const column of insertColumns) {
      if (!target.columns.includes(column)) {
        throw new Error(`column "${column}" of relation "${match[2]}" does not exist`);
      }
    }

    for (const stagingRow of staging.rows) {
      const row: Row = {};
      if (target.columns.includes('id')) {
        row.id = this.nextId++;
      }
      insertColumns.forEach((column, index) => {
        const source = sources[index];
        row[column] = source === null ? null : stagingRow[source] ?? null;
      });
      target.rows.push(row);
    }

    return { rows: [], rowCount: this.reportRowCount ? staging.rows.length : null };
  }

  private matches(row: Row, where: string, params: unknown[]): boolean {
    if (where.includes('= ANY($1::bigint[])')) {
      const [ids] = params;
      return Array.isArray(ids) && ids.includes(row.id);
    }
    if (where.includes('= $1')) {
      return row.id === params[0];
    }
    return true;
  }
}
