// Relation & column-mapping types

export interface QualifiedRelation {
  schema: string;
  table: string;
}

export interface ColumnMappingEntry {
  targetColumn: string;
  /** Original-cased staging column, or null when the value is filled with NULL */
  sourceColumn: string | null;
}

export type Row = Record<string, unknown>;

export interface QueryOutcome {
  rows: Row[];
  rowCount: number | null;
}

/**
 * Minimal statement executor. Implemented by the pg-backed DatabaseManager and
 * by transaction-scoped clients.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryOutcome>;
}

export interface SpatialDatabase extends Queryable {
  transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
}

export interface ParameterizedQuery {
  text: string;
  values: unknown[];
}

// Export selection

export type ExportSelector =
  | { kind: 'all' }
  | { kind: 'id'; id: number }
  | { kind: 'ids'; ids: number[] };

export interface ExportArtifact {
  archivePath: string;
  fileName: string;
  /** Removes the export workspace; runs at most once. */
  release(): Promise<void>;
}

// Ingestion

export interface UploadedArchive {
  originalName: string;
  buffer: Buffer;
}

export interface IngestionResult {
  status: 'ok';
  inserted_rows: number;
}

// Error types
export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class BadInputError extends GatewayError {
  constructor(message: string, code: string = 'BAD_INPUT', context?: Record<string, unknown>) {
    super(message, code, 400, context);
    this.name = 'BadInputError';
  }
}

export class PayloadTooLargeError extends BadInputError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PAYLOAD_TOO_LARGE', context);
    this.statusCode = 413;
    this.name = 'PayloadTooLargeError';
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message: string = 'Invalid or missing API key') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, context);
    this.name = 'NotFoundError';
  }
}

export class ConversionError extends GatewayError {
  constructor(message: string, public stderr: string = '', context?: Record<string, unknown>) {
    super(message, 'CONVERSION_ERROR', 500, { ...context, stderr });
    this.name = 'ConversionError';
  }
}

export class InvalidRelationError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_RELATION', 500, context);
    this.name = 'InvalidRelationError';
  }
}

export class NothingToInsertError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOTHING_TO_INSERT', 500, context);
    this.name = 'NothingToInsertError';
  }
}

export class ExportFailedError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXPORT_FAILED', 500, context);
    this.name = 'ExportFailedError';
  }
}
