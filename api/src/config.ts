import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export function loadConfig(env: Env) {
  const targetTable = env.TARGET_TABLE || 'public.tapak_proyek';
  const environment = env.NODE_ENV || 'development';

  return {
    // Service Configuration
    service: {
      name: 'shapefile-gateway',
      version: env.SERVICE_VERSION || '1.0.0',
      environment,
      port: int(env.PORT, 8000),
    },

    // PostgreSQL/PostGIS Configuration
    postgres: {
      connectionString: env.DATABASE_DSN || '',
      max: int(env.POSTGRES_MAX_CONNECTIONS, 10),
      idleTimeoutMillis: int(env.POSTGRES_IDLE_TIMEOUT, 30000),
      connectionTimeoutMillis: int(env.POSTGRES_CONNECTION_TIMEOUT, 5000),
    },

    // Relations taking part in the staging -> target merge
    relations: {
      target: targetTable,
      staging: env.STAGING_TABLE || 'public.staging_tapak_upload',
      idColumn: env.ID_COLUMN || 'id',
      geometryColumn: env.GEOMETRY_COLUMN || 'geom',
    },

    // File Upload Configuration
    upload: {
      maxFileSize: int(env.MAX_UPLOAD_BYTES, 50 * 1024 * 1024), // 50MB default
      tempDir: env.TEMP_DIR || path.join(os.tmpdir(), 'shapefile-gateway'),
    },

    // ogr2ogr invocation
    conversion: {
      binary: env.OGR2OGR_PATH || 'ogr2ogr',
      timeoutMs: int(env.OGR2OGR_TIMEOUT_MS, 300000),
      srid: int(env.TARGET_SRID, 4326),
      encoding: 'UTF-8',
    },

    export: {
      layerName: env.EXPORT_LAYER_NAME || 'export_tapak',
      filePrefix: env.EXPORT_FILE_PREFIX || targetTable.split('.').pop() || 'export',
    },

    // CORS Configuration
    cors: {
      origins: env.CORS_ORIGINS?.split(',') || ['*'],
      credentials: false,
    },

    // Rate Limiting
    rateLimit: {
      windowMs: int(env.RATE_LIMIT_WINDOW_MS, 60000), // 1 minute
      max: int(env.RATE_LIMIT_MAX_REQUESTS, 100),
    },

    // Logging
    logging: {
      level: env.LOG_LEVEL || 'info',
      pretty: environment === 'development',
    },

    // Security
    security: {
      apiKey: env.API_KEY || undefined,
      apiKeyHeader: 'x-api-key',
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig(process.env);

const requiredEnvVars: string[] = ['DATABASE_DSN'];

/**
 * Fail start-up when a required variable is absent.
 */
export function assertRequiredConfig(env: Env = process.env): void {
  const missing = requiredEnvVars.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variable(s): ${missing.join(', ')}`);
  }
}
