/**
 * Environment Variable Parsing
 *
 * Centralized, typed access to the process environment. Values are parsed
 * once and cached; tests can reset the cache with resetEnvCache().
 */

// Load dotenv early to ensure environment variables are available before parsing
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

function parseOptionalEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): Env['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  LOG_LEVEL?: string;

  // Database Configuration
  MONGODB_URI?: string;
  DB_HOST: string;
  DB_PORT: number;
  DB_NAME?: string;
  DB_USER?: string;
  DB_PASSWORD?: string;
  DB_CONNECT_TIMEOUT_MS: number;
  DB_SOCKET_TIMEOUT_MS: number;

  // Outbound HTTP Configuration
  HTTP_TIMEOUT_MS: number;
  HTTP_MAX_CONNECTIONS: number;
  HTTP_MAX_KEEPALIVE: number;
  HTTP_RETRIES: number;
  HTTP_HEALTH_CHECK_URL?: string;

  // Object Storage Configuration
  STORAGE_BUCKET?: string;
  STORAGE_REGION: string;
  STORAGE_ENDPOINT?: string;
  STORAGE_ACCESS_KEY_ID?: string;
  STORAGE_SECRET_ACCESS_KEY?: string;
  STORAGE_FORCE_PATH_STYLE: boolean;

  // Agent service
  AGENT_BASE_URL: string;
}

let cachedEnv: Env | null = null;

/**
 * Parse environment variables from a source (defaults to process.env)
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    NODE_ENV: parseNodeEnv(source.NODE_ENV),
    PORT: parseNumericEnv(source.PORT, 8000),
    LOG_LEVEL: parseOptionalEnv(source.LOG_LEVEL),

    MONGODB_URI: parseOptionalEnv(source.MONGODB_URI),
    DB_HOST: parseOptionalEnv(source.DB_HOST) ?? 'localhost',
    DB_PORT: parseNumericEnv(source.DB_PORT, 27017),
    DB_NAME: parseOptionalEnv(source.DB_NAME),
    DB_USER: parseOptionalEnv(source.DB_USER),
    DB_PASSWORD: parseOptionalEnv(source.DB_PASSWORD),
    DB_CONNECT_TIMEOUT_MS: parseNumericEnv(source.DB_CONNECT_TIMEOUT_MS, 120000),
    DB_SOCKET_TIMEOUT_MS: parseNumericEnv(source.DB_SOCKET_TIMEOUT_MS, 120000),

    HTTP_TIMEOUT_MS: parseNumericEnv(source.HTTP_TIMEOUT_MS, 240000),
    HTTP_MAX_CONNECTIONS: parseNumericEnv(source.HTTP_MAX_CONNECTIONS, 100),
    HTTP_MAX_KEEPALIVE: parseNumericEnv(source.HTTP_MAX_KEEPALIVE, 20),
    HTTP_RETRIES: parseNumericEnv(source.HTTP_RETRIES, 3),
    HTTP_HEALTH_CHECK_URL: parseOptionalEnv(source.HTTP_HEALTH_CHECK_URL),

    STORAGE_BUCKET: parseOptionalEnv(source.STORAGE_BUCKET),
    STORAGE_REGION: parseOptionalEnv(source.STORAGE_REGION) ?? 'us-east-1',
    STORAGE_ENDPOINT: parseOptionalEnv(source.STORAGE_ENDPOINT),
    STORAGE_ACCESS_KEY_ID: parseOptionalEnv(source.STORAGE_ACCESS_KEY_ID),
    STORAGE_SECRET_ACCESS_KEY: parseOptionalEnv(source.STORAGE_SECRET_ACCESS_KEY),
    STORAGE_FORCE_PATH_STYLE: parseBooleanEnv(source.STORAGE_FORCE_PATH_STYLE, false),

    AGENT_BASE_URL: parseOptionalEnv(source.AGENT_BASE_URL) ?? 'http://localhost:3002',
  };
}

/**
 * Get validated environment (cached after first call)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
}

/**
 * Reset cached environment (for tests)
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}
