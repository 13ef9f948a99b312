/**
 * Resource Configuration
 *
 * Immutable option objects for every registered resource. Built once at
 * startup (from the environment or explicit overrides) and shared read-only.
 */

import type { Env } from './env.js';

export interface MongoOptions {
  readonly host: string;
  readonly port: number;
  /** Default database; required unless connectionString is given */
  readonly database?: string;
  readonly username?: string;
  readonly password?: string;
  /** Full connection string; takes precedence over host/port/username/password */
  readonly connectionString?: string;
  readonly serverApi: '1';
  readonly connectTimeoutMs: number;
  readonly socketTimeoutMs: number;
}

export interface HttpClientOptions {
  readonly timeoutMs: number;
  readonly maxKeepAlive: number;
  readonly maxConnections: number;
  readonly keepAliveMs: number;
  /** Retries for connection-level failures (no response received) */
  readonly retries: number;
  readonly baseURL?: string;
  readonly healthCheckUrl?: string;
}

export interface ObjectStorageOptions {
  readonly bucket?: string;
  readonly region: string;
  readonly endpoint?: string;
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly forcePathStyle: boolean;
}

export interface ResourceConfig {
  readonly mongo: MongoOptions;
  readonly http: HttpClientOptions;
  readonly storage: ObjectStorageOptions;
}

export interface ResourceConfigOverrides {
  mongo?: Partial<MongoOptions>;
  http?: Partial<HttpClientOptions>;
  storage?: Partial<ObjectStorageOptions>;
}

export const DEFAULT_MONGO_OPTIONS: MongoOptions = Object.freeze({
  host: 'localhost',
  port: 27017,
  serverApi: '1',
  connectTimeoutMs: 120000,
  socketTimeoutMs: 120000,
});

export const DEFAULT_HTTP_CLIENT_OPTIONS: HttpClientOptions = Object.freeze({
  timeoutMs: 240000,
  maxKeepAlive: 20,
  maxConnections: 100,
  keepAliveMs: 5000,
  retries: 3,
});

export const DEFAULT_OBJECT_STORAGE_OPTIONS: ObjectStorageOptions = Object.freeze({
  region: 'us-east-1',
  forcePathStyle: false,
});

/**
 * Merge overrides onto the defaults and freeze the result.
 */
export function createResourceConfig(overrides: ResourceConfigOverrides = {}): ResourceConfig {
  return Object.freeze({
    mongo: Object.freeze({ ...DEFAULT_MONGO_OPTIONS, ...overrides.mongo }),
    http: Object.freeze({ ...DEFAULT_HTTP_CLIENT_OPTIONS, ...overrides.http }),
    storage: Object.freeze({ ...DEFAULT_OBJECT_STORAGE_OPTIONS, ...overrides.storage }),
  });
}

/**
 * Map the parsed environment onto resource options
 */
export function resourceConfigFromEnv(env: Env): ResourceConfig {
  return createResourceConfig({
    mongo: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      username: env.DB_USER,
      password: env.DB_PASSWORD,
      connectionString: env.MONGODB_URI,
      connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
      socketTimeoutMs: env.DB_SOCKET_TIMEOUT_MS,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
      maxConnections: env.HTTP_MAX_CONNECTIONS,
      maxKeepAlive: env.HTTP_MAX_KEEPALIVE,
      retries: env.HTTP_RETRIES,
      healthCheckUrl: env.HTTP_HEALTH_CHECK_URL,
    },
    storage: {
      bucket: env.STORAGE_BUCKET,
      region: env.STORAGE_REGION,
      endpoint: env.STORAGE_ENDPOINT,
      accessKeyId: env.STORAGE_ACCESS_KEY_ID,
      secretAccessKey: env.STORAGE_SECRET_ACCESS_KEY,
      forcePathStyle: env.STORAGE_FORCE_PATH_STYLE,
    },
  });
}
