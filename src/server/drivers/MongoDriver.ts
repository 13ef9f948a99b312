import {
  MongoClient,
  type Db,
  type Document,
  type Filter,
  type MongoClientOptions,
  type Sort,
} from 'mongodb';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../types/errors.js';
import type { MongoOptions } from '../config/resourceConfig.js';
import type { ResourceDriver } from './ResourceDriver.js';

/**
 * Runs an aggregation pipeline against a named collection.
 * The query engine depends on this seam only, so it can run against a fake.
 */
export interface AggregationExecutor {
  aggregate<T extends Document>(collection: string, pipeline: Document[]): Promise<T[]>;
}

export interface FindOptions {
  sort?: Sort;
  limit?: number;
  skip?: number;
  projection?: Document;
}

/**
 * Plain collection reads used by the catalog listings
 */
export interface DocumentReader {
  find<T extends Document>(collection: string, filter?: Filter<Document>, options?: FindOptions): Promise<T[]>;
  findOne<T extends Document>(collection: string, filter: Filter<Document>, projection?: Document): Promise<T | null>;
}

/**
 * Hide credentials before a connection string is logged
 */
export function redactMongoUri(uri: string): string {
  return uri.replace(/:[^:@/]+@/, ':****@');
}

/**
 * Build the connection string. An explicit connection string always wins over
 * the discrete host/port/username/password options.
 */
export function buildMongoUri(options: MongoOptions): string {
  if (options.connectionString) {
    return options.connectionString;
  }

  const { host, port, username, password } = options;
  if (username && password) {
    const credentials = `${encodeURIComponent(username)}:${encodeURIComponent(password)}`;
    // Atlas clusters resolve through SRV records and take no port
    if (host.includes('mongodb.net')) {
      return `mongodb+srv://${credentials}@${host}`;
    }
    return `mongodb://${credentials}@${host}:${port}`;
  }
  return `mongodb://${host}:${port}`;
}

function isAtlasUri(uri: string): boolean {
  return uri.includes('mongodb.net') || uri.startsWith('mongodb+srv://');
}

/**
 * Live MongoDB connection handed out by the resource container
 */
export class MongoConnection implements AggregationExecutor, DocumentReader {
  constructor(
    readonly client: MongoClient,
    readonly databaseName?: string
  ) {}

  /**
   * Database handle; falls back to the configured default, then to the one in the connection string
   */
  db(databaseName?: string): Db {
    return this.client.db(databaseName ?? this.databaseName);
  }

  async aggregate<T extends Document>(collection: string, pipeline: Document[]): Promise<T[]> {
    const startTime = Date.now();
    const data = await this.db().collection(collection).aggregate<T>(pipeline).toArray();
    logger.debug(
      { collection, stages: pipeline.length, count: data.length, duration: Date.now() - startTime },
      'Aggregation pipeline executed'
    );
    return data;
  }

  async find<T extends Document>(
    collection: string,
    filter: Filter<Document> = {},
    options: FindOptions = {}
  ): Promise<T[]> {
    let cursor = this.db().collection(collection).find<T>(filter, { projection: options.projection });
    if (options.sort) {
      cursor = cursor.sort(options.sort);
    }
    if (options.skip) {
      cursor = cursor.skip(options.skip);
    }
    if (options.limit) {
      cursor = cursor.limit(options.limit);
    }
    return cursor.toArray();
  }

  async findOne<T extends Document>(
    collection: string,
    filter: Filter<Document>,
    projection?: Document
  ): Promise<T | null> {
    return this.db().collection(collection).findOne<T>(filter, { projection });
  }

  async ping(): Promise<void> {
    await this.client.db('admin').command({ ping: 1 });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export function buildMongoClientOptions(options: MongoOptions, uri: string): MongoClientOptions {
  const clientOptions: MongoClientOptions = {
    connectTimeoutMS: options.connectTimeoutMs,
    socketTimeoutMS: options.socketTimeoutMs,
  };
  // Stable API versions are only for MongoDB Atlas, not local MongoDB
  if (isAtlasUri(uri)) {
    clientOptions.serverApi = {
      version: options.serverApi,
      strict: false,
      deprecationErrors: true,
    };
  }
  return clientOptions;
}

export class MongoDriver implements ResourceDriver<MongoConnection, MongoOptions> {
  async initialize(config: MongoOptions): Promise<MongoConnection> {
    if (!config.connectionString && !config.database) {
      throw new ConfigurationError('MongoDB requires either a database name or a connection string', {
        resource: 'mongo',
      });
    }

    const uri = buildMongoUri(config);
    const clientOptions = buildMongoClientOptions(config, uri);

    logger.info({ uri: redactMongoUri(uri), database: config.database }, 'Connecting to MongoDB...');
    const client = new MongoClient(uri, clientOptions);
    const connection = new MongoConnection(client, config.database);

    try {
      await client.connect();
      await connection.ping();
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        logger.debug({ error: closeError }, 'Failed to close MongoDB client after connection failure');
      });
      throw error;
    }

    logger.info({ database: config.database }, 'MongoDB connection verified');
    return connection;
  }

  async cleanup(instance: MongoConnection): Promise<void> {
    await instance.close();
    logger.info('MongoDB connection closed');
  }

  async healthCheck(instance: MongoConnection): Promise<boolean> {
    try {
      await instance.ping();
      return true;
    } catch (error) {
      logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'MongoDB health check failed');
      return false;
    }
  }

  isInstance(candidate: unknown): candidate is MongoConnection {
    return candidate instanceof MongoConnection;
  }
}
