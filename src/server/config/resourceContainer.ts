import { logger } from '../utils/logger.js';
import type { ResourceDriver } from '../drivers/ResourceDriver.js';
import { slotKeyFor, type SharedState } from './sharedState.js';
import {
  ConfigurationError,
  ConflictError,
  ResourceClosedError,
  ResourceInitializationError,
  ResourceNotRegisteredError,
} from '../types/errors.js';

export type ResourceState = 'unregistered' | 'registered' | 'initializing' | 'ready' | 'closed';

/**
 * Driver and configuration bound together at registration time
 */
interface ResourceLifecycle<T> {
  initialize(): Promise<T>;
  cleanup(instance: T): Promise<void>;
  healthCheck(instance: T): Promise<boolean>;
  isInstance(candidate: unknown): candidate is T;
}

class ResourceEntry<T> {
  state: ResourceState = 'registered';
  instance: T | undefined = undefined;
  /** In-progress initialization; concurrent callers wait on this instead of initializing again */
  flight: Promise<T> | null = null;

  constructor(
    readonly name: string,
    readonly lifecycle: ResourceLifecycle<T>
  ) {}

  isClosed(): boolean {
    return this.state === 'closed';
  }
}

/**
 * Cleanup result for one resource
 */
export interface CleanupResult {
  name: string;
  success: boolean;
  duration: number;
  error?: string;
}

type ResourceEntries<TResources> = { [K in keyof TResources]?: ResourceEntry<TResources[K]> };

/**
 * Resource Container
 *
 * Owns the lifecycle (lazy initialize, share, health check, cleanup) of every
 * client the service talks to. Instances are created on first use, exactly
 * once per name even under concurrent requests, and published to a shared
 * state store so other containers in the process reuse them.
 *
 * Lookup order for getInstance():
 * 1. shared state slot (lock-free)
 * 2. local cache (lock-free)
 * 3. the name's in-progress initialization, or a new one that re-checks 1 and 2
 */
export class ResourceContainer<TResources extends object> {
  private readonly entries: ResourceEntries<TResources> = {};
  private readonly entryList = new Map<string, ResourceEntry<unknown>>();

  constructor(private readonly sharedState: SharedState) {}

  /**
   * Register a driver with its configuration
   * @param name - Unique resource name
   * @param driver - Lifecycle implementation for the backing service
   * @param config - Immutable options handed to driver.initialize()
   */
  register<K extends keyof TResources & string, TConfig>(
    name: K,
    driver: ResourceDriver<TResources[K], TConfig>,
    config: TConfig
  ): void {
    const existing = this.entries[name];
    if (existing) {
      if (existing.instance !== undefined || existing.flight) {
        throw new ConflictError(`Resource '${name}' is already initialized and cannot be re-registered`, {
          resource: name,
          state: existing.state,
        });
      }
      logger.warn({ name }, 'Resource already registered, overwriting');
    }

    const entry = new ResourceEntry<TResources[K]>(name, {
      initialize: () => driver.initialize(config),
      cleanup: (instance) => driver.cleanup(instance),
      healthCheck: (instance) => driver.healthCheck(instance),
      isInstance: (candidate): candidate is TResources[K] => driver.isInstance(candidate),
    });
    this.entries[name] = entry;
    this.entryList.set(name, entry);
    logger.debug({ name }, 'Resource registered');
  }

  has(name: string): boolean {
    return this.entryList.has(name);
  }

  registeredNames(): string[] {
    return Array.from(this.entryList.keys());
  }

  getState(name: string): ResourceState {
    return this.entryList.get(name)?.state ?? 'unregistered';
  }

  /**
   * Get a ready instance, initializing it on first use
   * @throws ResourceNotRegisteredError for unknown names
   * @throws ConfigurationError when the driver rejects its options
   * @throws ResourceInitializationError when the backing service could not be reached
   */
  async getInstance<K extends keyof TResources & string>(name: K): Promise<TResources[K]> {
    const entry = this.entries[name];
    if (!entry) {
      throw new ResourceNotRegisteredError(name);
    }
    if (entry.isClosed()) {
      throw new ResourceClosedError(name);
    }

    const shared = this.readSharedSlot(entry);
    if (shared !== undefined) {
      return shared;
    }
    if (entry.instance !== undefined) {
      return entry.instance;
    }
    if (entry.flight) {
      return entry.flight;
    }

    const flight = this.initializeEntry(entry).finally(() => {
      entry.flight = null;
    });
    entry.flight = flight;
    return flight;
  }

  private async initializeEntry<T>(entry: ResourceEntry<T>): Promise<T> {
    // Double-check now that this caller owns the initialization
    const shared = this.readSharedSlot(entry);
    if (shared !== undefined) {
      return shared;
    }
    if (entry.instance !== undefined) {
      return entry.instance;
    }

    entry.state = 'initializing';
    const startTime = Date.now();
    logger.info({ name: entry.name }, `Initializing resource ${entry.name}...`);

    let instance: T;
    try {
      instance = await entry.lifecycle.initialize();
    } catch (error) {
      if (!entry.isClosed()) {
        entry.state = 'registered';
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error({ name: entry.name, error: errorMessage }, `❌ ${entry.name} initialization failed`);
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ResourceInitializationError(entry.name, error);
    }

    if (entry.isClosed()) {
      // Container shut down while this instance was being created
      await this.releaseInstance(entry, instance);
      throw new ResourceClosedError(entry.name);
    }

    entry.instance = instance;
    entry.state = 'ready';
    this.sharedState.set(slotKeyFor(entry.name), instance);
    logger.info(
      { name: entry.name, duration: Date.now() - startTime, slot: slotKeyFor(entry.name) },
      `✅ ${entry.name} initialized`
    );
    return instance;
  }

  private readSharedSlot<T>(entry: ResourceEntry<T>): T | undefined {
    const key = slotKeyFor(entry.name);
    const candidate = this.sharedState.get(key);
    if (candidate === undefined || candidate === null) {
      return undefined;
    }
    if (entry.lifecycle.isInstance(candidate)) {
      return candidate;
    }
    logger.warn({ name: entry.name, slot: key }, 'Shared state slot holds an unrecognised value, ignoring it');
    return undefined;
  }

  /**
   * Clean up every locally created instance concurrently.
   * Failures are isolated per resource and reported, never thrown.
   */
  async cleanupAll(): Promise<CleanupResult[]> {
    const entries = Array.from(this.entryList.values());
    logger.info({ count: entries.length }, 'Cleaning up all resources...');

    const owned = entries.filter((entry) => entry.instance !== undefined);
    // Closed first so nothing re-initializes while cleanup runs
    for (const entry of entries) {
      entry.state = 'closed';
    }

    const results = await Promise.all(owned.map((entry) => this.cleanupEntry(entry)));

    for (const entry of entries) {
      entry.instance = undefined;
    }

    const failed = results.filter((result) => !result.success).length;
    logger.info({ total: results.length, successful: results.length - failed, failed }, 'Resource cleanup summary');
    return results;
  }

  private async cleanupEntry<T>(entry: ResourceEntry<T>): Promise<CleanupResult> {
    const instance = entry.instance;
    const startTime = Date.now();
    if (instance === undefined) {
      return { name: entry.name, success: true, duration: 0 };
    }

    try {
      await this.releaseInstance(entry, instance);
      const duration = Date.now() - startTime;
      logger.info({ name: entry.name, duration }, `✅ ${entry.name} cleaned up`);
      return { name: entry.name, success: true, duration };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error({ name: entry.name, error: errorMessage }, `❌ Error cleaning up ${entry.name}`);
      return { name: entry.name, success: false, duration: Date.now() - startTime, error: errorMessage };
    }
  }

  private async releaseInstance<T>(entry: ResourceEntry<T>, instance: T): Promise<void> {
    const key = slotKeyFor(entry.name);
    // Only withdraw what this container published; another owner's instance stays
    if (this.sharedState.get(key) === instance) {
      this.sharedState.delete(key);
    }
    await entry.lifecycle.cleanup(instance);
  }

  /**
   * Check every locally created instance. A throwing check counts as unhealthy
   * for that resource only.
   */
  async healthCheckAll(): Promise<Record<string, boolean>> {
    const checks = Array.from(this.entryList.values())
      .filter((entry) => entry.instance !== undefined)
      .map(async (entry): Promise<[string, boolean]> => [entry.name, await this.checkEntry(entry)]);

    return Object.fromEntries(await Promise.all(checks));
  }

  private async checkEntry<T>(entry: ResourceEntry<T>): Promise<boolean> {
    const instance = entry.instance;
    if (instance === undefined) {
      return false;
    }
    try {
      return await entry.lifecycle.healthCheck(instance);
    } catch (error) {
      logger.error(
        { name: entry.name, error: error instanceof Error ? error.message : String(error) },
        `Health check failed for ${entry.name}`
      );
      return false;
    }
  }
}
