import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceContainer } from '../resourceContainer.js';
import { SharedStateStore, slotKeyFor } from '../sharedState.js';
import type { ResourceDriver } from '../../drivers/ResourceDriver.js';
import {
  ConfigurationError,
  ConflictError,
  ResourceClosedError,
  ResourceInitializationError,
  ResourceNotRegisteredError,
} from '../../types/errors.js';

class FakeClient {
  constructor(
    readonly label: string,
    readonly serial: number
  ) {}
}

interface FakeOptions {
  label: string;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

class FakeDriver implements ResourceDriver<FakeClient, FakeOptions> {
  initializeCalls = 0;
  cleanedUp: FakeClient[] = [];
  gate: Promise<void> | null = null;
  initError: Error | null = null;
  cleanupError: Error | null = null;
  health: boolean | Error = true;

  async initialize(config: FakeOptions): Promise<FakeClient> {
    this.initializeCalls += 1;
    const serial = this.initializeCalls;
    if (this.gate) {
      await this.gate;
    }
    if (this.initError) {
      throw this.initError;
    }
    return new FakeClient(config.label, serial);
  }

  async cleanup(instance: FakeClient): Promise<void> {
    this.cleanedUp.push(instance);
    if (this.cleanupError) {
      throw this.cleanupError;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (this.health instanceof Error) {
      throw this.health;
    }
    return this.health;
  }

  isInstance(candidate: unknown): candidate is FakeClient {
    return candidate instanceof FakeClient;
  }
}

interface TestResources {
  alpha: FakeClient;
  beta: FakeClient;
}

describe('ResourceContainer', () => {
  let sharedState: SharedStateStore;
  let container: ResourceContainer<TestResources>;
  let alpha: FakeDriver;
  let beta: FakeDriver;

  beforeEach(() => {
    sharedState = new SharedStateStore();
    container = new ResourceContainer<TestResources>(sharedState);
    alpha = new FakeDriver();
    beta = new FakeDriver();
    container.register('alpha', alpha, { label: 'alpha' });
    container.register('beta', beta, { label: 'beta' });
  });

  describe('getInstance', () => {
    it('initializes once for concurrent callers and hands out the same instance', async () => {
      const gate = deferred();
      alpha.gate = gate.promise;

      const pending = Array.from({ length: 10 }, () => container.getInstance('alpha'));
      expect(container.getState('alpha')).toBe('initializing');
      gate.resolve();
      const instances = await Promise.all(pending);

      expect(alpha.initializeCalls).toBe(1);
      expect(new Set(instances).size).toBe(1);
      expect(instances[0].label).toBe('alpha');
      expect(container.getState('alpha')).toBe('ready');
    });

    it('publishes the instance under its slot key', async () => {
      const instance = await container.getInstance('alpha');

      expect(slotKeyFor('alpha')).toBe('alpha_driver');
      expect(sharedState.get('alpha_driver')).toBe(instance);
    });

    it('throws for a name that was never registered', async () => {
      const empty = new ResourceContainer<TestResources>(sharedState);

      await expect(empty.getInstance('alpha')).rejects.toThrow(ResourceNotRegisteredError);
      await expect(empty.getInstance('alpha')).rejects.toThrow("Driver 'alpha' not registered");
      expect(empty.getState('alpha')).toBe('unregistered');
    });

    it('wraps driver failures, caches nothing and retries on the next call', async () => {
      alpha.initError = new Error('connection refused');

      await expect(container.getInstance('alpha')).rejects.toThrow(ResourceInitializationError);
      expect(container.getState('alpha')).toBe('registered');
      expect(sharedState.get('alpha_driver')).toBeUndefined();

      alpha.initError = null;
      const instance = await container.getInstance('alpha');

      expect(alpha.initializeCalls).toBe(2);
      expect(instance.serial).toBe(2);
    });

    it('keeps the original error as the cause', async () => {
      const failure = new Error('auth failed');
      alpha.initError = failure;

      const error = await container.getInstance('alpha').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ResourceInitializationError);
      expect(error).toHaveProperty('cause', failure);
    });

    it('rethrows configuration errors unchanged', async () => {
      const failure = new ConfigurationError('missing bucket');
      alpha.initError = failure;

      await expect(container.getInstance('alpha')).rejects.toBe(failure);
      expect(container.getState('alpha')).toBe('registered');
    });

    it('reuses an instance another container published', async () => {
      const published = await container.getInstance('alpha');

      const otherDriver = new FakeDriver();
      const other = new ResourceContainer<TestResources>(sharedState);
      other.register('alpha', otherDriver, { label: 'other' });

      expect(await other.getInstance('alpha')).toBe(published);
      expect(otherDriver.initializeCalls).toBe(0);
    });

    it('ignores a shared slot value of the wrong type', async () => {
      sharedState.set('alpha_driver', { stale: true });

      const instance = await container.getInstance('alpha');

      expect(instance).toBeInstanceOf(FakeClient);
      expect(alpha.initializeCalls).toBe(1);
      expect(sharedState.get('alpha_driver')).toBe(instance);
    });
  });

  describe('register', () => {
    it('overwrites a registration that has no instance yet', async () => {
      const replacement = new FakeDriver();
      container.register('alpha', replacement, { label: 'replacement' });

      const instance = await container.getInstance('alpha');

      expect(instance.label).toBe('replacement');
      expect(alpha.initializeCalls).toBe(0);
    });

    it('refuses to replace a live instance', async () => {
      await container.getInstance('alpha');

      expect(() => container.register('alpha', new FakeDriver(), { label: 'late' })).toThrow(ConflictError);
    });

    it('lists registered names', () => {
      expect(container.registeredNames()).toEqual(['alpha', 'beta']);
      expect(container.has('beta')).toBe(true);
    });
  });

  describe('cleanupAll', () => {
    it('cleans every instance even when one cleanup fails', async () => {
      const first = await container.getInstance('alpha');
      const second = await container.getInstance('beta');
      alpha.cleanupError = new Error('socket hang up');

      const results = await container.cleanupAll();

      expect(alpha.cleanedUp).toEqual([first]);
      expect(beta.cleanedUp).toEqual([second]);
      expect(results.map(({ name, success, error }) => ({ name, success, error }))).toEqual([
        { name: 'alpha', success: false, error: 'socket hang up' },
        { name: 'beta', success: true, error: undefined },
      ]);
      expect(sharedState.keys()).toEqual([]);
    });

    it('closes the container for further lookups', async () => {
      await container.getInstance('alpha');
      await container.cleanupAll();

      expect(container.getState('alpha')).toBe('closed');
      await expect(container.getInstance('alpha')).rejects.toThrow(ResourceClosedError);
    });

    it('leaves instances published by another container in place', async () => {
      const published = await container.getInstance('alpha');
      const other = new ResourceContainer<TestResources>(sharedState);
      const otherDriver = new FakeDriver();
      other.register('alpha', otherDriver, { label: 'other' });
      await other.getInstance('alpha');

      const results = await other.cleanupAll();

      expect(results).toEqual([]);
      expect(otherDriver.cleanedUp).toEqual([]);
      expect(sharedState.get('alpha_driver')).toBe(published);
    });

    it('releases an instance that finishes initializing after shutdown', async () => {
      const gate = deferred();
      alpha.gate = gate.promise;
      const pending = container.getInstance('alpha');

      await container.cleanupAll();
      gate.resolve();

      await expect(pending).rejects.toThrow(ResourceClosedError);
      expect(alpha.cleanedUp).toHaveLength(1);
      expect(sharedState.get('alpha_driver')).toBeUndefined();
    });
  });

  describe('healthCheckAll', () => {
    it('reports each initialized resource independently', async () => {
      await container.getInstance('alpha');
      await container.getInstance('beta');
      alpha.health = new Error('ping timeout');

      expect(await container.healthCheckAll()).toEqual({ alpha: false, beta: true });
    });

    it('skips resources that were never initialized', async () => {
      await container.getInstance('beta');

      expect(await container.healthCheckAll()).toEqual({ beta: true });
    });
  });
});
