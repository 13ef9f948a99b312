/**
 * Shared State
 *
 * Process-wide hand-off store for initialized resources. Containers built
 * independently (per worker, per test harness, per sub-application) publish
 * what they initialize here so the others can reuse it.
 *
 * Reads and writes are plain reference assignments; a slot is written once
 * and then stays stable until the owning container cleans it up.
 */

export interface SharedState {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}

/**
 * Well-known slot key for each built-in resource name
 */
export const RESOURCE_SLOT_KEYS: Readonly<Record<string, string>> = Object.freeze({
  mongo: 'mongo_client',
  http: 'http_client',
  storage: 'storage_client',
});

/**
 * Resolve the one slot key a resource is published under.
 * Names without an explicit mapping use `<name>_driver`.
 */
export function slotKeyFor(name: string): string {
  return RESOURCE_SLOT_KEYS[name] ?? `${name}_driver`;
}

export class SharedStateStore implements SharedState {
  private readonly slots = new Map<string, unknown>();

  get(key: string): unknown {
    return this.slots.get(key);
  }

  set(key: string, value: unknown): void {
    this.slots.set(key, value);
  }

  delete(key: string): void {
    this.slots.delete(key);
  }

  keys(): string[] {
    return Array.from(this.slots.keys());
  }
}

// Singleton instance
let sharedStateInstance: SharedStateStore | null = null;

/**
 * Get or create the process-wide SharedStateStore
 */
export function getSharedState(): SharedStateStore {
  if (!sharedStateInstance) {
    sharedStateInstance = new SharedStateStore();
  }
  return sharedStateInstance;
}
