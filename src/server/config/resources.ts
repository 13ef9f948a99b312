import { MongoDriver, type MongoConnection } from '../drivers/MongoDriver.js';
import { HttpClientDriver, type PooledHttpClient } from '../drivers/HttpClientDriver.js';
import { ObjectStorageDriver, type ObjectStorageClient } from '../drivers/ObjectStorageDriver.js';
import { ResourceContainer } from './resourceContainer.js';
import { getSharedState, type SharedState } from './sharedState.js';
import type { ResourceConfig } from './resourceConfig.js';

/**
 * Instance type of every built-in resource, keyed by resource name
 */
export interface AppResources {
  mongo: MongoConnection;
  http: PooledHttpClient;
  storage: ObjectStorageClient;
}

export type AppResourceContainer = ResourceContainer<AppResources>;

/**
 * Build a container with the built-in drivers registered.
 * Nothing connects until the first getInstance() for a name.
 */
export function createResourceContainer(
  config: ResourceConfig,
  sharedState: SharedState = getSharedState()
): AppResourceContainer {
  const container = new ResourceContainer<AppResources>(sharedState);
  container.register('mongo', new MongoDriver(), config.mongo);
  container.register('http', new HttpClientDriver(), config.http);
  container.register('storage', new ObjectStorageDriver(), config.storage);
  return container;
}
