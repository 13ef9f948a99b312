import { GeoTextQueryEngine } from '../services/discovery/GeoTextQueryEngine.js';
import { CatalogService } from '../services/catalog/CatalogService.js';
import { AgentService } from '../services/agent/AgentService.js';
import type { AppResourceContainer } from './resources.js';

export interface ServiceGetters {
  getCatalogService: () => Promise<CatalogService>;
  getAgentService: () => Promise<AgentService>;
}

/**
 * Service accessors backed by the container. Resources connect on the first
 * request that needs them; the container hands every later caller the same
 * instance.
 */
export function createServiceGetters(container: AppResourceContainer, agentBaseUrl: string): ServiceGetters {
  const getCatalogService = async (): Promise<CatalogService> => {
    const mongo = await container.getInstance('mongo');
    return new CatalogService(new GeoTextQueryEngine(mongo, mongo), mongo);
  };

  const getAgentService = async (): Promise<AgentService> => {
    const [http, catalog] = await Promise.all([container.getInstance('http'), getCatalogService()]);
    return new AgentService(http.client, agentBaseUrl, catalog);
  };

  return { getCatalogService, getAgentService };
}
