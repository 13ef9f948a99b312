/**
 * Pooled outbound HTTP client
 *
 * One axios instance over shared keep-alive agents, so every call to the
 * agent service reuses the same sockets. Connection-level failures (no
 * response received) are retried a configured number of times.
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { logger } from '../utils/logger.js';
import type { HttpClientOptions } from '../config/resourceConfig.js';
import type { ResourceDriver } from './ResourceDriver.js';

declare module 'axios' {
  interface AxiosRequestConfig {
    /** Connection retries already spent on this request */
    retryAttempt?: number;
  }
}

const RETRYABLE_CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

// HTTP timeout for health probes
const HEALTH_CHECK_TIMEOUT = 5000;

export function isRetryableConnectionError(error: AxiosError): boolean {
  return error.response === undefined && error.code !== undefined && RETRYABLE_CONNECTION_CODES.has(error.code);
}

export class PooledHttpClient {
  private closed = false;

  constructor(
    readonly client: AxiosInstance,
    private readonly httpAgent: http.Agent,
    private readonly httpsAgent: https.Agent,
    readonly healthCheckUrl?: string
  ) {}

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.closed = true;
  }
}

export class HttpClientDriver implements ResourceDriver<PooledHttpClient, HttpClientOptions> {
  async initialize(config: HttpClientOptions): Promise<PooledHttpClient> {
    const agentOptions: http.AgentOptions = {
      keepAlive: true,
      keepAliveMsecs: config.keepAliveMs,
      maxSockets: config.maxConnections,
      maxFreeSockets: config.maxKeepAlive,
    };
    const httpAgent = new http.Agent(agentOptions);
    const httpsAgent = new https.Agent(agentOptions);

    const instance = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      httpAgent,
      httpsAgent,
    });

    instance.interceptors.response.use(undefined, async (error: unknown) => {
      if (!axios.isAxiosError(error) || !error.config || !isRetryableConnectionError(error)) {
        throw error;
      }
      const attempt = error.config.retryAttempt ?? 0;
      if (attempt >= config.retries) {
        throw error;
      }
      logger.debug(
        { url: error.config.url, method: error.config.method, code: error.code, attempt: attempt + 1 },
        'Retrying HTTP request after connection failure'
      );
      return instance.request({ ...error.config, retryAttempt: attempt + 1 });
    });

    logger.info(
      { timeoutMs: config.timeoutMs, maxConnections: config.maxConnections, retries: config.retries },
      'HTTP client initialized'
    );
    return new PooledHttpClient(instance, httpAgent, httpsAgent, config.healthCheckUrl);
  }

  async cleanup(instance: PooledHttpClient): Promise<void> {
    instance.close();
    logger.info('HTTP client closed');
  }

  async healthCheck(instance: PooledHttpClient): Promise<boolean> {
    if (instance.isClosed()) {
      return false;
    }
    if (!instance.healthCheckUrl) {
      return true;
    }

    try {
      const response = await instance.client.get(instance.healthCheckUrl, {
        timeout: HEALTH_CHECK_TIMEOUT,
        validateStatus: () => true,
      });
      return response.status >= 200 && response.status < 400;
    } catch (error) {
      logger.warn(
        { url: instance.healthCheckUrl, error: error instanceof Error ? error.message : String(error) },
        'HTTP client health check failed'
      );
      return false;
    }
  }

  isInstance(candidate: unknown): candidate is PooledHttpClient {
    return candidate instanceof PooledHttpClient;
  }
}
