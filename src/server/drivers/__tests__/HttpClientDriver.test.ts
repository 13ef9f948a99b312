import { describe, it, expect } from 'vitest';
import { createServer } from 'http';
import { AxiosError } from 'axios';
import { HttpClientDriver, isRetryableConnectionError } from '../HttpClientDriver.js';
import { DEFAULT_HTTP_CLIENT_OPTIONS } from '../../config/resourceConfig.js';

describe('isRetryableConnectionError', () => {
  it('retries refused and reset connections', () => {
    expect(isRetryableConnectionError(new AxiosError('refused', 'ECONNREFUSED'))).toBe(true);
    expect(isRetryableConnectionError(new AxiosError('reset', 'ECONNRESET'))).toBe(true);
  });

  it('does not retry timeouts or unknown codes', () => {
    expect(isRetryableConnectionError(new AxiosError('timeout', 'ECONNABORTED'))).toBe(false);
    expect(isRetryableConnectionError(new AxiosError('no code'))).toBe(false);
  });
});

/**
 * A loopback port nothing listens on any more
 */
async function closedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  const { port } = address;
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  return port;
}

describe('HttpClientDriver', () => {
  it('retries a refused connection the configured number of times', async () => {
    const port = await closedPort();
    const driver = new HttpClientDriver();
    const client = await driver.initialize({ ...DEFAULT_HTTP_CLIENT_OPTIONS, retries: 2 });
    let attempts = 0;
    client.client.interceptors.request.use((config) => {
      attempts += 1;
      return config;
    });

    await expect(client.client.get(`http://127.0.0.1:${port}/`)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    expect(attempts).toBe(3);
    await driver.cleanup(client);
  });

  it('does not retry when retries is 0', async () => {
    const port = await closedPort();
    const driver = new HttpClientDriver();
    const client = await driver.initialize({ ...DEFAULT_HTTP_CLIENT_OPTIONS, retries: 0 });
    let attempts = 0;
    client.client.interceptors.request.use((config) => {
      attempts += 1;
      return config;
    });

    await expect(client.client.get(`http://127.0.0.1:${port}/`)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    expect(attempts).toBe(1);
    await driver.cleanup(client);
  });

  it('is healthy until closed when no health check url is set', async () => {
    const driver = new HttpClientDriver();
    const client = await driver.initialize(DEFAULT_HTTP_CLIENT_OPTIONS);

    expect(driver.isInstance(client)).toBe(true);
    expect(await driver.healthCheck(client)).toBe(true);

    await driver.cleanup(client);

    expect(client.isClosed()).toBe(true);
    expect(await driver.healthCheck(client)).toBe(false);
  });

  it('applies the configured base url and timeout', async () => {
    const driver = new HttpClientDriver();
    const client = await driver.initialize({
      ...DEFAULT_HTTP_CLIENT_OPTIONS,
      baseURL: 'http://agent.internal:3002',
      timeoutMs: 1500,
    });

    expect(client.client.defaults.baseURL).toBe('http://agent.internal:3002');
    expect(client.client.defaults.timeout).toBe(1500);
    await driver.cleanup(client);
  });
});
