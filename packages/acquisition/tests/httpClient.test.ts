import { describe, it, expect, afterEach } from 'vitest';
import { Agent as HttpsAgent } from 'node:https';
import { Agent } from 'undici';
import { buildHttpClients, createApiAgent, type HttpClientConfig, type HttpClients } from '../src/httpClient.js';

const CONFIG: HttpClientConfig = {
  connectTimeoutMs: 30_000,
  readTimeoutMs: 600_000,
  writeTimeoutMs: 600_000,
  poolTimeoutMs: 60_000,
  maxConnections: 100,
  maxKeepalive: 20,
};

describe('buildHttpClients', () => {
  let clients: HttpClients | undefined;

  afterEach(async () => {
    await clients?.downloadDispatcher.close();
    clients = undefined;
  });

  it('applies every supported feature in order and skips the pool timeout', () => {
    clients = buildHttpClients(CONFIG);

    expect(clients.applied).toEqual({
      download: ['pool_limits', 'timeouts'],
      api: ['pool_limits', 'timeouts'],
    });
    expect(clients.downloadDispatcher).toBeInstanceOf(Agent);
  });

  it('derives Bot API agent options and the request budget', () => {
    clients = buildHttpClients(CONFIG);

    expect(clients.api.agentOptions).toEqual({
      keepAlive: true,
      maxSockets: 100,
      maxFreeSockets: 20,
      timeout: 600_000,
    });
    expect(clients.api.timeoutSeconds).toBe(630);
  });

  it('keeps defaults when no feature is enabled', () => {
    clients = buildHttpClients(CONFIG, undefined, []);

    expect(clients.applied).toEqual({ download: [], api: [] });
    expect(clients.api).toEqual({ agentOptions: {}, timeoutSeconds: 500 });
  });
});

describe('createApiAgent', () => {
  it('matches the protocol of the API root', () => {
    const plain = createApiAgent('http://bot-api:8081', {});
    const secure = createApiAgent('https://api.telegram.org', {});

    expect(plain).not.toBeInstanceOf(HttpsAgent);
    expect(secure).toBeInstanceOf(HttpsAgent);
    plain.destroy();
    secure.destroy();
  });
});
