/**
 * HTTP Client Builder
 * 
 * Builds the two outbound HTTP stacks from one configuration:
 * - an undici Agent for media downloads
 * - Node http(s) Agent options for Bot API calls
 * 
 * Optional features are declared once, in order. Each one is applied to
 * every target that supports it; the rest are reported as skipped.
 */

import { Agent as HttpAgent, type AgentOptions } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';
import { Agent } from 'undici';
import { logger as defaultLogger, type Logger } from '@relay/utils';

export interface HttpClientConfig {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  poolTimeoutMs: number;
  maxConnections: number;
  maxKeepalive: number;
  /** Redirect hops followed by downloads */
  maxRedirections?: number;
}

export type HttpTarget = 'download' | 'api';

export interface ApiClientSettings {
  agentOptions: AgentOptions;
  /** Whole-request budget for one Bot API call */
  timeoutSeconds: number;
}

interface BuildState {
  download: Agent.Options;
  api: ApiClientSettings;
}

export interface HttpFeature {
  name: string;
  /** Per target: how to apply it, or undefined when the target has no equivalent */
  apply: {
    [T in HttpTarget]?: (state: BuildState, config: HttpClientConfig) => void;
  };
}

/**
 * Features in the order they are applied
 */
export const HTTP_FEATURES: readonly HttpFeature[] = [
  {
    name: 'pool_limits',
    apply: {
      download: (state, config) => {
        state.download.connections = config.maxConnections;
      },
      api: (state, config) => {
        state.api.agentOptions.keepAlive = true;
        state.api.agentOptions.maxSockets = config.maxConnections;
        state.api.agentOptions.maxFreeSockets = config.maxKeepalive;
      },
    },
  },
  {
    // Neither undici nor Node's agent can bound the wait for a free socket
    name: 'pool_timeout',
    apply: {},
  },
  {
    name: 'timeouts',
    apply: {
      download: (state, config) => {
        state.download.connect = { timeout: config.connectTimeoutMs };
        state.download.headersTimeout = config.readTimeoutMs;
        state.download.bodyTimeout = config.readTimeoutMs;
      },
      api: (state, config) => {
        state.api.agentOptions.timeout = config.readTimeoutMs;
        state.api.timeoutSeconds = Math.ceil(
          (config.connectTimeoutMs + Math.max(config.readTimeoutMs, config.writeTimeoutMs)) / 1000
        );
      },
    },
  },
];

export interface HttpClients {
  /** Shared dispatcher for all media downloads */
  downloadDispatcher: Agent;
  api: ApiClientSettings;
  /** Feature names applied per target, in order */
  applied: Record<HttpTarget, string[]>;
}

/**
 * Build both HTTP stacks from configuration
 */
export function buildHttpClients(
  config: HttpClientConfig,
  logger: Logger = defaultLogger,
  features: readonly HttpFeature[] = HTTP_FEATURES
): HttpClients {
  const state: BuildState = {
    download: { maxRedirections: config.maxRedirections ?? 5 },
    api: { agentOptions: {}, timeoutSeconds: 500 },
  };
  const applied: Record<HttpTarget, string[]> = { download: [], api: [] };
  const targets: HttpTarget[] = ['download', 'api'];

  for (const feature of features) {
    for (const target of targets) {
      const apply = feature.apply[target];
      if (!apply) {
        logger.debug({ feature: feature.name, target }, 'HTTP feature not supported by target, skipped');
        continue;
      }
      apply(state, config);
      applied[target].push(feature.name);
    }
  }

  logger.info({ applied }, 'HTTP clients configured');

  return {
    downloadDispatcher: new Agent(state.download),
    api: state.api,
    applied,
  };
}

/**
 * Node agent matching the protocol of the Bot API root
 */
export function createApiAgent(apiRoot: string, options: AgentOptions): HttpAgent {
  return apiRoot.startsWith('http://') ? new HttpAgent(options) : new HttpsAgent(options);
}
