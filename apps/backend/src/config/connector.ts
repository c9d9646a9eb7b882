import type { IWidgetDescriptor } from '@terminal-connector/types';
import { deepFreeze } from '../lib/freeze.js';
import type { RetryPolicyOptions } from '../lib/retry.js';
import { WidgetRegistry } from '../modules/connector/registry/widget-registry.js';
import type { EnvConfig } from './env.js';

export interface ProviderConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;

  /**
   * Token sent to the provider as the `token` query parameter.
   */
  readonly apiKey?: string;
}

/**
 * Process-wide connector state.
 *
 * Built exactly once by the bootstrap and passed to every component. The
 * object graph is frozen; there is no way to change it at runtime. Never log
 * this object whole: `credential` and `provider.apiKey` are secrets (the
 * logger redacts both keys anyway).
 */
export interface ConnectorConfig {
  /**
   * Credential the terminal must present.
   */
  readonly credential: string;
  readonly provider: ProviderConfig;
  readonly retry: Readonly<RetryPolicyOptions>;
  readonly server: { readonly host: string; readonly port: number };
  readonly cors: { readonly origins: readonly string[] };
  readonly appsManifestPath?: string;
  readonly registry: WidgetRegistry;
}

/**
 * Build the immutable connector configuration from parsed environment
 * variables and the static widget catalog.
 *
 * @throws Error when the catalog is inconsistent (duplicate ids, dangling parameter references)
 */
export function createConnectorConfig(env: EnvConfig, catalog: readonly IWidgetDescriptor[]): ConnectorConfig {
  const config: ConnectorConfig = {
    credential: env.CONNECTOR_API_KEY,
    provider: {
      baseUrl: env.PROVIDER_BASE_URL,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      apiKey: env.PROVIDER_API_KEY
    },
    retry: {
      maxRetries: env.UPSTREAM_MAX_RETRIES,
      backoffMs: env.UPSTREAM_BACKOFF_MS,
      backoffMultiplier: 2
    },
    server: { host: env.HOST, port: env.PORT },
    cors: { origins: [...env.CORS_ORIGINS] },
    appsManifestPath: env.APPS_MANIFEST_PATH,
    registry: new WidgetRegistry(catalog)
  };

  return deepFreeze(config);
}
