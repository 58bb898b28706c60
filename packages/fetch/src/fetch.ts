import {
  BaseFluentIntegrationConfig,
  FluentRestClient,
  resolveLogger,
} from "@fluent-rest/core";
import { FetchAdapter } from "./adapter";

/**
 * Configuration for a fetch-backed fluent client
 */
export interface FluentFetchConfig extends BaseFluentIntegrationConfig {
  /**
   * Statuses accepted as success (default: 2xx)
   */
  validateStatus?: (status: number) => boolean;
}

/**
 * Creates a FluentRestClient that sends its requests with the fetch API
 *
 * Unlike axios, fetch resolves on every status; this client rejects statuses
 * outside `validateStatus` with HttpStatusError.
 *
 * @param config - Optional configuration (reads FLUENT_REST_DEBUG from env by default)
 *
 * @example
 * ```typescript
 * import { createFluentFetch } from '@fluent-rest/fetch';
 *
 * const client = createFluentFetch();
 *
 * await client
 *   .post({ text: 'water the plants' })
 *   .into('https://cool-service.com/reminder/set')
 *   .executor()
 *   .contentType('application/json')
 *   .execute();
 * ```
 */
export function createFluentFetch(config: FluentFetchConfig = {}): FluentRestClient {
  const adapter = new FetchAdapter({
    validateStatus: config.validateStatus,
    supportedMethods: config.supportedMethods,
  });

  return new FluentRestClient(adapter, {
    logger: resolveLogger(config),
    defaultHeaders: config.defaultHeaders,
  });
}
