import {
  BaseFluentIntegrationConfig,
  FluentRestClient,
  resolveLogger,
} from "@fluent-rest/core";
import { NodeHttpAdapter, NodeHttpAdapterOptions } from "./adapter";

/**
 * Configuration for a Node.js http/https-backed fluent client
 */
export interface FluentNodeHttpConfig
  extends BaseFluentIntegrationConfig,
    Omit<NodeHttpAdapterOptions, "supportedMethods"> {}

/**
 * Creates a FluentRestClient on top of Node's http and https modules
 *
 * @param config - Optional configuration (reads FLUENT_REST_DEBUG from env by default)
 *
 * @example
 * ```typescript
 * import { createFluentNodeHttp } from '@fluent-rest/node-http';
 * import { serviceDescriptorFromEnv } from '@fluent-rest/core';
 *
 * const client = createFluentNodeHttp({ timeout: 10000 });
 * const reminders = serviceDescriptorFromEnv('REMINDER_SERVICE')
 *   .endpoint('list', 'reminders');
 *
 * const list = await client
 *   .get()
 *   .from(reminders)
 *   .withEndpoint('list')
 *   .queryParam('limit', 20)
 *   .executor()
 *   .accept('application/json')
 *   .executeForObject('json');
 * ```
 */
export function createFluentNodeHttp(config: FluentNodeHttpConfig = {}): FluentRestClient {
  const adapter = new NodeHttpAdapter({
    httpAgent: config.httpAgent,
    httpsAgent: config.httpsAgent,
    timeout: config.timeout,
    supportedMethods: config.supportedMethods,
  });

  return new FluentRestClient(adapter, {
    logger: resolveLogger(config),
    defaultHeaders: config.defaultHeaders,
  });
}
