import axios, { AxiosInstance } from "axios";

import {
  BaseFluentIntegrationConfig,
  FluentRestClient,
  resolveLogger,
} from "@fluent-rest/core";
import { AxiosAdapter } from "./adapter";

/**
 * Configuration for an Axios-backed fluent client
 */
export interface FluentAxiosConfig extends BaseFluentIntegrationConfig {}

/**
 * Creates a FluentRestClient that sends its requests through an Axios instance
 *
 * The instance keeps its own configuration (timeouts, interceptors, agents);
 * every call still targets the absolute URI the chain resolves.
 *
 * @param axiosInstance - The Axios instance to send requests with (default: `axios.create()`)
 * @param config - Optional configuration (reads FLUENT_REST_DEBUG from env by default)
 *
 * @example
 * ```typescript
 * import axios from 'axios';
 * import { createFluentAxios } from '@fluent-rest/axios';
 *
 * const client = createFluentAxios(axios.create({ timeout: 30000 }));
 *
 * const stuff = await client
 *   .get()
 *   .from('https://cool-service.com/get/stuff/{stuffId}')
 *   .uriVariable('stuffId', '123')
 *   .executor()
 *   .executeForObject('json');
 * ```
 *
 * @example
 * ```typescript
 * // An adapter without PATCH: client.patch() throws UnsupportedOperationError
 * const client = createFluentAxios(axios.create(), {
 *   supportedMethods: ['GET', 'POST', 'PUT', 'DELETE'],
 *   defaultHeaders: { 'User-Agent': 'reminder-service/1.0' },
 * });
 * ```
 */
export function createFluentAxios(
  axiosInstance: AxiosInstance = axios.create(),
  config: FluentAxiosConfig = {},
): FluentRestClient {
  const adapter = new AxiosAdapter(axiosInstance, {
    supportedMethods: config.supportedMethods,
  });

  return new FluentRestClient(adapter, {
    logger: resolveLogger(config),
    defaultHeaders: config.defaultHeaders,
  });
}
