/**
 * @fluent-rest/axios - Axios transport for the fluent REST client
 */

export { createFluentAxios } from "./axios";
export type { FluentAxiosConfig } from "./axios";

export { AxiosAdapter, createAxiosAdapter } from "./adapter";
export type { AxiosAdapterOptions } from "./adapter";

// Re-export commonly used types from core
export type {
  FluentRestClient,
  BaseFluentIntegrationConfig,
  HttpClientAdapter,
  HttpResponse,
  ServiceDescriptor,
} from "@fluent-rest/core";
