// Main client
export { FluentRestClient, ExecutorUriBuilder } from "./client/FluentRestClient";
export type {
  FluentRestClientOptions,
  UriStarter,
  UriBodyStarter,
  ServiceEndpointSelector,
} from "./client/FluentRestClient";
export { RequestAssembler } from "./client/RequestAssembler";
export type { RequestAssemblerContext } from "./client/RequestAssembler";

// Service descriptors
export { ServiceDescriptor, joinPath } from "./service/ServiceDescriptor";
export type {
  ServiceDescriptorConfig,
  ServiceDescription,
} from "./service/ServiceDescriptor";
export { UriResolver } from "./service/UriResolver";
export type { UriPartsBuilder } from "./service/UriResolver";
export {
  serviceDescriptorFromConfig,
  serviceDescriptorFromEnv,
  loadServiceDescriptors,
  serviceDescriptorConfigSchema,
  serviceDescriptorsConfigSchema,
} from "./service/config";
export type { ServiceDescriptorFileConfig } from "./service/config";

// URI templates
export {
  expandTemplate,
  templateVariableNames,
  encodeLiteral,
  encodeStrict,
} from "./uri/UriTemplate";
export type { UriComponentType, UriVariables } from "./uri/UriTemplate";
export { parseUriString, parseQueryString, toUriString } from "./uri/UriComponents";
export type {
  QueryValue,
  QueryParamMap,
  QueryParamsInput,
  UriComponents,
} from "./uri/UriComponents";

// Errors
export {
  InvalidArgumentError,
  ConfigurationError,
  UriTemplateError,
  UnsupportedOperationError,
  HttpStatusError,
  isHttpStatusError,
} from "./errors/FluentRestErrors";

// Logging
export { createConsoleLogger, silentLogger, LOG_PREFIX } from "./lib/logger";
export type { Logger } from "./lib/logger";

// Configuration
export { resolveLogger } from "./types/config";
export type { BaseFluentIntegrationConfig, HeaderInput } from "./types/config";

// Types
export { HTTP_METHODS } from "./types/http";
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpClientAdapter,
  HeaderValues,
  RequestDescriptor,
  ResponseShape,
  ResponseType,
  AnyResponseType,
} from "./types/http";

// Utilities
export {
  flattenHeaders,
  normalizeResponseHeaders,
  getHeader,
  hasHeader,
  hasText,
  isBlank,
} from "./lib/utils";
