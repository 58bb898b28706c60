import type { ZodType, ZodTypeAny, ZodTypeDef } from "zod";

/**
 * HTTP verbs the fluent client can issue
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
];

/**
 * Expected shape of a response body, as understood by the adapters.
 * "void" means the body is discarded.
 */
export type ResponseShape = "json" | "text" | "arraybuffer" | "void";

/**
 * What a caller may pass to `execute()`: a body shape, or a zod schema
 * (JSON body parsed through the schema)
 */
export type ResponseType<T> =
  | Exclude<ResponseShape, "void">
  | ZodType<T, ZodTypeDef, unknown>;

/**
 * Any response type accepted at runtime
 */
export type AnyResponseType = ResponseShape | ZodTypeAny;

/**
 * Multi-valued headers, keyed by the first spelling a name was given with
 */
export type HeaderValues = Readonly<Record<string, readonly string[]>>;

/**
 * Resolved request, ready for transport
 * Produced by RequestAssembler and frozen
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Resolved URI as rendered by UriResolver.build(); relative when no host was configured */
  readonly uri: string;
  readonly headers: HeaderValues;
  readonly body?: unknown;
}

/**
 * Request handed to an HttpClientAdapter
 */
export interface HttpRequest extends RequestDescriptor {
  readonly responseType: ResponseShape;
}

/**
 * Generic HTTP response representation
 * HTTP-client agnostic interface for representing responses
 */
export interface HttpResponse<T = unknown> {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  data: T;
}

/**
 * HTTP client adapter interface
 * Provides a unified interface for different HTTP libraries
 *
 * Implementations must:
 * - Execute requests and return normalized responses
 * - Let the underlying library's errors propagate (no retries, no wrapping)
 */
export interface HttpClientAdapter {
  /**
   * Execute a HTTP request
   * @returns The response from the server, body read per `request.responseType`
   */
  request(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Capability check consulted when a verb is selected, before any URI work.
   * Adapters that omit it are assumed to support every method.
   */
  supportsMethod?(method: HttpMethod): boolean;
}
