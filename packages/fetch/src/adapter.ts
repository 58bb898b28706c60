import {
  flattenHeaders,
  hasHeader,
  HTTP_METHODS,
  HttpClientAdapter,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpStatusError,
  ResponseShape,
} from "@fluent-rest/core";

export interface FetchAdapterOptions {
  /**
   * Statuses accepted as success; anything else rejects with HttpStatusError
   * Default: 2xx
   */
  validateStatus?: (status: number) => boolean;

  /**
   * Verbs this adapter accepts (default: all)
   */
  supportedMethods?: readonly HttpMethod[];
}

/**
 * Fetch API adapter for HTTP client abstraction
 * Provides HttpClientAdapter interface using native fetch
 *
 * The global fetch is looked up on every request. A relative URI is passed
 * through as it is and rejected by fetch.
 */
export class FetchAdapter implements HttpClientAdapter {
  private readonly validateStatus: (status: number) => boolean;
  private readonly supportedMethods: readonly HttpMethod[];

  constructor(options: FetchAdapterOptions = {}) {
    this.validateStatus =
      options.validateStatus ?? ((status) => status >= 200 && status < 300);
    this.supportedMethods = options.supportedMethods ?? HTTP_METHODS;
  }

  supportsMethod(method: HttpMethod): boolean {
    return this.supportedMethods.includes(method);
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const headers = flattenHeaders(request.headers);
    const body = this.prepareRequestBody(request.body);
    // Objects are sent as JSON unless the caller picked a content type
    if (
      typeof body === "string" &&
      typeof request.body !== "string" &&
      !hasHeader(headers, "Content-Type")
    ) {
      headers["Content-Type"] = "application/json";
    }

    const response = await fetch(request.uri, {
      method: request.method,
      headers,
      body,
    });

    const responseHeaders = Object.fromEntries(response.headers.entries());

    // Check for HTTP errors (4xx, 5xx)
    if (!this.validateStatus(response.status)) {
      const data = await this.readErrorBody(response);
      throw new HttpStatusError(
        response.status,
        response.statusText,
        responseHeaders,
        data,
        request,
      );
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers: responseHeaders,
      data: await this.readBody(response, request.responseType),
    };
  }

  private async readBody(response: Response, shape: ResponseShape): Promise<unknown> {
    switch (shape) {
      case "void":
        await response.arrayBuffer();
        return undefined;
      case "arraybuffer":
        return response.arrayBuffer();
      case "text":
        return response.text();
      case "json": {
        const text = await response.text();
        return text.trim() === "" ? null : JSON.parse(text);
      }
    }
  }

  /**
   * Error bodies are parsed as JSON when they are JSON, kept as text otherwise
   */
  private async readErrorBody(response: Response): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get("content-type");
    if (text !== "" && contentType?.includes("application/json")) {
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
    return text;
  }

  /**
   * Prepare request body for fetch
   * Handles various body types without double-encoding
   */
  private prepareRequestBody(body: unknown): RequestInit["body"] {
    if (body === null || body === undefined) {
      return undefined;
    }

    // If already a string, use as-is (might be pre-stringified JSON)
    if (typeof body === "string") {
      return body;
    }

    // If it's FormData, Blob, ArrayBuffer, etc., pass as-is
    if (
      body instanceof FormData ||
      body instanceof Blob ||
      body instanceof ArrayBuffer ||
      body instanceof Uint8Array ||
      body instanceof URLSearchParams
    ) {
      return body;
    }

    // For plain objects and arrays, stringify
    return JSON.stringify(body);
  }
}

/**
 * Convenience function to create a Fetch adapter
 *
 * @example
 * ```typescript
 * import { createFetchAdapter } from '@fluent-rest/fetch';
 *
 * const adapter = createFetchAdapter({ validateStatus: (status) => status < 500 });
 * ```
 */
export function createFetchAdapter(options?: FetchAdapterOptions): HttpClientAdapter {
  return new FetchAdapter(options);
}
