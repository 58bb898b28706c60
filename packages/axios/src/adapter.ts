import { AxiosInstance, ResponseType as AxiosResponseType } from "axios";

import {
  flattenHeaders,
  HTTP_METHODS,
  HttpClientAdapter,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  normalizeResponseHeaders,
  ResponseShape,
} from "@fluent-rest/core";

export interface AxiosAdapterOptions {
  /**
   * Verbs this adapter accepts (default: all)
   */
  supportedMethods?: readonly HttpMethod[];
}

const AXIOS_RESPONSE_TYPES: Record<ResponseShape, AxiosResponseType> = {
  json: "json",
  text: "text",
  arraybuffer: "arraybuffer",
  void: "text",
};

/**
 * Axios adapter for HTTP client abstraction
 * Wraps an Axios instance to provide the HttpClientAdapter interface
 *
 * Errors raised by axios (including its rejection of error statuses) propagate unchanged.
 */
export class AxiosAdapter implements HttpClientAdapter {
  private readonly supportedMethods: readonly HttpMethod[];

  constructor(
    private readonly axiosInstance: AxiosInstance,
    options: AxiosAdapterOptions = {},
  ) {
    this.supportedMethods = options.supportedMethods ?? HTTP_METHODS;
  }

  supportsMethod(method: HttpMethod): boolean {
    return this.supportedMethods.includes(method);
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.axiosInstance.request<unknown>({
      method: request.method,
      url: request.uri,
      headers: flattenHeaders(request.headers),
      data: request.body,
      responseType: AXIOS_RESPONSE_TYPES[request.responseType],
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers: normalizeResponseHeaders(response.headers),
      data: request.responseType === "void" ? undefined : response.data,
    };
  }
}

/**
 * Convenience function to create an Axios adapter
 *
 * @example
 * ```typescript
 * import axios from 'axios';
 * import { createAxiosAdapter } from '@fluent-rest/axios';
 *
 * const adapter = createAxiosAdapter(axios.create({ timeout: 5000 }));
 * ```
 */
export function createAxiosAdapter(
  axiosInstance: AxiosInstance,
  options?: AxiosAdapterOptions,
): HttpClientAdapter {
  return new AxiosAdapter(axiosInstance, options);
}
