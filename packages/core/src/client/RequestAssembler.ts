import type { ZodTypeAny } from "zod";

import { InvalidArgumentError } from "../errors/FluentRestErrors";
import type { Logger } from "../lib/logger";
import { appendHeader, entriesOf, isBlank, removeHeader, setHeader } from "../lib/utils";
import type { HeaderInput } from "../types/config";
import type {
  AnyResponseType,
  HeaderValues,
  HttpClientAdapter,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  ResponseShape,
  ResponseType,
} from "../types/http";

export interface RequestAssemblerContext {
  adapter: HttpClientAdapter;
  method: HttpMethod;
  body?: unknown;
  logger: Logger;
  defaultHeaders?: HeaderInput;
}

/**
 * Collects headers for a resolved URI and hands the finished request to the adapter.
 *
 * `header()` and `headers()` always add to what is there; `accept()`,
 * `acceptCharset()` and `contentType()` replace their header.
 */
export class RequestAssembler {
  private headerValues: Record<string, string[]> = {};

  constructor(
    private readonly context: RequestAssemblerContext,
    private readonly uri: string,
  ) {
    this.headers(context.defaultHeaders);
  }

  header(name: string, ...values: string[]): this {
    if (isBlank(name)) {
      throw new InvalidArgumentError("header name must not be null or empty");
    }
    if (values.length > 0) {
      this.headerValues = appendHeader(this.headerValues, name, values);
    }
    return this;
  }

  /**
   * Merges the given headers into the ones already collected
   */
  headers(headers: HeaderInput | null | undefined): this {
    if (headers === null || headers === undefined) {
      return this;
    }
    for (const [name, value] of headerEntries(headers)) {
      this.header(name, ...(typeof value === "string" ? [value] : value));
    }
    return this;
  }

  accept(...mediaTypes: string[]): this {
    return this.replaceHeader("Accept", mediaTypes);
  }

  acceptCharset(...charsets: string[]): this {
    return this.replaceHeader(
      "Accept-Charset",
      charsets.map((charset) => charset.toLowerCase()),
    );
  }

  contentType(mediaType: string): this {
    return this.replaceHeader("Content-Type", [mediaType]);
  }

  /**
   * The request as it would be sent, without sending it
   */
  toRequest(responseType: ResponseShape = "void"): HttpRequest {
    const headers: Record<string, readonly string[]> = {};
    for (const [name, values] of Object.entries(this.headerValues)) {
      headers[name] = Object.freeze([...values]);
    }
    const request: HttpRequest = {
      method: this.context.method,
      uri: this.uri,
      headers: Object.freeze(headers) satisfies HeaderValues,
      responseType,
    };
    return Object.freeze(
      this.context.body === undefined ? request : { ...request, body: this.context.body },
    );
  }

  /**
   * Sends the request, discarding the response body
   */
  execute(): Promise<HttpResponse<void>>;
  /**
   * Sends the request and reads the body as the given shape. A zod schema
   * reads JSON and parses it through the schema.
   */
  execute<T>(type: ResponseType<T>): Promise<HttpResponse<T>>;
  execute(type: AnyResponseType = "void"): Promise<HttpResponse<unknown>> {
    return this.exchange(type);
  }

  /**
   * Sends the request and returns only the body, or null when there is none
   */
  executeForObject(): Promise<null>;
  executeForObject<T>(type: ResponseType<T>): Promise<T | null>;
  async executeForObject(type: AnyResponseType = "void"): Promise<unknown> {
    const response = await this.exchange(type);
    return response.data ?? null;
  }

  private replaceHeader(name: string, values: readonly string[]): this {
    this.headerValues =
      values.length === 0
        ? removeHeader(this.headerValues, name)
        : setHeader(this.headerValues, name, [values.join(", ")]);
    return this;
  }

  private async exchange(type: AnyResponseType): Promise<HttpResponse<unknown>> {
    const shape: ResponseShape = typeof type === "string" ? type : "json";
    const request = this.toRequest(shape);
    const target = `${request.method} ${request.uri}`;

    this.context.logger.debug(target);
    let response: HttpResponse<unknown>;
    try {
      response = await this.context.adapter.request(request);
    } catch (error) {
      this.context.logger.debug(`${target} failed`, error);
      throw error;
    }
    this.context.logger.debug(`${target} -> ${response.status}`);

    if (shape === "void") {
      return { ...response, data: undefined };
    }
    if (isSchema(type)) {
      return { ...response, data: type.parse(response.data) };
    }
    return response;
  }
}

function isSchema(type: AnyResponseType): type is ZodTypeAny {
  return typeof type !== "string";
}

function headerEntries(headers: HeaderInput): [string, string | readonly string[]][] {
  if (headers instanceof Headers) {
    return Array.from(headers.entries());
  }
  return entriesOf<string | readonly string[]>(headers);
}
