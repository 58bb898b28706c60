import * as http from "http";
import * as https from "https";

import {
  flattenHeaders,
  hasHeader,
  HTTP_METHODS,
  HttpClientAdapter,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpStatusError,
  InvalidArgumentError,
  normalizeResponseHeaders,
  ResponseShape,
} from "@fluent-rest/core";

export interface NodeHttpAdapterOptions {
  /**
   * Agent for http: targets (default: Node's global agent)
   */
  httpAgent?: http.Agent;

  /**
   * Agent for https: targets (default: Node's global agent)
   */
  httpsAgent?: https.Agent;

  /**
   * Socket timeout in milliseconds; the request is aborted when it elapses
   */
  timeout?: number;

  /**
   * Verbs this adapter accepts (default: all)
   */
  supportedMethods?: readonly HttpMethod[];
}

/**
 * Node.js HTTP/HTTPS adapter for HTTP client abstraction
 * Uses native Node.js http/https modules
 *
 * Responses with a status of 400 or above reject with HttpStatusError.
 */
export class NodeHttpAdapter implements HttpClientAdapter {
  private readonly supportedMethods: readonly HttpMethod[];

  constructor(private readonly options: NodeHttpAdapterOptions = {}) {
    this.supportedMethods = options.supportedMethods ?? HTTP_METHODS;
  }

  supportsMethod(method: HttpMethod): boolean {
    return this.supportedMethods.includes(method);
  }

  request(request: HttpRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      if (!URL.canParse(request.uri)) {
        reject(new InvalidArgumentError(`An absolute URI is required, got "${request.uri}"`));
        return;
      }
      const url = new URL(request.uri);
      const isHttps = url.protocol === "https:";
      const client = isHttps ? https : http;
      const headers = flattenHeaders(request.headers);

      // Prepare body and calculate Content-Length if needed
      const body = prepareRequestBody(request.body);
      if (body !== undefined) {
        // Objects are sent as JSON unless the caller picked a content type
        if (
          typeof body === "string" &&
          typeof request.body !== "string" &&
          !hasHeader(headers, "Content-Type")
        ) {
          headers["Content-Type"] = "application/json";
        }
        if (!hasHeader(headers, "Content-Length")) {
          headers["Content-Length"] = Buffer.byteLength(body).toString();
        }
      }

      const options: http.RequestOptions = {
        hostname: url.hostname,
        port: url.port,
        path: url.pathname + url.search,
        method: request.method,
        headers,
        agent: isHttps ? this.options.httpsAgent : this.options.httpAgent,
        timeout: this.options.timeout,
      };

      const req = client.request(options, (res) => {
        const chunks: Buffer[] = [];

        res.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on("error", reject);

        res.on("end", () => {
          const status = res.statusCode ?? 0;
          const statusText = res.statusMessage ?? "";
          const responseHeaders = normalizeResponseHeaders(res.headers);
          const raw = Buffer.concat(chunks);

          // Check for HTTP errors (4xx, 5xx)
          if (status >= 400) {
            reject(
              new HttpStatusError(
                status,
                statusText,
                responseHeaders,
                readErrorBody(raw, responseHeaders["content-type"]),
                request,
              ),
            );
            return;
          }

          try {
            resolve({
              status,
              statusText,
              headers: responseHeaders,
              data: readBody(raw, request.responseType),
            });
          } catch (error) {
            reject(error);
          }
        });
      });

      req.on("timeout", () => {
        req.destroy(new Error(`Request timed out after ${this.options.timeout}ms`));
      });

      req.on("error", reject);

      if (body !== undefined) {
        req.write(body);
      }

      req.end();
    });
  }
}

function prepareRequestBody(body: unknown): string | Buffer | undefined {
  if (body === null || body === undefined) {
    return undefined;
  }
  if (typeof body === "string" || Buffer.isBuffer(body)) {
    return body;
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  return JSON.stringify(body);
}

function readBody(raw: Buffer, shape: ResponseShape): unknown {
  switch (shape) {
    case "void":
      return undefined;
    case "arraybuffer":
      return raw.buffer.slice(raw.byteOffset, raw.byteOffset + raw.byteLength);
    case "text":
      return raw.toString("utf8");
    case "json": {
      const text = raw.toString("utf8");
      return text.trim() === "" ? null : JSON.parse(text);
    }
  }
}

function readErrorBody(raw: Buffer, contentType: string | undefined): unknown {
  const text = raw.toString("utf8");
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
 * Convenience function to create a Node.js HTTP adapter
 */
export function createNodeHttpAdapter(options?: NodeHttpAdapterOptions): HttpClientAdapter {
  return new NodeHttpAdapter(options);
}
