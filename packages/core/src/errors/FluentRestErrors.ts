import type { HttpMethod, HttpRequest } from "../types/http";

/**
 * Custom error classes
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export class UriTemplateError extends Error {
  constructor(
    public readonly variableName: string,
    public readonly template: string,
    message = `No value bound for URI variable '${variableName}' in "${template}"`,
  ) {
    super(message);
    this.name = "UriTemplateError";
  }
}

export class UnsupportedOperationError extends Error {
  constructor(
    public readonly method: HttpMethod,
    reason?: string,
  ) {
    super(
      `${method} method not supported by the configured HTTP adapter${reason ? `: ${reason}` : ""}`,
    );
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Raised by adapters whose library does not reject on error statuses itself
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly headers: Record<string, string>,
    public readonly data: unknown,
    public readonly request: HttpRequest,
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpStatusError";
  }
}

export function isHttpStatusError(error: unknown): error is HttpStatusError {
  return error instanceof HttpStatusError;
}
