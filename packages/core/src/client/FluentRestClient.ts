import { InvalidArgumentError, UnsupportedOperationError } from "../errors/FluentRestErrors";
import type { Logger } from "../lib/logger";
import { isBlank } from "../lib/utils";
import { ServiceDescriptor } from "../service/ServiceDescriptor";
import type { UriPartsBuilder } from "../service/UriResolver";
import { UriResolver } from "../service/UriResolver";
import type { HeaderInput } from "../types/config";
import { resolveLogger } from "../types/config";
import type { HttpClientAdapter, HttpMethod } from "../types/http";
import { normalizeQueryValues } from "../uri/UriComponents";
import type { QueryParamsInput, QueryValue } from "../uri/UriComponents";
import { RequestAssembler } from "./RequestAssembler";

export interface FluentRestClientOptions {
  logger?: Logger;
  defaultHeaders?: HeaderInput;
}

/**
 * Target of a GET or DELETE call
 */
export interface UriStarter {
  from(uri: string | URL): ExecutorUriBuilder;
  from(service: ServiceDescriptor): ServiceEndpointSelector;
}

/**
 * Target of a POST, PUT or PATCH call
 */
export interface UriBodyStarter {
  into(uri: string | URL): ExecutorUriBuilder;
  into(service: ServiceDescriptor): ServiceEndpointSelector;
}

/**
 * Picks which of a service's endpoints the call goes to
 */
export interface ServiceEndpointSelector {
  /**
   * An unknown, null or blank key resolves without an endpoint segment
   */
  withEndpoint(key: string | null | undefined): ExecutorUriBuilder;
  withoutEndpoint(): ExecutorUriBuilder;
}

interface CallContext {
  adapter: HttpClientAdapter;
  method: HttpMethod;
  body?: unknown;
  logger: Logger;
  defaultHeaders?: HeaderInput;
}

/**
 * Issues REST calls through an HttpClientAdapter with a single chained expression.
 *
 * A call goes through these stages:
 * 1. verb: `get()`, `delete()`, `post(body)`, `put(body)`, `patch(body)`
 * 2. target: `from(...)` / `into(...)` with a URI or a ServiceDescriptor
 *    (then `withEndpoint(key)` or `withoutEndpoint()` for a descriptor)
 * 3. URI parts: query params, fragment, URI variables, then `executor()`
 * 4. request parts: headers and media types
 * 5. `execute(...)` / `executeForObject(...)`
 *
 * Every verb call starts a new, independent chain.
 *
 * @example
 * ```typescript
 * const stuff = await client
 *   .get()
 *   .from("https://cool-service.com/get/stuff/{stuffId}")
 *   .uriVariable("stuffId", "123")
 *   .executor()
 *   .accept("application/json")
 *   .executeForObject<CoolStuff>("json");
 * ```
 *
 * @example
 * ```typescript
 * const updated = await client
 *   .put(coolStuff)
 *   .into(coolService)
 *   .withEndpoint("updateCoolStuff")
 *   .uriVariable("stuffId", "123")
 *   .executor()
 *   .header("locale", "de_DE")
 *   .executeForObject(coolStuffSchema);
 * ```
 */
export class FluentRestClient {
  private readonly logger: Logger;
  private readonly defaultHeaders?: HeaderInput;

  constructor(
    private readonly adapter: HttpClientAdapter,
    options: FluentRestClientOptions = {},
  ) {
    this.logger = options.logger ?? resolveLogger();
    this.defaultHeaders = options.defaultHeaders;
  }

  get(): UriStarter {
    return this.start("GET");
  }

  delete(): UriStarter {
    return this.start("DELETE");
  }

  post(body?: unknown): UriBodyStarter {
    return this.start("POST", body);
  }

  put(body?: unknown): UriBodyStarter {
    return this.start("PUT", body);
  }

  /**
   * @throws UnsupportedOperationError when the adapter cannot send PATCH
   */
  patch(body?: unknown): UriBodyStarter {
    return this.start("PATCH", body);
  }

  /**
   * Fails before any URI work when the adapter reports the verb as unsupported
   */
  private start(method: HttpMethod, body?: unknown): CallStarter {
    if (this.adapter.supportsMethod?.(method) === false) {
      throw new UnsupportedOperationError(method);
    }
    return new CallStarter({
      adapter: this.adapter,
      method,
      body,
      logger: this.logger,
      defaultHeaders: this.defaultHeaders,
    });
  }
}

class CallStarter implements UriStarter, UriBodyStarter {
  constructor(private readonly context: CallContext) {}

  from(uri: string | URL): ExecutorUriBuilder;
  from(service: ServiceDescriptor): ServiceEndpointSelector;
  from(
    target: string | URL | ServiceDescriptor,
  ): ExecutorUriBuilder | ServiceEndpointSelector {
    return this.target(target);
  }

  into(uri: string | URL): ExecutorUriBuilder;
  into(service: ServiceDescriptor): ServiceEndpointSelector;
  into(
    target: string | URL | ServiceDescriptor,
  ): ExecutorUriBuilder | ServiceEndpointSelector {
    return this.target(target);
  }

  private target(
    target: string | URL | ServiceDescriptor | null | undefined,
  ): ExecutorUriBuilder | ServiceEndpointSelector {
    if (target === null || target === undefined) {
      throw new InvalidArgumentError("target uri or service must not be null");
    }
    if (target instanceof ServiceDescriptor) {
      return new EndpointSelector(this.context, target);
    }
    if (typeof target === "string" && isBlank(target)) {
      throw new InvalidArgumentError("uri must not be null or empty");
    }
    return new ExecutorUriBuilder(this.context, ServiceDescriptor.from(target).resolver());
  }
}

class EndpointSelector implements ServiceEndpointSelector {
  constructor(
    private readonly context: CallContext,
    private readonly service: ServiceDescriptor,
  ) {}

  withEndpoint(key: string | null | undefined): ExecutorUriBuilder {
    return new ExecutorUriBuilder(this.context, this.service.resolver(key));
  }

  withoutEndpoint(): ExecutorUriBuilder {
    return new ExecutorUriBuilder(this.context, this.service.resolver());
  }
}

/**
 * URI stage of a call: the UriResolver mutators plus `executor()`
 */
export class ExecutorUriBuilder implements UriPartsBuilder<ExecutorUriBuilder> {
  /** @internal */
  constructor(
    private readonly context: CallContext,
    private readonly resolver: UriResolver,
  ) {}

  queryParam(key: string, ...values: QueryValue[]): ExecutorUriBuilder;
  queryParam(key: string, values: readonly QueryValue[]): ExecutorUriBuilder;
  queryParam(
    key: string,
    ...values: (QueryValue | readonly QueryValue[])[]
  ): ExecutorUriBuilder {
    this.resolver.queryParam(
      key,
      values.flatMap((value) => normalizeQueryValues(value)),
    );
    return this;
  }

  queryParams(params: QueryParamsInput | null | undefined): ExecutorUriBuilder {
    this.resolver.queryParams(params);
    return this;
  }

  fragment(fragment: string | null | undefined): ExecutorUriBuilder {
    this.resolver.fragment(fragment);
    return this;
  }

  uriVariable(key: string, value: unknown): ExecutorUriBuilder {
    this.resolver.uriVariable(key, value);
    return this;
  }

  uriVariables(
    variables: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>> | null | undefined,
  ): ExecutorUriBuilder {
    this.resolver.uriVariables(variables);
    return this;
  }

  /**
   * Builds the URI and moves on to the request stage
   *
   * @throws UriTemplateError when a placeholder has no binding
   */
  executor(): RequestAssembler {
    return new RequestAssembler(this.context, this.resolver.build());
  }
}
