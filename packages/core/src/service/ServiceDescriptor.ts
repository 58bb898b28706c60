import { InvalidArgumentError } from "../errors/FluentRestErrors";
import { entriesOf, hasText, isBlank } from "../lib/utils";
import {
  copyQueryParams,
  normalizeQueryValues,
  parseUriString,
  QueryParamMap,
  QueryParamsInput,
  QueryValue,
  toQueryParamMap,
} from "../uri/UriComponents";
import { UriResolver } from "./UriResolver";

/**
 * Plain description of a service, the shape used by configuration files
 */
export interface ServiceDescriptorConfig {
  scheme?: string;
  host?: string;
  port?: string | number;
  contextPath?: string;
  version?: string;
  /** Endpoint key → path template, e.g. `{ getStuff: "stuff/{stuffId}" }` */
  endpoints?: ReadonlyMap<string, string> | Readonly<Record<string, string>>;
  commonQueryParams?: QueryParamsInput;
  commonFragment?: string;
}

/**
 * Snapshot returned by {@link ServiceDescriptor.describe}
 */
export interface ServiceDescription {
  scheme?: string;
  host?: string;
  port?: string;
  contextPath?: string;
  version?: string;
  endpoints: Record<string, string>;
  commonQueryParams: Record<string, (string | null)[]>;
  commonFragment?: string;
}

/**
 * Reusable template for a family of endpoints sharing scheme, host, port,
 * context path and API version.
 *
 * URIs built from a descriptor have the shape
 * `scheme://host:port/contextPath/version/endpoint?query#fragment`, where the
 * endpoint is looked up by key and may hold `{variable}` placeholders.
 *
 * Configure once, then share: every {@link resolver} call gets its own copy
 * of the defaults.
 *
 * @example
 * ```typescript
 * const coolService = new ServiceDescriptor({
 *   scheme: "https",
 *   host: "cool-service.com",
 *   endpoints: { updateCoolStuff: "update/stuff/{stuffId}" },
 * });
 *
 * coolService.resolver("updateCoolStuff").uriVariable("stuffId", "123").build();
 * // https://cool-service.com/update/stuff/123
 * ```
 *
 * @example
 * ```typescript
 * // Built up step by step; without scheme and host the result is a relative reference
 * const local = new ServiceDescriptor().contextPath("api").endpoint("health", "health");
 * local.resolver("health").build(); // /api/health
 * ```
 *
 * @example
 * ```typescript
 * // From a URI: its path becomes the context path, its query and fragment the defaults
 * const search = ServiceDescriptor.from("https://search.example.com/api?lang=en#top")
 *   .version("v2")
 *   .endpoint("byTag", "tags/{tag}");
 * ```
 */
export class ServiceDescriptor {
  private schemeName?: string;
  private hostName?: string;
  private portValue?: string;
  private basePath?: string;
  private apiVersion?: string;
  private readonly endpointMap = new Map<string, string>();
  private queryDefaults: QueryParamMap = new Map();
  private fragmentDefault?: string;

  constructor(config: ServiceDescriptorConfig = {}) {
    this.scheme(config.scheme);
    this.host(config.host);
    this.port(config.port);
    this.contextPath(config.contextPath);
    this.apiVersion = blankToUndefined(config.version);
    if (config.endpoints) {
      this.endpoints(config.endpoints);
    }
    if (config.commonQueryParams) {
      this.queryDefaults = toQueryParamMap(config.commonQueryParams);
    }
    this.fragmentDefault = blankToUndefined(config.commonFragment);
  }

  /**
   * Creates a descriptor from a URI. Scheme, host, port, query and fragment are
   * taken as they are; everything between the authority and the query becomes
   * the context path. Version and endpoints start empty.
   *
   * @throws InvalidArgumentError when the URI is null, undefined or blank
   */
  static from(uri: string | URL | null | undefined): ServiceDescriptor {
    if (uri === null || uri === undefined) {
      throw new InvalidArgumentError("uri must not be null");
    }
    const uriString = typeof uri === "string" ? uri : uri.href;
    if (isBlank(uriString)) {
      throw new InvalidArgumentError("uri must not be null or empty");
    }

    const components = parseUriString(uriString.trim());
    const descriptor = new ServiceDescriptor({
      scheme: components.scheme,
      host: components.host,
      port: components.port,
      contextPath: components.path,
      commonFragment: components.fragment,
    });
    descriptor.queryDefaults = components.queryParams;
    return descriptor;
  }

  /**
   * Sets the scheme, e.g. `https`; null or blank removes it
   */
  scheme(scheme: string | null | undefined): this {
    this.schemeName = blankToUndefined(scheme);
    return this;
  }

  host(host: string | null | undefined): this {
    this.hostName = blankToUndefined(host);
    return this;
  }

  /**
   * Sets the port; it is rendered only when set
   */
  port(port: string | number | null | undefined): this {
    this.portValue = blankToUndefined(
      port === null || port === undefined ? undefined : String(port),
    );
    return this;
  }

  /**
   * Sets the path placed before the version and endpoint segments
   */
  contextPath(contextPath: string | null | undefined): this {
    this.basePath = blankToUndefined(contextPath);
    return this;
  }

  /**
   * Sets (or overrides) the API version, placed after the context path
   */
  version(version: string | null | undefined): this {
    this.apiVersion = blankToUndefined(version);
    return this;
  }

  /**
   * Registers an endpoint, replacing any value under the same key
   */
  endpoint(key: string, value: string): this {
    if (isBlank(key)) {
      throw new InvalidArgumentError("endpoint key must not be null or empty");
    }
    if (isBlank(value)) {
      throw new InvalidArgumentError("endpoint value must not be null or empty");
    }
    this.endpointMap.set(key, value);
    return this;
  }

  /**
   * Registers several endpoints, replacing values under the same keys
   */
  endpoints(
    endpoints: ReadonlyMap<string, string> | Readonly<Record<string, string>> | null | undefined,
  ): this {
    if (endpoints === null || endpoints === undefined) {
      throw new InvalidArgumentError("endpoints must not be null");
    }
    for (const [key, value] of entriesOf(endpoints)) {
      this.endpoint(key, value);
    }
    return this;
  }

  /**
   * Adds values to a common query param. Common params apply to every URI
   * resolved from this descriptor; values given later at call time are added
   * after them.
   */
  commonQueryParam(key: string, ...values: QueryValue[]): this;
  commonQueryParam(key: string, values: readonly QueryValue[]): this;
  commonQueryParam(
    key: string,
    ...values: (QueryValue | readonly QueryValue[])[]
  ): this {
    if (isBlank(key)) {
      throw new InvalidArgumentError("query param key must not be null or empty");
    }
    const added = values.flatMap((value) => normalizeQueryValues(value));
    if (added.length > 0) {
      this.queryDefaults.set(key, [...(this.queryDefaults.get(key) ?? []), ...added]);
    }
    return this;
  }

  /**
   * Adds every entry of the given params to the common query params
   */
  commonQueryParams(params: QueryParamsInput | null | undefined): this {
    if (params === null || params === undefined) {
      throw new InvalidArgumentError("query params must not be null");
    }
    for (const [key, values] of toQueryParamMap(params)) {
      this.queryDefaults.set(key, [...(this.queryDefaults.get(key) ?? []), ...values]);
    }
    return this;
  }

  /**
   * Sets the fragment used when a call does not give one; null removes it
   */
  commonFragment(fragment: string | null | undefined): this {
    this.fragmentDefault = blankToUndefined(fragment);
    return this;
  }

  /**
   * Starts resolving a URI for the given endpoint.
   *
   * An unknown, null or blank key resolves without an endpoint segment.
   */
  resolver(endpointKey?: string | null): UriResolver {
    const endpoint = hasText(endpointKey) ? this.endpointMap.get(endpointKey) : undefined;

    return new UriResolver({
      scheme: this.schemeName,
      host: this.hostName,
      port: this.portValue,
      path: joinPath(this.basePath, this.apiVersion, endpoint),
      queryParams: copyQueryParams(this.queryDefaults),
      fragment: this.fragmentDefault,
    });
  }

  describe(): ServiceDescription {
    const description: ServiceDescription = {
      endpoints: Object.fromEntries(this.endpointMap),
      commonQueryParams: Object.fromEntries(copyQueryParams(this.queryDefaults)),
    };
    if (this.schemeName !== undefined) description.scheme = this.schemeName;
    if (this.hostName !== undefined) description.host = this.hostName;
    if (this.portValue !== undefined) description.port = this.portValue;
    if (this.basePath !== undefined) description.contextPath = this.basePath;
    if (this.apiVersion !== undefined) description.version = this.apiVersion;
    if (this.fragmentDefault !== undefined) description.commonFragment = this.fragmentDefault;
    return description;
  }
}

function blankToUndefined(value: string | null | undefined): string | undefined {
  return hasText(value) ? value : undefined;
}

/**
 * Context path as written, then each segment with its outer slashes trimmed.
 * Blank parts are skipped and repeated slashes collapse.
 */
export function joinPath(
  contextPath: string | undefined,
  ...segments: (string | undefined)[]
): string {
  let path = contextPath ?? "";
  for (const segment of segments) {
    const trimmed = segment?.trim().replace(/^\/+|\/+$/g, "");
    if (trimmed) {
      path = path.endsWith("/") ? `${path}${trimmed}` : `${path}/${trimmed}`;
    }
  }
  return path.replace(/\/{2,}/g, "/");
}
