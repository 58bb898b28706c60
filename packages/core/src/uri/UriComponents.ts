import { entriesOf, hasText } from "../lib/utils";
import { expandTemplate, UriVariables } from "./UriTemplate";

/**
 * Value of a query parameter; null renders as a bare key (`?flag`)
 */
export type QueryValue = string | number | boolean | null;

/**
 * Ordered multi-valued query parameters
 */
export type QueryParamMap = Map<string, (string | null)[]>;

export type QueryParamsInput =
  | ReadonlyMap<string, readonly QueryValue[]>
  | Readonly<Record<string, QueryValue | readonly QueryValue[]>>
  | URLSearchParams;

/**
 * URI parts before template expansion
 */
export interface UriComponents {
  scheme?: string;
  host?: string;
  port?: string;
  path: string;
  queryParams: QueryParamMap;
  fragment?: string;
}

// scheme, user info, host, port, path, query, fragment
const URI_PATTERN =
  /^(?:([^:/?#]+):)?(?:\/\/(?:([^@[/?#]*)@)?(\[[0-9A-Fa-f:.]*[%0-9A-Za-z]*\]|[^[/?#:]*)(?::(\{[^}]+\}?|[^/?#]*))?)?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

const QUERY_PARAM_PATTERN = /([^&=]+)(=?)([^&]+)?/g;

/**
 * Splits a URI string into its components. `{placeholders}` survive untouched.
 * User info is not carried over.
 */
export function parseUriString(uri: string): UriComponents {
  const match = URI_PATTERN.exec(uri);
  const components: UriComponents = {
    path: "",
    queryParams: new Map(),
  };
  if (!match) {
    components.path = uri;
    return components;
  }

  const [, scheme, , host, port, path, query, fragment] = match;
  if (hasText(scheme)) components.scheme = scheme;
  if (hasText(host)) components.host = host;
  if (hasText(port)) components.port = port;
  components.path = path ?? "";
  if (query !== undefined) {
    components.queryParams = parseQueryString(query);
  }
  if (hasText(fragment)) components.fragment = fragment;

  return components;
}

/**
 * `a=1&a=2&flag` → { a: ["1", "2"], flag: [null] }, values kept as written
 */
export function parseQueryString(query: string): QueryParamMap {
  const params: QueryParamMap = new Map();
  for (const match of query.matchAll(QUERY_PARAM_PATTERN)) {
    const [, name, equals, value] = match;
    const parsed = value ?? (equals ? "" : null);
    params.set(name, [...(params.get(name) ?? []), parsed]);
  }
  return params;
}

export function toQueryParamMap(input: QueryParamsInput): QueryParamMap {
  const params: QueryParamMap = new Map();
  if (input instanceof URLSearchParams) {
    input.forEach((value, key) => {
      params.set(key, [...(params.get(key) ?? []), value]);
    });
    return params;
  }

  for (const [key, value] of entriesOf<QueryValue | readonly QueryValue[]>(input)) {
    const values = normalizeQueryValues(value);
    if (values.length > 0) {
      params.set(key, values);
    }
  }
  return params;
}

export function normalizeQueryValues(
  value: QueryValue | readonly QueryValue[],
): (string | null)[] {
  const values: readonly QueryValue[] = isQueryValueList(value) ? value : [value];
  return values.map((item) => (item === null ? null : String(item)));
}

export function copyQueryParams(params: QueryParamMap): QueryParamMap {
  return new Map(Array.from(params, ([key, values]) => [key, [...values]]));
}

export function copyUriComponents(components: UriComponents): UriComponents {
  return { ...components, queryParams: copyQueryParams(components.queryParams) };
}

/**
 * Renders the components as a URI string, expanding placeholders with the given variables
 *
 * @throws UriTemplateError when a placeholder has no binding
 */
export function toUriString(
  components: UriComponents,
  variables: UriVariables,
): string {
  let uri = "";

  if (hasText(components.scheme)) {
    uri += `${expandTemplate(components.scheme, variables, "scheme")}:`;
  }

  const hasAuthority = hasText(components.host) || hasText(components.port);
  if (hasAuthority) {
    uri += "//";
    if (hasText(components.host)) {
      uri += expandTemplate(components.host, variables, "host");
    }
    if (hasText(components.port)) {
      uri += `:${expandTemplate(components.port, variables, "port")}`;
    }
  }

  // Without a scheme the reference is rooted at "/"; `mailto:` style paths stay as written
  const path = expandTemplate(components.path, variables, "path");
  const rooted = hasAuthority || !hasText(components.scheme);
  if (rooted && path !== "" && !path.startsWith("/")) {
    uri += "/";
  }
  uri += path;

  const query = renderQuery(components.queryParams, variables);
  if (query !== "") {
    uri += `?${query}`;
  }

  if (hasText(components.fragment)) {
    uri += `#${expandTemplate(components.fragment, variables, "fragment")}`;
  }

  return uri;
}

function renderQuery(params: QueryParamMap, variables: UriVariables): string {
  const pairs: string[] = [];
  for (const [key, values] of params) {
    const name = expandTemplate(key, variables, "queryParam");
    for (const value of values) {
      pairs.push(
        value === null ? name : `${name}=${expandTemplate(value, variables, "queryParam")}`,
      );
    }
  }
  return pairs.join("&");
}

function isQueryValueList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value);
}
