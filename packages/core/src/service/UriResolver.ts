import { InvalidArgumentError } from "../errors/FluentRestErrors";
import { entriesOf, hasText, isBlank } from "../lib/utils";
import {
  copyUriComponents,
  normalizeQueryValues,
  QueryParamsInput,
  QueryValue,
  toQueryParamMap,
  toUriString,
  UriComponents,
} from "../uri/UriComponents";

/**
 * Mutators shared by every stage that accumulates call-specific URI parts
 */
export interface UriPartsBuilder<Self> {
  /**
   * Appends values to a query parameter; values already present, common ones
   * included, are kept. No values means no change.
   */
  queryParam(key: string, ...values: QueryValue[]): Self;
  queryParam(key: string, values: readonly QueryValue[]): Self;

  /**
   * Replaces every accumulated query parameter, common ones included.
   * null or undefined leaves them untouched.
   */
  queryParams(params: QueryParamsInput | null | undefined): Self;

  /**
   * Overrides the fragment; null, undefined or an empty string removes it
   */
  fragment(fragment: string | null | undefined): Self;

  uriVariable(key: string, value: unknown): Self;

  /**
   * Binds several variables; null or undefined is ignored
   */
  uriVariables(
    variables: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>> | null | undefined,
  ): Self;
}

/**
 * Accumulates the parts of one URI on top of a ServiceDescriptor's defaults.
 *
 * Each instance owns its components and variables, so resolvers created from
 * the same descriptor never see each other's additions.
 *
 * @example
 * ```typescript
 * const uri = service
 *   .resolver("updateCoolStuff")
 *   .uriVariable("stuffId", "123")
 *   .queryParam("dryRun", true)
 *   .build();
 * ```
 */
export class UriResolver implements UriPartsBuilder<UriResolver> {
  private readonly components: UriComponents;
  private readonly variables = new Map<string, unknown>();

  constructor(components: UriComponents) {
    this.components = copyUriComponents(components);
  }

  queryParam(key: string, ...values: QueryValue[]): UriResolver;
  queryParam(key: string, values: readonly QueryValue[]): UriResolver;
  queryParam(
    key: string,
    ...values: (QueryValue | readonly QueryValue[])[]
  ): UriResolver {
    if (isBlank(key)) {
      throw new InvalidArgumentError("Query param key must not be null or empty");
    }
    const added = values.flatMap((value) => normalizeQueryValues(value));
    if (added.length === 0) {
      return this;
    }
    const { queryParams } = this.components;
    queryParams.set(key, [...(queryParams.get(key) ?? []), ...added]);
    return this;
  }

  queryParams(params: QueryParamsInput | null | undefined): UriResolver {
    if (params === null || params === undefined) {
      return this;
    }
    this.components.queryParams = toQueryParamMap(params);
    return this;
  }

  fragment(fragment: string | null | undefined): UriResolver {
    if (hasText(fragment)) {
      this.components.fragment = fragment;
    } else {
      delete this.components.fragment;
    }
    return this;
  }

  uriVariable(key: string, value: unknown): UriResolver {
    if (isBlank(key)) {
      throw new InvalidArgumentError("URI variable name must not be null or empty");
    }
    this.variables.set(key, value);
    return this;
  }

  uriVariables(
    variables: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>> | null | undefined,
  ): UriResolver {
    if (variables === null || variables === undefined) {
      return this;
    }
    for (const [key, value] of entriesOf(variables)) {
      this.variables.set(key, value);
    }
    return this;
  }

  /**
   * Expands every placeholder and renders the URI as written. Explicit ports,
   * empty paths and relative references are kept; nothing is normalised.
   *
   * @throws UriTemplateError when a placeholder has no binding
   */
  build(): string {
    return toUriString(this.components, this.variables);
  }

  /**
   * Same as {@link build}
   */
  toUriString(): string {
    return this.build();
  }
}
