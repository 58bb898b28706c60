import { UriTemplateError } from "../errors/FluentRestErrors";

/**
 * `{name}` or `{name:regex}` placeholders
 */
const PLACEHOLDER = /\{([^{}]+)\}/g;

export type UriVariables = ReadonlyMap<string, unknown>;

/**
 * Characters each URI component may carry unencoded, beyond unreserved ones
 * (RFC 3986, sections 2.2 and 3)
 */
const SUB_DELIMS = "!$&'()*+,;=";
const UNRESERVED = /[A-Za-z0-9\-._~]/;

export type UriComponentType =
  | "scheme"
  | "host"
  | "port"
  | "path"
  | "queryParam"
  | "fragment";

const ALLOWED: Record<UriComponentType, string> = {
  scheme: "+.-",
  host: `${SUB_DELIMS}[]:`,
  port: "",
  path: `${SUB_DELIMS}:@/`,
  queryParam: `${SUB_DELIMS.replace("&", "").replace("=", "")}:@/?`,
  fragment: `${SUB_DELIMS}:@/?`,
};

const PCT_ENCODED = /^%[0-9A-Fa-f]{2}/;

/**
 * Percent-encodes the characters that are illegal in the given component.
 * Existing `%XX` escapes are kept.
 */
export function encodeLiteral(value: string, type: UriComponentType): string {
  let result = "";
  let index = 0;
  for (const char of value) {
    if (char === "%" && PCT_ENCODED.test(value.slice(index))) {
      result += char;
    } else if (UNRESERVED.test(char) || ALLOWED[type].includes(char)) {
      result += char;
    } else {
      result += encodeStrict(char);
    }
    index += char.length;
  }
  return result;
}

/**
 * Encodes everything outside the unreserved set, used for expanded variable values
 */
export function encodeStrict(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Names of the placeholders in a template, in order of appearance
 */
export function templateVariableNames(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) =>
    variableName(match[1]),
  );
}

/**
 * Expands the placeholders of one URI component.
 *
 * Literal text is encoded for the component; bound values are encoded strictly.
 * A null or undefined value expands to an empty string.
 *
 * @throws UriTemplateError when a placeholder has no binding, or its value
 * holds a lone UTF-16 surrogate
 */
export function expandTemplate(
  template: string,
  variables: UriVariables,
  type: UriComponentType,
): string {
  let result = "";
  let lastIndex = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    result += encodeLiteral(template.slice(lastIndex, start), type);

    const name = variableName(match[1]);
    if (!variables.has(name)) {
      throw new UriTemplateError(name, template);
    }
    const value = variables.get(name);
    result += encodeValue(name, template, value === null || value === undefined ? "" : String(value));

    lastIndex = start + match[0].length;
  }

  return result + encodeLiteral(template.slice(lastIndex), type);
}

function encodeValue(name: string, template: string, value: string): string {
  try {
    return encodeStrict(value);
  } catch (error) {
    if (error instanceof URIError) {
      throw new UriTemplateError(
        name,
        template,
        `Value of URI variable '${name}' in "${template}" is not well-formed Unicode`,
      );
    }
    throw error;
  }
}

function variableName(placeholder: string): string {
  const colon = placeholder.indexOf(":");
  return (colon === -1 ? placeholder : placeholder.slice(0, colon)).trim();
}
