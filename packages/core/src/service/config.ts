import { z } from "zod";

import { ConfigurationError } from "../errors/FluentRestErrors";
import { hasText } from "../lib/utils";
import { ServiceDescriptor } from "./ServiceDescriptor";

const queryValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Schema of one service entry. Unknown fields are rejected so that typos in
 * configuration files surface at startup.
 */
export const serviceDescriptorConfigSchema = z
  .object({
    scheme: z.string().optional(),
    host: z.string().optional(),
    port: z.union([z.string(), z.number().int().nonnegative()]).optional(),
    contextPath: z.string().optional(),
    version: z.string().optional(),
    endpoints: z.record(z.string().min(1)).optional(),
    commonQueryParams: z
      .record(z.union([queryValueSchema, z.array(queryValueSchema)]))
      .optional(),
    commonFragment: z.string().optional(),
  })
  .strict();

export const serviceDescriptorsConfigSchema = z.record(serviceDescriptorConfigSchema);

export type ServiceDescriptorFileConfig = z.infer<typeof serviceDescriptorConfigSchema>;

/**
 * Builds a descriptor from an untrusted configuration object
 *
 * @throws ConfigurationError listing every invalid field
 */
export function serviceDescriptorFromConfig(config: unknown): ServiceDescriptor {
  const result = serviceDescriptorConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError("Invalid service configuration", formatIssues(result.error));
  }
  return new ServiceDescriptor(result.data);
}

/**
 * Builds every descriptor of a `services` section, keyed by service name
 *
 * @example
 * ```typescript
 * const services = loadServiceDescriptors({
 *   "my-cool-service": {
 *     scheme: "https",
 *     host: "cool-service.com",
 *     endpoints: {
 *       getCoolStuff: "get/stuff/{stuffId}",
 *       postReminder: "reminder/set",
 *     },
 *   },
 * });
 * ```
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadServiceDescriptors(config: unknown): Record<string, ServiceDescriptor> {
  const result = serviceDescriptorsConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError("Invalid services configuration", formatIssues(result.error));
  }

  const services: Record<string, ServiceDescriptor> = {};
  for (const [name, serviceConfig] of Object.entries(result.data)) {
    services[name] = new ServiceDescriptor(serviceConfig);
  }
  return services;
}

/**
 * Builds a descriptor from environment variables named after a prefix:
 * `<PREFIX>_URL`, or `<PREFIX>_SCHEME` (default https), `<PREFIX>_HOST`,
 * `<PREFIX>_PORT` and `<PREFIX>_CONTEXT_PATH`; then `<PREFIX>_VERSION` and
 * `<PREFIX>_FRAGMENT` on top of either.
 *
 * @throws ConfigurationError when neither URL nor host is set
 */
export function serviceDescriptorFromEnv(
  prefix: string,
  env: NodeJS.ProcessEnv = process.env,
): ServiceDescriptor {
  const read = (name: string): string | undefined => {
    const value = env[`${prefix}_${name}`];
    return hasText(value) ? value.trim() : undefined;
  };

  const url = read("URL");
  const host = read("HOST");
  let descriptor: ServiceDescriptor;

  if (url !== undefined) {
    descriptor = ServiceDescriptor.from(url);
  } else if (host !== undefined) {
    descriptor = new ServiceDescriptor({
      scheme: read("SCHEME") ?? "https",
      host,
      port: read("PORT"),
      contextPath: read("CONTEXT_PATH"),
    });
  } else {
    throw new ConfigurationError(
      `${prefix}_URL or ${prefix}_HOST environment variable is required`,
    );
  }

  const version = read("VERSION");
  if (version !== undefined) {
    descriptor.version(version);
  }
  const fragment = read("FRAGMENT");
  if (fragment !== undefined) {
    descriptor.commonFragment(fragment);
  }
  return descriptor;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
  );
}
