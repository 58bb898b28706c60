/**
 * Fluent Fetch Client
 *
 * Demonstrates @fluent-rest/fetch - the fluent call chain on the fetch API.
 * Services come from a `services` configuration object, validated at startup.
 */
import { loadServiceDescriptors } from "@fluent-rest/core";
import { createFluentFetch } from "@fluent-rest/fetch";
import dotenv from "dotenv";

dotenv.config();

// Configuration from environment
const REMINDER_HOST = process.env.REMINDER_HOST || "localhost";
const REMINDER_PORT = process.env.REMINDER_PORT || "3101";

export const services = loadServiceDescriptors({
  reminders: {
    scheme: "http",
    host: REMINDER_HOST,
    port: REMINDER_PORT,
    contextPath: "api",
    version: "v1",
    endpoints: {
      list: "reminders",
      create: "reminders",
      complete: "reminders/{reminderId}/complete",
      remove: "reminders/{reminderId}",
    },
    commonQueryParams: { client: "demo-fetch" },
  },
});

/**
 * Create a fluent client sending with fetch
 */
export function createClient() {
  return createFluentFetch({
    defaultHeaders: { "User-Agent": "demo-fetch" },
  });
}

// Export configuration for logging
export const config = {
  reminderServer: `http://${REMINDER_HOST}:${REMINDER_PORT}`,
  sdkName: "@fluent-rest/fetch",
};
