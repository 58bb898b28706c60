/**
 * Fluent Node HTTP Client
 *
 * Demonstrates @fluent-rest/node-http with the service read from
 * REMINDERS_* environment variables (REMINDERS_URL, or REMINDERS_HOST and friends).
 */
import { serviceDescriptorFromEnv } from "@fluent-rest/core";
import { createFluentNodeHttp } from "@fluent-rest/node-http";
import dotenv from "dotenv";

dotenv.config();

export function createClient() {
  return createFluentNodeHttp({
    timeout: 10000,
    // client.patch() throws UnsupportedOperationError
    supportedMethods: ["GET", "POST", "PUT", "DELETE"],
  });
}

export function reminderService() {
  return serviceDescriptorFromEnv("REMINDERS").endpoints({
    list: "reminders",
    get: "reminders/{reminderId}",
  });
}

export async function listReminders(limit: number) {
  return createClient()
    .get()
    .from(reminderService())
    .withEndpoint("list")
    .queryParam("limit", limit)
    .executor()
    .accept("application/json")
    .executeForObject("json");
}
