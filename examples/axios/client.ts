/**
 * Fluent Axios Client
 *
 * Demonstrates @fluent-rest/axios - the fluent call chain on top of an
 * existing Axios instance, with the reminder service described once and
 * shared by every call.
 */
import { createFluentAxios } from "@fluent-rest/axios";
import { ServiceDescriptor } from "@fluent-rest/core";
import axios from "axios";
import dotenv from "dotenv";

dotenv.config();

// Configuration from environment
const REMINDER_SERVER_URL =
  process.env.REMINDER_SERVER_URL || "http://localhost:3101/api";

export const reminderService = ServiceDescriptor.from(REMINDER_SERVER_URL)
  .version("v1")
  .endpoints({
    list: "reminders",
    get: "reminders/{reminderId}",
  });

/**
 * Create a fluent client sending through Axios
 */
export function createClient() {
  const baseClient = axios.create({
    timeout: 30000,
  });

  return createFluentAxios(baseClient, {
    defaultHeaders: { "User-Agent": "demo-axios" },
  });
}

export async function getReminder(reminderId: string) {
  return createClient()
    .get()
    .from(reminderService)
    .withEndpoint("get")
    .uriVariable("reminderId", reminderId)
    .executor()
    .accept("application/json")
    .executeForObject("json");
}

// Export configuration for logging
export const config = {
  reminderServerUrl: REMINDER_SERVER_URL,
  sdkName: "@fluent-rest/axios",
};
