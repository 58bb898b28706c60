/**
 * Fluent Fetch Demo
 *
 * Walks through a reminder workflow:
 * 1. POST /api/v1/reminders - Create a reminder
 * 2. GET /api/v1/reminders?due=today - List today's reminders
 * 3. PUT /api/v1/reminders/{id}/complete - Complete it
 * 4. DELETE /api/v1/reminders/{id} - Remove it
 *
 * Set FLUENT_REST_DEBUG=true to log every call.
 */
import { isHttpStatusError } from "@fluent-rest/core";
import { z } from "zod";

import { config, createClient, services } from "./client";

const reminderSchema = z.object({
  id: z.string(),
  text: z.string(),
  done: z.boolean(),
});

const reminderListSchema = z.array(reminderSchema);

async function main() {
  console.log(`Package: ${config.sdkName}`);
  console.log(`Reminder server: ${config.reminderServer}`);

  const client = createClient();
  const { reminders } = services;

  const created = await client
    .post({ text: "water the plants", due: "today" })
    .into(reminders)
    .withEndpoint("create")
    .executor()
    .contentType("application/json")
    .executeForObject(reminderSchema);
  if (!created) {
    throw new Error("Reminder service returned no reminder");
  }
  console.log(`Created ${created.id}: ${created.text}`);

  const today = await client
    .get()
    .from(reminders)
    .withEndpoint("list")
    .queryParam("due", "today")
    .executor()
    .accept("application/json")
    .executeForObject(reminderListSchema);
  console.log(`Due today: ${today?.length ?? 0}`);

  await client
    .put({ done: true })
    .into(reminders)
    .withEndpoint("complete")
    .uriVariable("reminderId", created.id)
    .executor()
    .execute();

  const removed = await client
    .delete()
    .from(reminders)
    .withEndpoint("remove")
    .uriVariable("reminderId", created.id)
    .executor()
    .execute();
  console.log(`Removed with status ${removed.status}`);
}

main().catch((error: unknown) => {
  if (isHttpStatusError(error)) {
    console.error(`Request failed: ${error.message}`, error.data);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
