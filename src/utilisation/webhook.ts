import { readFile } from "fs/promises";
import { z } from "zod";
import { tempoWorklogSchema } from "../api/tempo";
import type { WebhookWorklogEvent } from "../types";
import { getErrorMessage, WebhookParseError } from "../utils/error-handling";
import { isPlainObject } from "../utils/guards";

const envelopeSchema = z.object({
  eventId: z.union([z.string(), z.number()]).transform(String),
  eventType: z.string(),
  payload: tempoWorklogSchema,
});

/** Accepts a JSON array of `{eventId, eventType, payload}` envelopes, or a single envelope. */
export function parseWebhookEvents(text: string): WebhookWorklogEvent[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new WebhookParseError(`Webhook events are not valid JSON: ${getErrorMessage(e)}`);
  }

  let items: unknown[];
  if (Array.isArray(data)) {
    items = data;
  } else if (isPlainObject(data)) {
    items = [data];
  } else {
    throw new WebhookParseError("Webhook events must be a JSON array or a single event object");
  }

  return items.map((item, index): WebhookWorklogEvent => {
    const parsed = envelopeSchema.safeParse(item);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(event)"}: ${issue.message}`);
      throw new WebhookParseError(`Webhook event #${index} is malformed – ${problems.join("; ")}`);
    }
    return { kind: "webhook", ...parsed.data };
  });
}

export async function readWebhookEvents(path: string): Promise<WebhookWorklogEvent[]> {
  return parseWebhookEvents(await readFile(path, "utf8"));
}
