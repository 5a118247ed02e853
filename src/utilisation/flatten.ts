import type { BulkWorklogEvent, RawWorklogEvent, TempoWorklog, WebhookWorklogEvent, WorklogRecord } from "../types";
import { secondsToHours } from "../utils/time-formatting";
import type { AccountNameLookup } from "./resolve";

export const UNKNOWN = "Unknown";

const WORK_TYPE_ATTRIBUTE = "_WorkType_";

type Maybe<T> = T | null | undefined;

export interface Fallback<T> {
  source: string;
  extract: () => Maybe<T> | Promise<Maybe<T>>;
}

function isPresent<T>(value: Maybe<T>): value is T {
  return value !== null && value !== undefined && !(typeof value === "string" && value.trim() === "");
}

/** Evaluate fallbacks in order; the first present value wins. */
export async function firstPresent<T>(chain: Fallback<T>[]): Promise<T | null> {
  for (const step of chain) {
    const value = await step.extract();
    if (isPresent(value)) return value;
  }
  return null;
}

type CopiedColumn =
  | "worklog_id"
  | "account_id"
  | "date"
  | "start_time"
  | "issue_key"
  | "issue_id"
  | "issue_url"
  | "description"
  | "work_type";

/** Column -> location in the Tempo worklog payload. */
const FIELD_MAP: { [C in CopiedColumn]: (worklog: TempoWorklog) => Maybe<WorklogRecord[C]> } = {
  worklog_id: (w) => w.tempoWorklogId,
  account_id: (w) => w.author?.accountId,
  date: (w) => w.startDate,
  start_time: (w) => w.startTime,
  issue_key: (w) => w.issue?.key,
  issue_id: (w) => w.issue?.id,
  issue_url: (w) => w.issue?.self,
  description: (w) => w.description,
  work_type: (w) => w.attributes?.values?.find((v) => v.key === WORK_TYPE_ATTRIBUTE)?.value,
};

export function userFallbacks(worklog: TempoWorklog, lookupName: AccountNameLookup): Fallback<string>[] {
  const accountId = worklog.author?.accountId;
  return [
    { source: "author.displayName", extract: () => worklog.author?.displayName },
    { source: "account lookup", extract: () => (accountId ? lookupName(accountId) : null) },
    { source: "author.accountId", extract: () => accountId },
    { source: "default", extract: () => UNKNOWN },
  ];
}

async function normalizeWorklog(
  worklog: TempoWorklog,
  source: RawWorklogEvent["kind"],
  eventId: string | null,
  lookupName: AccountNameLookup,
): Promise<WorklogRecord> {
  const copy = <C extends CopiedColumn>(column: C): WorklogRecord[C] | null => {
    const value = FIELD_MAP[column](worklog);
    return isPresent(value) ? value : null;
  };

  return {
    source,
    event_id: eventId,
    worklog_id: copy("worklog_id"),
    user: (await firstPresent(userFallbacks(worklog, lookupName))) ?? UNKNOWN,
    account_id: copy("account_id"),
    date: copy("date"),
    start_time: copy("start_time"),
    hours: secondsToHours(worklog.timeSpentSeconds),
    billable_hours: secondsToHours(worklog.billableSeconds),
    issue_key: copy("issue_key"),
    issue_id: copy("issue_id"),
    issue_url: copy("issue_url"),
    description: copy("description"),
    work_type: copy("work_type"),
  };
}

export function extractBulk(event: BulkWorklogEvent, lookupName: AccountNameLookup): Promise<WorklogRecord> {
  return normalizeWorklog(event.worklog, "bulk", null, lookupName);
}

export function extractWebhook(event: WebhookWorklogEvent, lookupName: AccountNameLookup): Promise<WorklogRecord> {
  return normalizeWorklog(event.payload, "webhook", event.eventId, lookupName);
}

export function flattenWorklog(event: RawWorklogEvent, lookupName: AccountNameLookup): Promise<WorklogRecord> {
  switch (event.kind) {
    case "bulk":
      return extractBulk(event, lookupName);
    case "webhook":
      return extractWebhook(event, lookupName);
  }
}

/** One record per event, in input order. */
export async function flattenWorklogs(
  events: RawWorklogEvent[],
  lookupName: AccountNameLookup,
): Promise<WorklogRecord[]> {
  const records: WorklogRecord[] = [];
  for (const event of events) {
    records.push(await flattenWorklog(event, lookupName));
  }
  return records;
}
