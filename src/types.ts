export type JiraIssue = {
  id: string;
  key: string;
  fields: {
    project?: { key: string; name?: string };
    issuetype?: { name: string };
    labels?: string[];
    components?: { name: string }[];
  };
};

export type TempoWorklog = {
  self?: string | null;
  tempoWorklogId?: number | null;
  jiraWorklogId?: number | null;
  issue?: { id?: number | null; key?: string | null; self?: string | null } | null;
  timeSpentSeconds?: number | null;
  billableSeconds?: number | null;
  startDate?: string | null; // YYYY-MM-DD
  startTime?: string | null; // HH:mm:ss
  description?: string | null;
  author?: { accountId?: string | null; displayName?: string | null } | null;
  attributes?: { values?: { key: string; value: string }[] | null } | null;
};

export type TempoAccount = {
  id: number;
  key: string;
  name: string;
  status?: string;
};

export type BulkWorklogEvent = {
  kind: "bulk";
  worklog: TempoWorklog;
};

export type WebhookWorklogEvent = {
  kind: "webhook";
  eventId: string;
  eventType: string;
  payload: TempoWorklog;
};

export type RawWorklogEvent = BulkWorklogEvent | WebhookWorklogEvent;

/** `null` marks a field the source record did not carry. */
export type WorklogRecord = {
  source: RawWorklogEvent["kind"];
  event_id: string | null;
  worklog_id: number | null;
  user: string;
  account_id: string | null;
  date: string | null;
  start_time: string | null;
  hours: number | null;
  billable_hours: number | null;
  issue_key: string | null;
  issue_id: number | null;
  issue_url: string | null;
  description: string | null;
  work_type: string | null;
};

export type IssueMetadata = {
  issue_id: number | null;
  issue_key: string;
  project_key: string | null;
  project_name: string | null;
  issue_type: string | null;
  labels: string[];
  components: string[];
};

export type EnrichedRecord = WorklogRecord & {
  project_key: string | null;
  project_name: string | null;
  issue_type: string | null;
  labels: string[];
  components: string[];
  module: string;
  category: string;
  sub_category: string;
  area: string;
  week: string | null;
};

export type UtilisationRow = {
  area: string;
  project_key: string | null;
  module: string;
  category: string;
  sub_category: string;
  user: string;
  week: string | null;
  hours: number;
  billable_hours: number;
  util_pct: number;
};
