import { vi } from "vitest";
import type { JiraClient } from "../api/jira";
import type { AppConfig } from "../config";
import type { IssueMetadata, TempoWorklog, WorklogRecord } from "../types";

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    tempoApiToken: "test-tempo-token",
    jiraEmail: "test@example.com",
    jiraApiToken: "test-jira-token",
    jiraSite: "example.atlassian.net",
    caBundlePath: null,
    daysBack: null,
    outputDir: ".",
    requestTimeoutMs: 1000,
    tempoPageSize: 100,
    tempoPageDelayMs: 0,
    userCacheSize: 10,
    ...overrides,
  };
}

export function makeWorklog(overrides: Partial<TempoWorklog> = {}): TempoWorklog {
  return {
    tempoWorklogId: 1,
    issue: { id: 10001, key: "FIN-1" },
    timeSpentSeconds: 3600,
    billableSeconds: 3600,
    startDate: "2024-06-12",
    startTime: "09:00:00",
    description: "Month-end close",
    author: { accountId: "acc-1", displayName: "Ada Lovelace" },
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<WorklogRecord> = {}): WorklogRecord {
  return {
    source: "bulk",
    event_id: null,
    worklog_id: 1,
    user: "Ada Lovelace",
    account_id: "acc-1",
    date: "2024-06-12",
    start_time: "09:00:00",
    hours: 1,
    billable_hours: 1,
    issue_key: "FIN-1",
    issue_id: 10001,
    issue_url: null,
    description: null,
    work_type: null,
    ...overrides,
  };
}

export function makeIssue(key: string, overrides: Partial<IssueMetadata> = {}): IssueMetadata {
  return {
    issue_id: null,
    issue_key: key,
    project_key: "FIN",
    project_name: "Coupa",
    issue_type: "Task",
    labels: [],
    components: [],
    ...overrides,
  };
}

export interface FakeJiraOptions {
  issues?: IssueMetadata[];
  users?: Record<string, string>;
  issueKeysById?: Record<number, string>;
  projects?: Record<string, string>;
}

/** In-process Jira stand-in; anything it does not know answers like a 404. */
export function createFakeJira({ issues = [], users = {}, issueKeysById = {}, projects = {} }: FakeJiraOptions = {}) {
  const notFound = () => new Error("Jira API error: 404 Not Found");

  return {
    getProjectId: vi.fn(async (projectKey: string) => {
      const id = projects[projectKey];
      if (!id) throw notFound();
      return id;
    }),
    getIssueKeyById: vi.fn(async (issueId: number) => {
      const key = issueKeysById[issueId];
      if (!key) throw notFound();
      return key;
    }),
    getUserDisplayName: vi.fn(async (accountId: string) => {
      const name = users[accountId];
      if (!name) throw notFound();
      return name;
    }),
    searchIssueMetadata: vi.fn(async (issueKeys: string[]) => issues.filter((i) => issueKeys.includes(i.issue_key))),
    getIssueMetadataByUrl: vi.fn(async (url: string) => {
      const found = issues.find((i) => i.issue_id !== null && url.endsWith(`/${i.issue_id}`));
      if (!found) throw notFound();
      return found;
    }),
  } satisfies JiraClient;
}

export function jsonResponse(body: unknown) {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

export function errorResponse(status: number, statusText: string, text = "") {
  return {
    ok: false,
    status,
    statusText,
    json: async () => ({}),
    text: async () => text,
  };
}
