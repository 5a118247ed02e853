import { z } from "zod";
import type { AppConfig } from "../config";
import type { IssueMetadata, JiraIssue } from "../types";
import { fetchOrThrow } from "./http";

/** Jira's ceiling for `maxResults` on a search page. */
export const JIRA_SEARCH_MAX_RESULTS = 100;

const ISSUE_FIELDS = ["project", "issuetype", "labels", "components"];

export interface JiraClient {
  getProjectId(projectKey: string): Promise<string>;
  getIssueKeyById(issueId: number): Promise<string>;
  getUserDisplayName(accountId: string): Promise<string>;
  searchIssueMetadata(issueKeys: string[]): Promise<IssueMetadata[]>;
  getIssueMetadataByUrl(url: string): Promise<IssueMetadata>;
}

const issueSchema: z.ZodType<JiraIssue, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  key: z.string(),
  fields: z
    .object({
      project: z.object({ key: z.string(), name: z.string().optional() }).optional(),
      issuetype: z.object({ name: z.string() }).optional(),
      labels: z.array(z.string()).optional(),
      components: z.array(z.object({ name: z.string() })).optional(),
    })
    .default({}),
});

export function toIssueMetadata(issue: JiraIssue): IssueMetadata {
  const id = Number(issue.id);
  return {
    issue_id: Number.isInteger(id) ? id : null,
    issue_key: issue.key,
    project_key: issue.fields.project?.key ?? null,
    project_name: issue.fields.project?.name ?? null,
    issue_type: issue.fields.issuetype?.name ?? null,
    labels: issue.fields.labels ?? [],
    components: (issue.fields.components ?? []).map((c) => c.name),
  };
}

export function createJiraClient(config: AppConfig): JiraClient {
  const baseUrl = `https://${config.jiraSite}`;
  const auth = Buffer.from(`${config.jiraEmail}:${config.jiraApiToken}`).toString("base64");
  const headers = {
    Authorization: `Basic ${auth}`,
    Accept: "application/json",
    "Content-Type": "application/json",
  };

  function jiraFetch(url: string, init?: RequestInit): Promise<Response> {
    return fetchOrThrow("Jira", url, { ...init, headers: { ...headers, ...init?.headers } }, config.requestTimeoutMs);
  }

  async function getProjectId(projectKey: string): Promise<string> {
    const res = await jiraFetch(`${baseUrl}/rest/api/3/project/${encodeURIComponent(projectKey)}`);
    const schema = z.object({ id: z.string() });
    return schema.parse(await res.json()).id;
  }

  async function getIssueKeyById(issueId: number): Promise<string> {
    const res = await jiraFetch(`${baseUrl}/rest/api/3/issue/${issueId}?fields=project`);
    return issueSchema.parse(await res.json()).key;
  }

  async function getUserDisplayName(accountId: string): Promise<string> {
    const res = await jiraFetch(`${baseUrl}/rest/api/3/user?accountId=${encodeURIComponent(accountId)}`);
    const schema = z.object({ displayName: z.string() });
    return schema.parse(await res.json()).displayName;
  }

  async function searchIssueMetadata(issueKeys: string[]): Promise<IssueMetadata[]> {
    if (issueKeys.length === 0) return [];
    if (issueKeys.length > JIRA_SEARCH_MAX_RESULTS) {
      throw new Error(`Cannot search more than ${JIRA_SEARCH_MAX_RESULTS} issue keys per request`);
    }

    const jql = `key in (${issueKeys.map((key) => JSON.stringify(key)).join(",")})`;
    const res = await jiraFetch(`${baseUrl}/rest/api/3/search/jql`, {
      method: "POST",
      body: JSON.stringify({ jql, fields: ISSUE_FIELDS, maxResults: JIRA_SEARCH_MAX_RESULTS }),
    });
    const schema = z.object({ issues: z.array(issueSchema).default([]) });
    return schema.parse(await res.json()).issues.map(toIssueMetadata);
  }

  async function getIssueMetadataByUrl(url: string): Promise<IssueMetadata> {
    const target = new URL(url);
    // Only ever send Jira credentials to the configured site.
    if (target.host !== config.jiraSite) {
      throw new Error(`Refusing to fetch issue from ${target.host}: not the configured Jira site`);
    }
    target.searchParams.set("fields", ISSUE_FIELDS.join(","));
    const res = await jiraFetch(target.toString());
    return toIssueMetadata(issueSchema.parse(await res.json()));
  }

  return { getProjectId, getIssueKeyById, getUserDisplayName, searchIssueMetadata, getIssueMetadataByUrl };
}
