import type { JiraClient } from "../api/jira";
import type { WorklogRecord } from "../types";
import { getErrorMessage, showWarning } from "../utils/error-handling";
import { LruCache } from "../utils/lru-cache";

export type AccountNameLookup = (accountId: string) => Promise<string | null>;

/**
 * The project id is required for the Tempo worklog query, so a failed lookup
 * ends the run.
 */
export async function resolveProjectId(jira: Pick<JiraClient, "getProjectId">, projectKey: string): Promise<string> {
  try {
    return await jira.getProjectId(projectKey);
  } catch (e) {
    throw new Error(`Jira project ${projectKey} could not be resolved: ${getErrorMessage(e)}`, { cause: e });
  }
}

/**
 * Account id -> display name, memoised for the run. The pending promise is
 * cached, so repeated or concurrent lookups for one account share a single
 * request; failures resolve to `null` and are cached too.
 */
export function createAccountNameLookup(
  jira: Pick<JiraClient, "getUserDisplayName">,
  cacheSize: number,
): AccountNameLookup {
  const cache = new LruCache<string, Promise<string | null>>(cacheSize);

  return (accountId) => {
    const cached = cache.get(accountId);
    if (cached) return cached;

    const pending = jira.getUserDisplayName(accountId).catch((e: unknown) => {
      showWarning("Jira API", `Could not resolve Jira user ${accountId}`, getErrorMessage(e));
      return null;
    });
    cache.set(accountId, pending);
    return pending;
  };
}

/**
 * Fill `issue_key` for records that only carry a numeric issue id. Each
 * distinct id is looked up once; an id that fails keeps a null key.
 */
export async function resolveIssueKeys(
  records: WorklogRecord[],
  jira: Pick<JiraClient, "getIssueKeyById">,
): Promise<WorklogRecord[]> {
  const idsNeedingLookup = new Set<number>();
  for (const record of records) {
    if (record.issue_key === null && record.issue_id !== null) idsNeedingLookup.add(record.issue_id);
  }

  const issueIdToKey = new Map<number, string>();
  for (const issueId of idsNeedingLookup) {
    try {
      issueIdToKey.set(issueId, await jira.getIssueKeyById(issueId));
    } catch (e) {
      showWarning("Jira API", `Could not resolve issue ${issueId}`, getErrorMessage(e));
    }
  }

  if (issueIdToKey.size === 0) return records;

  return records.map((record) => {
    if (record.issue_key !== null || record.issue_id === null) return record;
    const key = issueIdToKey.get(record.issue_id);
    return key ? { ...record, issue_key: key } : record;
  });
}
