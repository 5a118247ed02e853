import { JIRA_SEARCH_MAX_RESULTS, type JiraClient } from "../api/jira";
import type { EnrichedRecord, IssueMetadata, WorklogRecord } from "../types";
import { getErrorMessage, showWarning } from "../utils/error-handling";
import { weekStart } from "../utils/time-formatting";
import { validateIssueKey } from "../utils/validation";
import { areaFor, classifyLabels, DEFAULT_AREA_MAP, moduleFor } from "./classify";

export interface IssueMetadataIndex {
  byKey: Map<string, IssueMetadata>;
  byId: Map<number, IssueMetadata>;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function indexMetadata(metadata: Iterable<IssueMetadata>): IssueMetadataIndex {
  const index: IssueMetadataIndex = { byKey: new Map(), byId: new Map() };
  for (const issue of metadata) {
    index.byKey.set(issue.issue_key.toUpperCase(), issue);
    if (issue.issue_id !== null) index.byId.set(issue.issue_id, issue);
  }
  return index;
}

/**
 * Search one batch of keys. Jira rejects the whole JQL query when any key is
 * unknown or hidden, so a failed batch is split in halves until the failing
 * keys are isolated; only those are logged and dropped.
 */
async function searchBatch(
  keys: string[],
  jira: Pick<JiraClient, "searchIssueMetadata">,
): Promise<IssueMetadata[]> {
  try {
    return await jira.searchIssueMetadata(keys);
  } catch (e) {
    if (keys.length === 1) {
      showWarning("Jira API", `Issue metadata unavailable for ${keys[0]}`, getErrorMessage(e));
      return [];
    }
    const middle = Math.ceil(keys.length / 2);
    return [
      ...(await searchBatch(keys.slice(0, middle), jira)),
      ...(await searchBatch(keys.slice(middle), jira)),
    ];
  }
}

/**
 * Look up metadata for every issue the records reference. Keyed records are
 * searched in batches; records that only have the issue's REST link are
 * fetched one by one. A key or link that fails is logged and skipped.
 */
export async function fetchIssueMetadata(
  records: WorklogRecord[],
  jira: Pick<JiraClient, "searchIssueMetadata" | "getIssueMetadataByUrl">,
): Promise<IssueMetadataIndex> {
  const keys = new Set<string>();
  const urls = new Set<string>();
  for (const record of records) {
    if (record.issue_key !== null) {
      if (validateIssueKey(record.issue_key)) {
        keys.add(record.issue_key.trim().toUpperCase());
      } else {
        showWarning("Jira API", `Skipping malformed issue key "${record.issue_key}"`);
      }
    } else if (record.issue_url !== null) {
      urls.add(record.issue_url);
    }
  }

  const metadata: IssueMetadata[] = [];

  for (const batch of chunk([...keys], JIRA_SEARCH_MAX_RESULTS)) {
    metadata.push(...(await searchBatch(batch, jira)));
  }

  for (const url of urls) {
    try {
      metadata.push(await jira.getIssueMetadataByUrl(url));
    } catch (e) {
      showWarning("Jira API", `Issue metadata unavailable for ${url}`, getErrorMessage(e));
    }
  }

  return indexMetadata(metadata);
}

function findMetadata(record: WorklogRecord, index: IssueMetadataIndex): IssueMetadata | undefined {
  if (record.issue_key !== null) {
    const byKey = index.byKey.get(record.issue_key.trim().toUpperCase());
    if (byKey) return byKey;
  }
  return record.issue_id !== null ? index.byId.get(record.issue_id) : undefined;
}

/** Left join: records without metadata keep null fields and "Unknown" buckets. */
export function joinMetadata(
  records: WorklogRecord[],
  index: IssueMetadataIndex,
  areaMap: Readonly<Record<string, string>> = DEFAULT_AREA_MAP,
): EnrichedRecord[] {
  return records.map((record) => {
    const issue = findMetadata(record, index);
    const labels = issue?.labels ?? [];
    const components = issue?.components ?? [];
    const projectName = issue?.project_name ?? null;

    return {
      ...record,
      issue_key: record.issue_key ?? issue?.issue_key ?? null,
      project_key: issue?.project_key ?? null,
      project_name: projectName,
      issue_type: issue?.issue_type ?? null,
      labels,
      components,
      module: moduleFor(components),
      ...classifyLabels(labels),
      area: areaFor(projectName, areaMap),
      week: record.date !== null ? weekStart(record.date) : null,
    };
  });
}
