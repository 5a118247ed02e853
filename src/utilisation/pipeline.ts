import type { JiraClient } from "../api/jira";
import type { EnrichedRecord, RawWorklogEvent, UtilisationRow } from "../types";
import { aggregateUtilisation } from "./aggregate";
import { fetchIssueMetadata, joinMetadata } from "./enrich";
import { flattenWorklogs } from "./flatten";
import { createAccountNameLookup, resolveIssueKeys } from "./resolve";

export interface PipelineDeps {
  jira: Omit<JiraClient, "getProjectId">;
  userCacheSize: number;
  areaMap?: Readonly<Record<string, string>>;
}

export interface PipelineResult {
  records: EnrichedRecord[];
  rows: UtilisationRow[];
}

/** flatten -> resolve missing issue keys -> enrich -> aggregate */
export async function runUtilisationPipeline(events: RawWorklogEvent[], deps: PipelineDeps): Promise<PipelineResult> {
  const lookupName = createAccountNameLookup(deps.jira, deps.userCacheSize);

  const flattened = await flattenWorklogs(events, lookupName);
  const keyed = await resolveIssueKeys(flattened, deps.jira);
  const metadata = await fetchIssueMetadata(keyed, deps.jira);
  const records = joinMetadata(keyed, metadata, deps.areaMap);

  return { records, rows: aggregateUtilisation(records) };
}
