import { setTimeout } from "timers/promises";
import { z } from "zod";
import type { AppConfig } from "../config";
import type { BulkWorklogEvent, TempoAccount, TempoWorklog } from "../types";
import { fetchOrThrow } from "./http";

const TEMPO_API_BASE = "https://api.tempo.io/4";

export type QueryParams = Record<string, string | number>;

export interface TempoClient {
  pagedGet(path: string, params?: QueryParams): AsyncGenerator<unknown, void, undefined>;
  getProjectWorklogs(projectId: string, from: string, to: string): Promise<BulkWorklogEvent[]>;
  getAccounts(): Promise<TempoAccount[]>;
}

const pageSchema = z.object({
  results: z.array(z.unknown()).default([]),
  metadata: z.object({ count: z.number().default(0) }).default({}),
});

export const tempoWorklogSchema: z.ZodType<TempoWorklog, z.ZodTypeDef, unknown> = z.object({
  self: z.string().nullish(),
  tempoWorklogId: z.number().nullish(),
  jiraWorklogId: z.number().nullish(),
  issue: z
    .object({
      id: z.number().nullish(),
      key: z.string().nullish(),
      self: z.string().nullish(),
    })
    .nullish(),
  timeSpentSeconds: z.number().nullish(),
  billableSeconds: z.number().nullish(),
  startDate: z.string().nullish(),
  startTime: z.string().nullish(),
  description: z.string().nullish(),
  author: z
    .object({
      accountId: z.string().nullish(),
      displayName: z.string().nullish(),
    })
    .nullish(),
  attributes: z
    .object({
      values: z.array(z.object({ key: z.string(), value: z.string() })).nullish(),
    })
    .nullish(),
});

const accountSchema = z.object({
  id: z.number(),
  key: z.string(),
  name: z.string(),
  status: z.string().optional(),
});

export function createTempoClient(config: AppConfig): TempoClient {
  const headers = {
    Authorization: `Bearer ${config.tempoApiToken}`,
    Accept: "application/json",
  };

  /**
   * Stream every result of an offset/limit paginated endpoint. Stops once
   * `offset + limit` reaches the `metadata.count` the API reports; any failed
   * page aborts the whole iteration.
   */
  async function* pagedGet(path: string, params: QueryParams = {}): AsyncGenerator<unknown, void, undefined> {
    const pageSize = config.tempoPageSize;
    let offset = 0;

    for (;;) {
      const query = new URLSearchParams();
      for (const [name, value] of Object.entries(params)) query.set(name, String(value));
      query.set("offset", String(offset));
      query.set("limit", String(pageSize));

      const res = await fetchOrThrow(
        "Tempo",
        `${TEMPO_API_BASE}${path}?${query.toString()}`,
        { method: "GET", headers },
        config.requestTimeoutMs,
      );
      const page = pageSchema.parse(await res.json());
      yield* page.results;

      if (offset + pageSize >= page.metadata.count) return;
      offset += pageSize;
      // rate-limit courtesy
      await setTimeout(config.tempoPageDelayMs);
    }
  }

  async function getProjectWorklogs(projectId: string, from: string, to: string): Promise<BulkWorklogEvent[]> {
    const events: BulkWorklogEvent[] = [];
    for await (const item of pagedGet("/worklogs", { projectId, from, to })) {
      events.push({ kind: "bulk", worklog: tempoWorklogSchema.parse(item) });
    }
    return events;
  }

  async function getAccounts(): Promise<TempoAccount[]> {
    const accounts: TempoAccount[] = [];
    for await (const item of pagedGet("/accounts")) {
      accounts.push(accountSchema.parse(item));
    }
    return accounts;
  }

  return { pagedGet, getProjectWorklogs, getAccounts };
}
