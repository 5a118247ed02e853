import { describe, it, expect, vi, beforeEach } from "vitest";
import { createFakeJira, makeRecord } from "../test/fixtures";
import { createAccountNameLookup, resolveIssueKeys, resolveProjectId } from "./resolve";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("resolveProjectId", () => {
  it("returns the numeric project id", async () => {
    const jira = createFakeJira({ projects: { FIN: "10000" } });

    await expect(resolveProjectId(jira, "FIN")).resolves.toBe("10000");
  });

  it("fails the run for an unknown project", async () => {
    const jira = createFakeJira();

    await expect(resolveProjectId(jira, "FIN")).rejects.toThrow(
      "Jira project FIN could not be resolved: Jira API error: 404 Not Found",
    );
  });
});

describe("createAccountNameLookup", () => {
  it("calls Jira once per account id", async () => {
    const jira = createFakeJira({ users: { "acc-1": "Ada Lovelace" } });
    const lookupName = createAccountNameLookup(jira, 10);

    expect(await lookupName("acc-1")).toBe("Ada Lovelace");
    expect(await lookupName("acc-1")).toBe("Ada Lovelace");
    expect(jira.getUserDisplayName).toHaveBeenCalledTimes(1);
  });

  it("caches failures as null", async () => {
    const jira = createFakeJira();
    const lookupName = createAccountNameLookup(jira, 10);

    expect(await lookupName("acc-9")).toBeNull();
    expect(await lookupName("acc-9")).toBeNull();
    expect(jira.getUserDisplayName).toHaveBeenCalledTimes(1);
  });

  it("shares one request between concurrent lookups", async () => {
    const jira = createFakeJira({ users: { "acc-1": "Ada Lovelace" } });
    const lookupName = createAccountNameLookup(jira, 10);

    const names = await Promise.all([lookupName("acc-1"), lookupName("acc-1")]);

    expect(names).toEqual(["Ada Lovelace", "Ada Lovelace"]);
    expect(jira.getUserDisplayName).toHaveBeenCalledTimes(1);
  });

  it("looks an account up again once it has been evicted", async () => {
    const jira = createFakeJira({ users: { a: "A", b: "B" } });
    const lookupName = createAccountNameLookup(jira, 1);

    await lookupName("a");
    await lookupName("b");
    await lookupName("a");

    expect(jira.getUserDisplayName).toHaveBeenCalledTimes(3);
  });
});

describe("resolveIssueKeys", () => {
  it("fills keys for records that only carry an issue id", async () => {
    const jira = createFakeJira({ issueKeysById: { 10001: "FIN-1" } });
    const records = [
      makeRecord({ issue_key: null, issue_id: 10001 }),
      makeRecord({ issue_key: null, issue_id: 10001 }),
      makeRecord({ issue_key: "FIN-7", issue_id: 10007 }),
    ];

    const resolved = await resolveIssueKeys(records, jira);

    expect(resolved.map((r) => r.issue_key)).toEqual(["FIN-1", "FIN-1", "FIN-7"]);
    expect(jira.getIssueKeyById).toHaveBeenCalledTimes(1);
    expect(jira.getIssueKeyById).toHaveBeenCalledWith(10001);
  });

  it("leaves the key empty when the lookup fails and carries on", async () => {
    const jira = createFakeJira({ issueKeysById: { 10002: "FIN-2" } });
    const records = [makeRecord({ issue_key: null, issue_id: 10001 }), makeRecord({ issue_key: null, issue_id: 10002 })];

    const resolved = await resolveIssueKeys(records, jira);

    expect(resolved.map((r) => r.issue_key)).toEqual([null, "FIN-2"]);
    expect(console.warn).toHaveBeenCalledWith("⚠ [Jira API] Could not resolve issue 10001 – Jira API error: 404 Not Found");
  });
});
