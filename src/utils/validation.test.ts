import { describe, it, expect } from "vitest";
import { getDaysBackError, getProjectKeyError, validateIssueKey } from "./validation";

describe("validateIssueKey", () => {
  it("accepts project keys with digits and underscores", () => {
    expect(validateIssueKey("FIN-12")).toBe(true);
    expect(validateIssueKey("MY_PROJ-12")).toBe(true);
    expect(validateIssueKey(" ab2-7 ")).toBe(true);
  });

  it("rejects keys that would not be a single JQL term", () => {
    expect(validateIssueKey("_PROJ-12")).toBe(false);
    expect(validateIssueKey("FIN12")).toBe(false);
    expect(validateIssueKey('FIN-1" OR project = HR')).toBe(false);
  });
});

describe("getProjectKeyError", () => {
  it("accepts underscores after the first letter", () => {
    expect(getProjectKeyError("MY_PROJ")).toBeNull();
  });

  it("explains a missing or malformed key", () => {
    expect(getProjectKeyError(" ")).toBe("Project key is required");
    expect(getProjectKeyError("1FIN")).toBe('Invalid project key "1FIN" (expected: ABC)');
  });
});

describe("getDaysBackError", () => {
  it("accepts a positive whole number", () => {
    expect(getDaysBackError("30")).toBeNull();
  });

  it("rejects zero", () => {
    expect(getDaysBackError("0")).toBe("days_back must be greater than 0");
  });
});
