import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import type { EnrichedRecord, UtilisationRow } from "../types";
import { makeRecord } from "../test/fixtures";
import { AUDIT_SHEET, buildAuditWorkbook, buildUtilisationWorkbook, PIVOT_SHEET, UTILISATION_SHEET } from "./workbook";

function row(overrides: Partial<UtilisationRow> = {}): UtilisationRow {
  return {
    area: "Coupa",
    project_key: "FIN",
    module: "Invoicing",
    category: "BAU",
    sub_category: ".",
    user: "Grace Hopper",
    week: "2024-06-10",
    hours: 5,
    billable_hours: 4,
    util_pct: 12.5,
    ...overrides,
  };
}

describe("buildUtilisationWorkbook", () => {
  const wb = buildUtilisationWorkbook([row({ week: "2024-06-03", hours: 2, util_pct: 5 }), row()]);

  it("writes the raw rows and the pivot", () => {
    expect(wb.SheetNames).toEqual([UTILISATION_SHEET, PIVOT_SHEET]);
  });

  it("keeps every utilisation column in order", () => {
    const [header, ...data] = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[UTILISATION_SHEET], { header: 1 });

    expect(header).toEqual([
      "area",
      "project_key",
      "module",
      "category",
      "sub_category",
      "user",
      "week",
      "hours",
      "billable_hours",
      "util_pct",
    ]);
    expect(data[1]).toEqual(["Coupa", "FIN", "Invoicing", "BAU", ".", "Grace Hopper", "2024-06-10", 5, 4, 12.5]);
  });

  it("pivots hours into one column per week", () => {
    const [header, ...data] = XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[PIVOT_SHEET], { header: 1 });

    expect(header).toEqual(["area", "project_key", "module", "user", "2024-06-03", "2024-06-10"]);
    expect(data).toEqual([["Coupa", "FIN", "Invoicing", "Grace Hopper", 2, 5]]);
  });
});

describe("buildAuditWorkbook", () => {
  it("writes one column per enriched field with lists joined", () => {
    const record: EnrichedRecord = {
      ...makeRecord({ worklog_id: 7 }),
      project_key: "FIN",
      project_name: "Coupa",
      issue_type: "Task",
      labels: ["BAU", "Urgent"],
      components: ["Invoicing"],
      module: "Invoicing",
      category: "BAU",
      sub_category: ".",
      area: "Coupa",
      week: "2024-06-10",
    };

    const wb = buildAuditWorkbook([record]);
    const [parsed] = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets[AUDIT_SHEET]);

    expect(parsed).toMatchObject({
      worklog_id: 7,
      user: "Ada Lovelace",
      issue_key: "FIN-1",
      labels: "BAU|Urgent",
      components: "Invoicing",
      area: "Coupa",
      week: "2024-06-10",
    });
    expect(parsed).not.toHaveProperty("issue_url");
  });
});
