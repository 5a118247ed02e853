import { mkdirSync } from "fs";
import { join } from "path";
import * as XLSX from "xlsx";
import type { EnrichedRecord, UtilisationRow } from "../types";
import { pivotByWeek } from "../utilisation/aggregate";

export const UTILISATION_SHEET = "Utilisation";
export const PIVOT_SHEET = "Pivot";
export const AUDIT_SHEET = "Worklogs";

const ROW_COLUMNS: (keyof UtilisationRow)[] = [
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
];

const AUDIT_COLUMNS: (keyof EnrichedRecord)[] = [
  "source",
  "event_id",
  "worklog_id",
  "user",
  "account_id",
  "date",
  "week",
  "start_time",
  "hours",
  "billable_hours",
  "issue_key",
  "issue_id",
  "issue_url",
  "project_key",
  "project_name",
  "issue_type",
  "labels",
  "components",
  "module",
  "category",
  "sub_category",
  "area",
  "description",
  "work_type",
];

type Cell = string | number | null;

export function buildUtilisationWorkbook(rows: UtilisationRow[]): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(rows, { header: ROW_COLUMNS }), UTILISATION_SHEET);

  const pivot = pivotByWeek(rows);
  const pivotRows = pivot.rows.map(({ weeks, ...index }) => ({ ...index, ...weeks }));
  const header = ["area", "project_key", "module", "user", ...pivot.weeks];
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(pivotRows, { header }), PIVOT_SHEET);

  return wb;
}

/** One column per enriched field; list fields are joined with "|". */
export function buildAuditWorkbook(records: EnrichedRecord[]): XLSX.WorkBook {
  const flat = records.map((record) => {
    const row: Record<string, Cell> = {};
    for (const column of AUDIT_COLUMNS) {
      const value = record[column];
      row[column] = Array.isArray(value) ? value.join("|") : value;
    }
    return row;
  });

  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(flat, { header: AUDIT_COLUMNS }), AUDIT_SHEET);
  return wb;
}

export interface ReportFiles {
  workbook: string;
  snapshot: string;
}

export function writeReport(
  outputDir: string,
  baseName: string,
  rows: UtilisationRow[],
  records: EnrichedRecord[],
): ReportFiles {
  mkdirSync(outputDir, { recursive: true });
  const files: ReportFiles = {
    workbook: join(outputDir, `utilisation_${baseName}.xlsx`),
    snapshot: join(outputDir, `worklogs_${baseName}.csv`),
  };

  XLSX.writeFile(buildUtilisationWorkbook(rows), files.workbook);
  XLSX.writeFile(buildAuditWorkbook(records), files.snapshot, { bookType: "csv" });
  return files;
}
