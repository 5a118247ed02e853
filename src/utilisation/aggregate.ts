import type { EnrichedRecord, UtilisationRow } from "../types";
import { utilisationPercent } from "../utils/time-formatting";
import { UNKNOWN } from "./flatten";

const GROUP_COLUMNS = ["area", "project_key", "module", "category", "sub_category", "user", "week"] as const;

type GroupColumn = (typeof GROUP_COLUMNS)[number];

const PIVOT_INDEX = ["area", "project_key", "module", "user"] as const;

export type PivotRow = Pick<UtilisationRow, (typeof PIVOT_INDEX)[number]> & { weeks: Record<string, number> };

export type WeekPivot = { weeks: string[]; rows: PivotRow[] };

function compareNullable(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

const SORT_ORDER: GroupColumn[] = ["week", "area", "project_key", "module", "category", "sub_category", "user"];

function compareRows(a: UtilisationRow, b: UtilisationRow): number {
  for (const column of SORT_ORDER) {
    const diff = compareNullable(a[column], b[column]);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Sum hours per (area, project, module, category, sub-category, user, week).
 * Missing hours count as zero, so totals per user/week match the input.
 */
export function aggregateUtilisation(records: EnrichedRecord[]): UtilisationRow[] {
  const groups = new Map<string, UtilisationRow>();

  for (const record of records) {
    const key = JSON.stringify(GROUP_COLUMNS.map((column) => record[column]));
    const row = groups.get(key) ?? {
      area: record.area,
      project_key: record.project_key,
      module: record.module,
      category: record.category,
      sub_category: record.sub_category,
      user: record.user,
      week: record.week,
      hours: 0,
      billable_hours: 0,
      util_pct: 0,
    };
    row.hours += record.hours ?? 0;
    row.billable_hours += record.billable_hours ?? 0;
    groups.set(key, row);
  }

  return [...groups.values()].map((row) => ({ ...row, util_pct: utilisationPercent(row.hours) })).sort(compareRows);
}

/** Hours by (area, project, module, user) rows and one column per week, weeks ascending. */
export function pivotByWeek(rows: UtilisationRow[]): WeekPivot {
  const weeks = new Set<string>();
  const pivot = new Map<string, PivotRow>();

  for (const row of rows) {
    const week = row.week ?? UNKNOWN;
    weeks.add(week);

    const key = JSON.stringify(PIVOT_INDEX.map((column) => row[column]));
    const entry = pivot.get(key) ?? {
      area: row.area,
      project_key: row.project_key,
      module: row.module,
      user: row.user,
      weeks: {},
    };
    entry.weeks[week] = (entry.weeks[week] ?? 0) + row.hours;
    pivot.set(key, entry);
  }

  const sortedRows = [...pivot.values()].sort((a, b) => {
    for (const column of PIVOT_INDEX) {
      const diff = compareNullable(a[column], b[column]);
      if (diff !== 0) return diff;
    }
    return 0;
  });

  return { weeks: [...weeks].sort(), rows: sortedRows };
}
