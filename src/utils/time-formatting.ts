import { format, parseISO, startOfWeek, subDays } from "date-fns";

export const WEEKLY_CAPACITY_HOURS = 40;

export function secondsToHours(seconds: number | null | undefined): number | null {
  if (seconds === null || seconds === undefined) return null;
  return seconds / 3600;
}

export function formatHours(hours: number): string {
  return `${hours.toFixed(2)}h`;
}

/** Monday of the ISO week containing `dateISO` (YYYY-MM-DD). */
export function weekStart(dateISO: string): string | null {
  const date = parseISO(dateISO);
  if (Number.isNaN(date.getTime())) return null;
  return format(startOfWeek(date, { weekStartsOn: 1 }), "yyyy-MM-dd");
}

export function lookbackWindow(daysBack: number, today: Date = new Date()): { from: string; to: string } {
  return {
    from: format(subDays(today, daysBack), "yyyy-MM-dd"),
    to: format(today, "yyyy-MM-dd"),
  };
}

export function utilisationPercent(hours: number): number {
  return Math.round((hours / WEEKLY_CAPACITY_HOURS) * 100 * 10) / 10;
}
