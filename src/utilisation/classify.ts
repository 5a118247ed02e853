import { UNKNOWN } from "./flatten";

export type Classification = { category: string; sub_category: string };

type LabelRule = Classification & { matches: (label: string) => boolean };

/** Evaluated top to bottom; the first rule matched by any label wins. */
const LABEL_RULES: LabelRule[] = [
  { matches: (l) => l.includes("enhancement"), category: "Enhancement", sub_category: "." },
  { matches: (l) => l.includes("bau"), category: "BAU", sub_category: "." },
  { matches: (l) => l.includes("audit"), category: "Admin", sub_category: "Audit" },
  { matches: (l) => l.includes("meeting"), category: "Admin", sub_category: "Meeting" },
  { matches: (l) => l === "holiday" || l === "vacation", category: "Vacation", sub_category: "Vacation" },
];

export const DEFAULT_AREA_MAP: Readonly<Record<string, string>> = {
  "TransUnion PeopleSoft": "PeopleSoft",
  Coupa: "Coupa",
  OneStream: "OneStream/PS",
};

export function classifyLabels(labels: readonly string[]): Classification {
  const normalized = labels.map((label) => label.trim().toLowerCase());
  for (const rule of LABEL_RULES) {
    if (normalized.some(rule.matches)) {
      return { category: rule.category, sub_category: rule.sub_category };
    }
  }
  return { category: UNKNOWN, sub_category: UNKNOWN };
}

export function moduleFor(components: readonly string[]): string {
  return components[0] || UNKNOWN;
}

export function areaFor(projectName: string | null, areaMap: Readonly<Record<string, string>> = DEFAULT_AREA_MAP): string {
  if (projectName === null) return UNKNOWN;
  return Object.hasOwn(areaMap, projectName) ? areaMap[projectName] : UNKNOWN;
}
