/**
 * Routes a primary row's linked records to roster categories by their
 * field names. Rules are checked in order and the first hit wins.
 */

import type { LinkedRecord } from "../../shared/types.js";
import { isBlank } from "./fields.js";

export type RecordGroup =
  | "household"
  | "labor"
  | "debt"
  | "land"
  | "structure"
  | "affectedStructure"
  | "trees"
  | "crops"
  | "incomeLoss"
  | "others";

interface GroupRule {
  group: RecordGroup;
  matches: (key: string) => boolean;
}

const contains = (...terms: string[]) => (key: string) => {
  const lower = key.toLowerCase();
  return terms.some((t) => lower.includes(t));
};
const startsWith = (...prefixes: string[]) => (key: string) => prefixes.some((p) => key.startsWith(p));

export const RECORD_GROUP_RULES: readonly GroupRule[] = [
  { group: "crops", matches: contains("crop") },
  { group: "incomeLoss", matches: contains("income_loss", "incomeloss") },
  { group: "others", matches: contains("others") },
  { group: "household", matches: startsWith("hhcomp_hhmmbr_") },
  { group: "labor", matches: startsWith("hh_labor_", "hh_wrk_", "hh_calc_", "hh_total_") },
  { group: "debt", matches: startsWith("debt_", "loan_", "pymt_") },
  { group: "land", matches: startsWith("asset_land_") },
  { group: "structure", matches: startsWith("asset_struct_") },
  { group: "affectedStructure", matches: startsWith("affctd_struct_") },
  { group: "trees", matches: startsWith("tree_") },
];

export type GroupedRecords = Record<RecordGroup, LinkedRecord[]>;

export function recordGroup(record: LinkedRecord): RecordGroup | null {
  const keys = Object.keys(record);
  for (const rule of RECORD_GROUP_RULES) {
    if (keys.some(rule.matches)) return rule.group;
  }
  return null;
}

/** Records that match no rule are dropped. */
export function groupRecords(records: readonly LinkedRecord[]): GroupedRecords {
  const grouped: GroupedRecords = {
    household: [],
    labor: [],
    debt: [],
    land: [],
    structure: [],
    affectedStructure: [],
    trees: [],
    crops: [],
    incomeLoss: [],
    others: [],
  };
  for (const record of records) {
    const group = recordGroup(record);
    if (group) grouped[group].push(record);
  }
  return grouped;
}

export const LABOR_INCOME_FIELD = "hh_calc_total_inc";

/**
 * Sum of the numeric income totals on labor records; other values are
 * skipped. Cells load as formatted text, so grouping commas are dropped.
 */
export function laborIncomeTotal(laborRecords: readonly LinkedRecord[]): number {
  let total = 0;
  for (const record of laborRecords) {
    const raw = record[LABOR_INCOME_FIELD] ?? "";
    if (isBlank(raw)) continue;
    const value = Number(raw.trim().replace(/,/g, ""));
    if (Number.isFinite(value)) total += value;
  }
  return total;
}
