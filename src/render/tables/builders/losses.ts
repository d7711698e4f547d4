/**
 * Crop, income-loss and other-loss rosters. Column names in these linked
 * files vary, so values are found by fuzzy field discovery.
 */

import type { LinkedRecord } from "../../../shared/types.js";
import { textCell, type RosterRow } from "../roster_table.js";
import { discoverFields, has, type FieldSlot } from "../fields.js";

const CROP_SLOTS: readonly FieldSlot[] = [
  { matches: has("type") },
  { matches: has("age") },
  { matches: has("area") },
  { matches: has("price") },
  { matches: has("total", "cost") },
];

/** type, quantity, unit, unit price, total */
const QUANTITY_SLOTS: readonly FieldSlot[] = [
  { matches: has("type") },
  { matches: has("qty", "quantity") },
  { matches: (key) => key.includes("unit") && !key.includes("price") },
  { matches: has("price") },
  { matches: has("total", "cost") },
];

function discoveredRows(records: readonly LinkedRecord[], domain: string, slots: readonly FieldSlot[]): RosterRow[] {
  return records.map((r) => discoverFields(r, domain, slots).map(textCell));
}

export function buildCropRows(records: readonly LinkedRecord[]): RosterRow[] {
  return discoveredRows(records, "crop", CROP_SLOTS);
}

export function buildIncomeLossRows(records: readonly LinkedRecord[]): RosterRow[] {
  return discoveredRows(records, "income", QUANTITY_SLOTS);
}

export function buildOtherLossRows(records: readonly LinkedRecord[]): RosterRow[] {
  return discoveredRows(records, "others", QUANTITY_SLOTS);
}
