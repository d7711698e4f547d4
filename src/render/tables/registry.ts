/**
 * Roster Builder Registry
 *
 * Maps each linked roster category to the record group that feeds it and
 * the pure builder that turns those records into table rows. The ranked
 * needs roster is fed by the primary row instead and is built separately.
 */

import type { LinkedRecord } from "../../shared/types.js";
import type { RosterCategory, TableCategory } from "./classify.js";
import type { RecordGroup } from "./records.js";
import type { RosterRow } from "./roster_table.js";
import {
  buildDebtRows,
  buildHouseholdMemberRows,
  buildLaborRows,
  buildSavingsRows,
} from "./builders/household.js";
import {
  buildAffectedStructureRows,
  buildLandRows,
  buildStructureRows,
  buildTreeRows,
} from "./builders/assets.js";
import { buildCropRows, buildIncomeLossRows, buildOtherLossRows } from "./builders/losses.js";

// ── Registry types ──────────────────────────────────────────────────

export type LinkedRosterCategory = Exclude<RosterCategory, "RankedNeeds">;

export interface RosterBuilder {
  source: RecordGroup;
  build: (records: readonly LinkedRecord[]) => RosterRow[];
}

// ── Builder registry ────────────────────────────────────────────────

export const ROSTER_BUILDERS: Readonly<Record<LinkedRosterCategory, RosterBuilder>> = {
  HouseholdMember: { source: "household", build: buildHouseholdMemberRows },
  Savings: { source: "household", build: buildSavingsRows },
  Labor: { source: "labor", build: buildLaborRows },
  Debt: { source: "debt", build: buildDebtRows },
  Land: { source: "land", build: buildLandRows },
  Structure: { source: "structure", build: buildStructureRows },
  AffectedStructure: { source: "affectedStructure", build: buildAffectedStructureRows },
  Trees: { source: "trees", build: buildTreeRows },
  Crops: { source: "crops", build: buildCropRows },
  IncomeLoss: { source: "incomeLoss", build: buildIncomeLossRows },
  Others: { source: "others", build: buildOtherLossRows },
};

export function isLinkedRoster(category: TableCategory): category is LinkedRosterCategory {
  return Object.hasOwn(ROSTER_BUILDERS, category);
}
