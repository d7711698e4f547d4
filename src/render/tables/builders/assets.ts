/**
 * Affected-asset rosters: land, structures, affected structures, trees.
 */

import type { LinkedRecord } from "../../../shared/types.js";
import { textCell, type RosterCell, type RosterRow } from "../roster_table.js";
import { PLEASE_SPECIFY, field, isBlank, withSpecify } from "../fields.js";

export const AFFECTED_STRUCTURE_IMAGE_WIDTH = 1.5;
export const PICTURE_FIELDS = Array.from({ length: 10 }, (_, i) => `Pix${i + 1}`);

export function buildLandRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r, i) =>
    [
      String(i + 1),
      field(r, "asset_land_area"),
      field(r, "asset_land_area_aff"),
      field(r, "asset_land_ext_impact"),
      field(r, "asset_land_type"),
      withSpecify(r, "asset_land_use", PLEASE_SPECIFY),
      withSpecify(r, "asset_land_tenure_owner", PLEASE_SPECIFY),
      withSpecify(r, "asset_land_proof_owner", PLEASE_SPECIFY),
      field(r, "asset_land_yrs_used"),
      field(r, "asset_land_price_prch"),
      withSpecify(r, "asset_land_pymnt_trms", PLEASE_SPECIFY),
      field(r, "asset_land_pymnt_amt"),
    ].map(textCell),
  );
}

/** "type, Please Specify other, other detail" with blank parts left out. */
function structureType(r: LinkedRecord): string {
  const parts = [field(r, "asset_struct_type")];
  const other = field(r, "asset_struct_type_oth");
  const otherDetail = field(r, "asset_struct_type_oth_o");
  if (!isBlank(other)) parts.push(`Please Specify ${other}`);
  if (!isBlank(otherDetail)) parts.push(otherDetail);
  return parts.filter(Boolean).join(", ");
}

export function buildStructureRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r, i) =>
    [
      String(i + 1),
      field(r, "asset_struct_area"),
      field(r, "asset_struct_area_aff"),
      field(r, "asset_struct_ext_impact"),
      structureType(r),
      withSpecify(r, "asset_struct_use", PLEASE_SPECIFY),
      withSpecify(r, "asset_struct_tenure_owner", PLEASE_SPECIFY),
      withSpecify(r, "asset_struct_proof_owner", PLEASE_SPECIFY),
      field(r, "asset_struct_yrs_used"),
      field(r, "asset_struct_price_prch"),
      withSpecify(r, "asset_struct_pymnt_trms", PLEASE_SPECIFY),
      field(r, "asset_struct_pymnt_amt"),
      field(r, "asset_struct_mrkt_val"),
    ].map(textCell),
  );
}

function pictureCell(r: LinkedRecord): RosterCell {
  const names = PICTURE_FIELDS.map((name) => field(r, name).trim()).filter((v) => !isBlank(v));
  return { kind: "images", names, widthInches: AFFECTED_STRUCTURE_IMAGE_WIDTH };
}

export function buildAffectedStructureRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r) => {
    const unitHeight = [field(r, "affctd_struct_unit"), field(r, "affctd_struct_ht")]
      .filter((v) => !isBlank(v))
      .join(", ");
    return [
      ...[
        withSpecify(r, "affctd_struct_type_zz", PLEASE_SPECIFY),
        field(r, "affctd_struct_mtrl_type"),
        field(r, "affctd_struct_dimension"),
        unitHeight,
        field(r, "affctd_struct_estvalue"),
        field(r, "affctd_struct_totalcost"),
      ].map(textCell),
      pictureCell(r),
    ];
  });
}

export function buildTreeRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r) =>
    [
      field(r, "tree_type"),
      `${field(r, "tree_age")}, ${field(r, "tree_height")}`.replace(/^[, ]+|[, ]+$/g, ""),
      field(r, "tree_qty"),
      field(r, "tree_price"),
      field(r, "tree_totalcost"),
    ].map(textCell),
  );
}
