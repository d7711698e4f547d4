/**
 * Household rosters: members, savings and organisations, labor, debts.
 */

import type { LinkedRecord } from "../../../shared/types.js";
import { textCell, type RosterRow } from "../roster_table.js";
import { PLS_SPECIFY, PLS_SPECIFY_COLON, field, withSpecify } from "../fields.js";

function fullName(r: LinkedRecord): string {
  return ["hhcomp_hhmmbr_fname", "hhcomp_hhmmbr_mname", "hhcomp_hhmmbr_lname"]
    .map((name) => field(r, name).trim())
    .filter(Boolean)
    .join(" ");
}

export function buildHouseholdMemberRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r, i) =>
    [
      String(i + 1),
      fullName(r),
      field(r, "hhcomp_hhmmbr_hhreltn"),
      field(r, "hhcomp_hhmmbr_hhage"),
      field(r, "hhcomp_hhmmbr_hhsex"),
      field(r, "hhcomp_hhmmbr_status"),
      withSpecify(r, "hhcomp_hhmmbr_relg", PLS_SPECIFY_COLON),
      field(r, "hhcomp_hhmmbr_brtplc"),
      field(r, "hhcomp_hhmmbr_educ"),
      field(r, "hhcomp_hhmmbr_ethn"),
    ].map(textCell),
  );
}

/** Same records as the member roster, one row per member. */
export function buildSavingsRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r, i) =>
    [
      String(i + 1),
      field(r, "hhcomp_hhmmbr_ethn"),
      withSpecify(r, "hhcomp_hhmmbr_savings", PLS_SPECIFY),
      field(r, "hhcomp_hhmmbr_phone"),
      withSpecify(r, "hhcomp_hhmmbr_org", PLS_SPECIFY),
      field(r, "hhcomp_hhmmbr_org_mem"),
      field(r, "hhcomp_hhmmbr_disability"),
    ].map(textCell),
  );
}

export function buildLaborRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r, i) =>
    [
      String(i + 1),
      field(r, "hh_labor_stat"),
      withSpecify(r, "hh_labor_pri_src", PLS_SPECIFY),
      field(r, "hh_labor_pri_industry"),
      field(r, "hh_labor_pri_plc_work"),
      field(r, "hh_labor_pri_inc"),
      field(r, "hh_labor_occ_other"),
      field(r, "hh_labor_other_industry"),
      field(r, "hh_labor_occ_other_plc_wrk"),
      field(r, "hh_labor_occ_other_inc"),
      field(r, "hh_calc_total_inc"),
      field(r, "hh_wrk_hrs"),
    ].map(textCell),
  );
}

function paymentTerms(r: LinkedRecord): string {
  return `${field(r, "pymt_terms")}${field(r, "pymt_terms_int")}${field(r, "pymt_terms_amt")}, ${field(r, "pymt_terms_long")}`;
}

export function buildDebtRows(records: readonly LinkedRecord[]): RosterRow[] {
  return records.map((r) =>
    [
      withSpecify(r, "debt_src_name", PLS_SPECIFY),
      field(r, "debt_contract"),
      field(r, "debt_contract_y"),
      field(r, "debt_amt"),
      withSpecify(r, "loan_used", PLS_SPECIFY),
      paymentTerms(r),
      field(r, "debt_balance"),
      field(r, "debt_fam_proc"),
      field(r, "debt_fam_payment"),
    ].map(textCell),
  );
}
