/**
 * Field access helpers for roster builders.
 *
 * Exact lookups read a named field. Fuzzy discovery scans every field name
 * for a domain term plus an attribute term, for linked files whose column
 * names vary between survey versions.
 */

import type { LinkedRecord } from "../../shared/types.js";

export function field(record: LinkedRecord, name: string): string {
  return record[name] ?? "";
}

/** Empty, whitespace or the literal "nan". */
export function isBlank(value: string): boolean {
  const v = value.trim().toLowerCase();
  return v === "" || v === "nan";
}

export const PLS_SPECIFY_COLON = " Pls. Specify: ";
export const PLS_SPECIFY = " Pls. Specify ";
export const PLEASE_SPECIFY = ", Please Specify ";

/** `main` followed by its "other, specify" companion when one was given. */
export function withSpecify(record: LinkedRecord, mainField: string, joiner: string): string {
  const main = field(record, mainField);
  const other = field(record, `${mainField}_o`);
  return isBlank(other) ? main : `${main}${joiner}${other}`;
}

// ── Fuzzy discovery ─────────────────────────────────────────────────

export interface FieldSlot {
  /** Called with the lower-cased field name. */
  matches: (key: string) => boolean;
}

export const has =
  (...terms: string[]) =>
  (key: string): boolean =>
    terms.some((t) => key.includes(t));

/**
 * Fill `slots` from fields whose lower-cased name contains `domain`. A
 * field goes to the first slot it matches; each slot keeps the first
 * non-empty value it receives.
 */
export function discoverFields(record: LinkedRecord, domain: string, slots: readonly FieldSlot[]): string[] {
  const values = slots.map(() => "");
  for (const [name, value] of Object.entries(record)) {
    const key = name.toLowerCase();
    if (!key.includes(domain) || value.trim() === "") continue;
    const slot = slots.findIndex((s) => s.matches(key));
    if (slot !== -1 && values[slot] === "") values[slot] = value;
  }
  return values;
}
