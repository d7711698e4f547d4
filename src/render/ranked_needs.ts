/**
 * Ranked multiselect expansion.
 *
 * A comma-separated answer such as "A, B, Others, specify" becomes an
 * ordered item list ("Others, specify" merged with its free-text companion
 * field), rank numbers 1..N, and nine reason slots. Inline placeholders
 * receive newline-joined lists; the ranked roster table gets one row per
 * item.
 */

import type { ReplacementData } from "../shared/types.js";

export const MAX_RANK_REASONS = 9;

const BLANK_VALUES = new Set(["", "nan", "na"]);

export interface RankedNeedsResult {
  items: string[];
  ranks: number[];
  /** Supplied reason per slot 1..9, or null when none was given. */
  reasons: Array<string | null>;
}

export function isBlankAnswer(value: string | undefined): boolean {
  return value === undefined || BLANK_VALUES.has(value.trim().toLowerCase());
}

export function rankItems(answer: string, otherText: string): string[] {
  if (isBlankAnswer(answer)) return [];

  const other = otherText.trim();
  const othersItem = isBlankAnswer(other) ? "Others, specify" : `Others, specify: ${other}`;
  const items: string[] = [];
  let previous = "";

  for (const raw of answer.split(",")) {
    const token = raw.trim();
    const lower = token.toLowerCase();
    if (!token || lower === "na") continue;

    if (lower === "others" || lower === "specify") {
      // "Others, specify" is one choice that the comma split in two
      if (!(lower === "specify" && previous === "others")) items.push(othersItem);
    } else {
      items.push(token);
    }
    previous = lower;
  }

  return items;
}

export function reasonKey(field: string, slot: number): string {
  return `${field}_rank_reason${slot}`;
}

/**
 * Expand `data[field]`. Reasons come from `<field>_rank_reason1..9` in the
 * same data, when present and not blank.
 */
export function computeRankedNeeds(data: ReplacementData, field: string, otherField: string): RankedNeedsResult {
  const items = rankItems(data[field] ?? "", data[otherField] ?? "");
  const reasons: Array<string | null> = [];
  for (let slot = 1; slot <= MAX_RANK_REASONS; slot++) {
    const supplied = data[reasonKey(field, slot)];
    reasons.push(supplied !== undefined && !isBlankAnswer(supplied) ? supplied : null);
  }
  return { items, ranks: items.map((_, i) => i + 1), reasons };
}

/**
 * Placeholder values for the inline form. A slot with an item but no
 * supplied reason keeps its own `{...}` token for manual completion; the
 * final sweep clears it from generated output.
 */
export function rankedNeedsReplacements(result: RankedNeedsResult, field: string): ReplacementData {
  const out: ReplacementData = {
    [field]: result.items.join("\n"),
    [`${field}_rank`]: result.ranks.join("\n"),
  };
  for (let slot = 1; slot <= MAX_RANK_REASONS; slot++) {
    const key = reasonKey(field, slot);
    if (slot > result.items.length) {
      out[key] = "";
    } else {
      out[key] = result.reasons[slot - 1] ?? `{${key}}`;
    }
  }
  return out;
}
