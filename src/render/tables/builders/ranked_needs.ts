import type { RankedNeedsResult } from "../../ranked_needs.js";
import { textCell, type RosterRow } from "../roster_table.js";

/** One row per ranked item: item, rank, supplied reason (blank otherwise). */
export function buildRankedNeedsRows(result: RankedNeedsResult): RosterRow[] {
  return result.items.map((item, i) =>
    [item, String(result.ranks[i]), result.reasons[i] ?? ""].map(textCell),
  );
}
