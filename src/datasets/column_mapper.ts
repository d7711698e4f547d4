/**
 * Column Mapper
 *
 * Matches template placeholders to primary-dataset columns by header text.
 * Rows 0–3 are header candidates; a cell matches when its trimmed text
 * equals the placeholder name, ignoring case. Earlier rows win, then
 * leftmost columns.
 */

import { silentLogger, type Logger } from "../shared/log.js";
import type { ColumnMapping, Grid, PlaceholderSet } from "../shared/types.js";

export const HEADER_ROW_COUNT = 4;
/** Row holding the KEY / PARENT_KEY marker. */
export const KEY_ROW = 3;
/** First data row. */
export const DATA_START_ROW = 4;

export const KEY_MARKER = "KEY";
export const PARENT_KEY_MARKER = "PARENT_KEY";

export function buildColumnMapping(
  placeholders: PlaceholderSet,
  grid: Grid,
  logger: Logger = silentLogger,
): ColumnMapping {
  const searchRows = grid.slice(0, HEADER_ROW_COUNT);
  const mapping = new Map<string, number>();

  for (const placeholder of [...placeholders].sort()) {
    const column = findHeaderColumn(searchRows, placeholder);
    if (column === null) {
      logger.warn("MAP", `Placeholder '${placeholder}' not found in any of the first ${HEADER_ROW_COUNT} rows`);
      continue;
    }
    mapping.set(placeholder, column);
  }

  return mapping;
}

function findHeaderColumn(rows: Grid, placeholder: string): number | null {
  const target = placeholder.toLowerCase();
  for (const row of rows) {
    const col = row.findIndex((cell) => cell.trim().toLowerCase() === target);
    if (col !== -1) return col;
  }
  return null;
}

/**
 * Column of `marker` in the key row (trimmed, case-insensitive), or null
 * when the grid has no key row or no such cell.
 */
export function findMarkerColumn(grid: Grid, marker: string): number | null {
  const keyRow = grid[KEY_ROW];
  if (!keyRow) return null;
  const target = marker.toUpperCase();
  const col = keyRow.findIndex((cell) => cell.trim().toUpperCase() === target);
  return col === -1 ? null : col;
}

/** Zero-based index → spreadsheet column letters (0 → A, 27 → AB). */
export function columnLetter(index: number): string {
  let n = index + 1;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}
