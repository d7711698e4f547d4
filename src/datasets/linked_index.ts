/**
 * Linked Index
 *
 * Groups the rows of every linked dataset by their PARENT_KEY value so a
 * primary row's records can be fetched in O(1). Built once per batch and
 * read-only afterwards.
 */

import { loadGrid } from "./loader.js";
import { DATA_START_ROW, KEY_ROW, PARENT_KEY_MARKER, findMarkerColumn } from "./column_mapper.js";
import { errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/log.js";
import type { Grid, LinkedRecord } from "../shared/types.js";

const NO_RECORDS: readonly LinkedRecord[] = Object.freeze([]);

export class LinkedIndex {
  private constructor(private readonly groups: ReadonlyMap<string, readonly LinkedRecord[]>) {}

  /** Index built from in-memory grids, in the order given. */
  static fromGrids(grids: ReadonlyArray<{ label: string; grid: Grid }>, logger: Logger = silentLogger): LinkedIndex {
    const groups = new Map<string, LinkedRecord[]>();
    for (const { label, grid } of grids) {
      const added = addGrid(groups, grid);
      if (added === null) {
        logger.warn("LINK", `${label}: ${PARENT_KEY_MARKER} column not found in row ${KEY_ROW + 1}, skipped`);
      } else {
        logger.info("LINK", `${label}: ${added} record(s) indexed`);
      }
    }
    for (const records of groups.values()) Object.freeze(records);
    return new LinkedIndex(groups);
  }

  /** Index built from linked files. Unreadable files are skipped with a warning. */
  static fromFiles(paths: readonly string[], logger: Logger = silentLogger): LinkedIndex {
    const grids: Array<{ label: string; grid: Grid }> = [];
    for (const filePath of paths) {
      try {
        grids.push({ label: filePath, grid: loadGrid(filePath) });
      } catch (err) {
        logger.warn("LINK", `Error loading linked file ${filePath}: ${errorMessage(err)}`);
      }
    }
    return LinkedIndex.fromGrids(grids, logger);
  }

  static empty(): LinkedIndex {
    return new LinkedIndex(new Map());
  }

  /** Records for `key` (trimmed); an empty list when nothing matches. */
  lookup(key: string): readonly LinkedRecord[] {
    return this.groups.get(key.trim()) ?? NO_RECORDS;
  }
}

/** Append the grid's records to `groups`; null when it has no PARENT_KEY column. */
function addGrid(groups: Map<string, LinkedRecord[]>, grid: Grid): number | null {
  const keyCol = findMarkerColumn(grid, PARENT_KEY_MARKER);
  if (keyCol === null) return null;

  const headers = (grid[KEY_ROW] ?? []).map((h) => h.trim());
  let added = 0;

  for (const row of grid.slice(DATA_START_ROW)) {
    const key = (row[keyCol] ?? "").trim();
    if (!key) continue;

    const record: Record<string, string> = {};
    headers.forEach((header, col) => {
      if (header) record[header] = row[col] ?? "";
    });

    let bucket = groups.get(key);
    if (!bucket) {
      bucket = [];
      groups.set(key, bucket);
    }
    bucket.push(Object.freeze(record));
    added += 1;
  }

  return added;
}
