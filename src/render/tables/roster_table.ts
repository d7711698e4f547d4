/**
 * Roster tables: header rows stay, data rows are replaced wholesale.
 */

import path from "path";

import type { Paragraph, Table, TableCell } from "../../docx/elements.js";
import { appendPicture, resolveImagePath } from "../../docx/images.js";

export type RosterCell =
  | { kind: "text"; text: string }
  | { kind: "images"; names: readonly string[]; widthInches: number };

export type RosterRow = readonly RosterCell[];

export interface RosterTable {
  readonly headerRowCount: number;
  /** Drop every row after the header, then append one row per entry. */
  replaceDataRows(rows: readonly RosterRow[]): Promise<void>;
}

export function textCell(text: string): RosterCell {
  return { kind: "text", text };
}

const IMAGE_GAP = "    ";

export class DocxRosterTable implements RosterTable {
  constructor(
    private readonly table: Table,
    readonly headerRowCount: number,
    private readonly imageFolder: string | null,
  ) {}

  async replaceDataRows(rows: readonly RosterRow[]): Promise<void> {
    this.table.truncateRows(this.headerRowCount);
    for (const values of rows) {
      const cells = this.table.addRow().cells;
      const count = Math.min(cells.length, values.length);
      for (let i = 0; i < count; i++) {
        await this.fillCell(cells[i], values[i]);
      }
    }
  }

  private async fillCell(cell: TableCell, value: RosterCell): Promise<void> {
    if (value.kind === "text") {
      cell.setText(value.text);
      return;
    }
    await this.fillImageCell(cell, value.names, value.widthInches);
  }

  /** Pictures two per line, left then right. */
  private async fillImageCell(cell: TableCell, names: readonly string[], widthInches: number): Promise<void> {
    const folder = this.imageFolder;
    if (folder === null) {
      cell.setText(names.join(", "));
      return;
    }
    if (names.length === 0) {
      cell.setText("No images");
      return;
    }

    const entries = names.map((name) => ({ name, resolved: resolveImagePath(folder, name) }));
    let paragraph = cell.clear();
    for (let i = 0; i < entries.length; i += 2) {
      if (i > 0) paragraph = cell.addParagraph();
      await placeImage(paragraph, entries[i], widthInches);
      paragraph.addRun(IMAGE_GAP);
      const right = entries[i + 1];
      if (right) await placeImage(paragraph, right, widthInches);
    }
  }
}

async function placeImage(
  paragraph: Paragraph,
  entry: { name: string; resolved: string | null },
  widthInches: number,
): Promise<void> {
  if (entry.resolved === null) {
    paragraph.addRun(`[Image not found: ${entry.name}]`);
    return;
  }
  try {
    await appendPicture(paragraph, entry.resolved, widthInches);
  } catch {
    paragraph.addRun(`[Error loading: ${path.basename(entry.resolved)}]`);
  }
}
