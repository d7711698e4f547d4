/**
 * Depth-first traversal over block content: paragraphs directly in a part
 * or in table cells, through tables nested to any depth.
 */

import type { DocxDocument, DocxPart } from "./document.js";
import type { Paragraph, Table } from "./elements.js";

/** Paragraphs of `tables`, recursing into nested tables. */
export function tableParagraphs(tables: readonly Table[]): Paragraph[] {
  const out: Paragraph[] = [];
  for (const table of tables) {
    for (const row of table.rows) {
      for (const cell of row.cells) {
        out.push(...cell.paragraphs);
        out.push(...tableParagraphs(cell.tables));
      }
    }
  }
  return out;
}

/** Top-level paragraphs first, then every table paragraph. */
export function partParagraphs(part: DocxPart): Paragraph[] {
  return [...part.paragraphs, ...tableParagraphs(part.tables)];
}

export function documentParagraphs(doc: DocxDocument): Paragraph[] {
  return doc.parts.flatMap(partParagraphs);
}
