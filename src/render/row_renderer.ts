/**
 * Row Renderer
 *
 * Turns one primary data row into one DOCX file:
 *   1. parse a private document instance from the template bytes
 *   2. look up the row's linked records by its KEY value
 *   3. build placeholder values from the column mapping
 *   4. expand the ranked multiselect field
 *   5. substitute paragraphs and tables (image field first), filling the
 *      ranked needs roster on the way
 *   6. repopulate linked rosters and the labor income total
 *   7. clear every leftover `{...}` token
 *   8. write `{barangay}_{lastname}_{NNN}.docx` into the job's directory
 *
 * Errors never escape: they come back as a failed outcome for the batch
 * to collect.
 */

import { writeFile } from "fs/promises";
import path from "path";

import { DocxDocument, type DocxPart } from "../docx/document.js";
import type { Table } from "../docx/elements.js";
import { documentParagraphs } from "../docx/walk.js";
import { errorMessage } from "../shared/errors.js";
import type {
  ColumnMapping,
  RenderJob,
  RenderOutcome,
  ReplacementData,
} from "../shared/types.js";
import type { RenderContext } from "./context.js";
import { deriveFileName } from "./filename.js";
import { computeRankedNeeds, rankedNeedsReplacements, type RankedNeedsResult } from "./ranked_needs.js";
import { substituteParagraph, sweepParagraph, type ImageField } from "./substitute.js";
import { buildRankedNeedsRows } from "./tables/builders/ranked_needs.js";
import { classifyTable, headerRowCount } from "./tables/classify.js";
import { groupRecords, laborIncomeTotal, type GroupedRecords } from "./tables/records.js";
import { ROSTER_BUILDERS, isLinkedRoster } from "./tables/registry.js";
import { DocxRosterTable } from "./tables/roster_table.js";

export const LABOR_TOTAL_PLACEHOLDER = "{hh_calc_total_sum}";

export async function renderRow(job: RenderJob, ctx: RenderContext): Promise<RenderOutcome> {
  try {
    const { doc, data } = await renderDocument(job.row, ctx);
    const fileName = deriveFileName(
      data[ctx.fields.barangay] ?? "",
      data[ctx.fields.lastName] ?? "",
      job.index,
    );
    const outPath = path.join(job.outputDir, fileName);
    await writeFile(outPath, doc.toBuffer());
    return { ok: true, document: { index: job.index, fileName, path: outPath } };
  } catch (err) {
    return {
      ok: false,
      failure: { index: job.index, rowNumber: job.rowNumber, message: errorMessage(err) },
    };
  }
}

/** Render a row in memory. Exposed for callers that want the document, not a file. */
export async function renderDocument(
  row: readonly string[],
  ctx: RenderContext,
): Promise<{ doc: DocxDocument; data: ReplacementData }> {
  const doc = DocxDocument.load(ctx.templateBytes);
  const records = ctx.linkedIndex.lookup(row[ctx.keyColumn] ?? "");
  const data = buildReplacementData(row, ctx.mapping);

  let ranked: RankedNeedsResult | null = null;
  const { rankedNeeds, rankedNeedsOther } = ctx.fields;
  if (Object.hasOwn(data, rankedNeeds)) {
    ranked = computeRankedNeeds(data, rankedNeeds, rankedNeedsOther);
    if (ctx.rankedNeedsMode !== "table") {
      Object.assign(data, rankedNeedsReplacements(ranked, rankedNeeds));
    }
  }

  const renderer = new PartRenderer(ctx, data, ranked);
  for (const part of doc.parts) {
    await renderer.substitute(part);
  }

  if (records.length > 0) {
    const grouped = groupRecords(records);
    for (const part of doc.parts) {
      await populateLinkedRosters(part.tables, grouped, ctx.imageFolder);
    }
    fillLaborTotal(doc, laborIncomeTotal(grouped.labor));
  }

  for (const paragraph of documentParagraphs(doc)) {
    sweepParagraph(paragraph);
  }

  return { doc, data };
}

export function buildReplacementData(row: readonly string[], mapping: ColumnMapping): ReplacementData {
  const data: ReplacementData = {};
  for (const [placeholder, column] of mapping) {
    data[placeholder] = row[column] ?? "";
  }
  return data;
}

// ── Substitution ────────────────────────────────────────────────────

class PartRenderer {
  private readonly image: ImageField | undefined;

  constructor(
    private readonly ctx: RenderContext,
    private readonly data: ReplacementData,
    private readonly ranked: RankedNeedsResult | null,
  ) {
    this.image =
      ctx.imageFolder !== null && Object.hasOwn(data, ctx.fields.image)
        ? { field: ctx.fields.image, folder: ctx.imageFolder, widthInches: ctx.imageWidthInches }
        : undefined;
  }

  async substitute(part: DocxPart): Promise<void> {
    for (const paragraph of part.paragraphs) {
      await substituteParagraph(paragraph, this.data, this.image);
    }
    await this.substituteTables(part.tables);
  }

  private async substituteTables(tables: readonly Table[]): Promise<void> {
    for (const table of tables) {
      if (await this.fillsRankedRoster(table)) continue;
      for (const row of table.rows) {
        for (const cell of row.cells) {
          for (const paragraph of cell.paragraphs) {
            await substituteParagraph(paragraph, this.data, this.image);
          }
          await this.substituteTables(cell.tables);
        }
      }
    }
  }

  /** Fill `table` from the ranked items when it is the ranked needs roster. */
  private async fillsRankedRoster(table: Table): Promise<boolean> {
    if (this.ctx.rankedNeedsMode === "inline") return false;
    if (!this.ranked || this.ranked.items.length === 0) return false;
    if (classifyTable(table.leadingText()) !== "RankedNeeds") return false;

    const roster = new DocxRosterTable(table, headerRowCount("RankedNeeds"), this.ctx.imageFolder);
    await roster.replaceDataRows(buildRankedNeedsRows(this.ranked));
    return true;
  }
}

// ── Linked rosters ──────────────────────────────────────────────────

async function populateLinkedRosters(
  tables: readonly Table[],
  grouped: GroupedRecords,
  imageFolder: string | null,
): Promise<void> {
  for (const table of tables) {
    const category = classifyTable(table.leadingText());
    if (isLinkedRoster(category)) {
      const builder = ROSTER_BUILDERS[category];
      const roster = new DocxRosterTable(table, headerRowCount(category), imageFolder);
      await roster.replaceDataRows(builder.build(grouped[builder.source]));
      continue;
    }
    for (const row of table.rows) {
      for (const cell of row.cells) {
        await populateLinkedRosters(cell.tables, grouped, imageFolder);
      }
    }
  }
}

function fillLaborTotal(doc: DocxDocument, total: number): void {
  const text = String(total);
  for (const paragraph of documentParagraphs(doc)) {
    if (!paragraph.text.includes(LABOR_TOTAL_PLACEHOLDER)) continue;
    paragraph.replaceText((t) => t.split(LABOR_TOTAL_PLACEHOLDER).join(text));
  }
}
