/**
 * Row Renderer Tests
 *
 * Verifies:
 * - Placeholders are substituted in body, nested tables and headers
 * - Leftover tokens are swept
 * - Ranked needs modes: both, table, inline
 * - Linked rosters and the labor income total
 * - Image embedding and its text fallbacks
 * - renderRow writes the named file or returns a failed outcome
 */

import { describe, it, expect, afterEach } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import path from "path";
import PizZip from "pizzip";

import { DocxDocument } from "../src/docx/document.js";
import type { Table } from "../src/docx/elements.js";
import { documentParagraphs } from "../src/docx/walk.js";
import { buildColumnMapping, findMarkerColumn, KEY_MARKER } from "../src/datasets/column_mapper.js";
import { LinkedIndex } from "../src/datasets/linked_index.js";
import { createRenderContext, type RenderContext } from "../src/render/context.js";
import { buildReplacementData, renderDocument, renderRow } from "../src/render/row_renderer.js";
import { DesignatedFieldsSchema, type RankedNeedsMode } from "../src/shared/run_config.js";
import { scanDocxPlaceholders } from "../src/templates/analyzer.js";
import {
  buildDocx,
  linkedGrid,
  mainPart,
  makeTempDir,
  para,
  primaryGrid,
  splitPara,
  table,
  writeBmp,
  writePng,
  type Block,
} from "./helpers/fixtures.js";

let tmp: string | undefined;

afterEach(() => {
  if (tmp) rmSync(tmp, { recursive: true, force: true });
  tmp = undefined;
});

interface SetupOptions {
  header?: string;
  linked?: string[][][];
  imageFolder?: string;
  mode?: RankedNeedsMode;
}

async function setup(children: Block[], columns: string[], opts: SetupOptions = {}): Promise<RenderContext> {
  const templateBytes = await buildDocx(children, { header: opts.header });
  const grid = primaryGrid(columns, []);
  const placeholders = new Set(scanDocxPlaceholders(templateBytes));
  return createRenderContext({
    templateBytes,
    placeholders,
    mapping: buildColumnMapping(placeholders, grid),
    keyColumn: findMarkerColumn(grid, KEY_MARKER) ?? 0,
    linkedIndex: LinkedIndex.fromGrids((opts.linked ?? []).map((g, i) => ({ label: `linked${i}`, grid: g }))),
    imageFolder: opts.imageFolder ?? null,
    imageWidthInches: 1,
    rankedNeedsMode: opts.mode ?? "both",
    fields: DesignatedFieldsSchema.parse({}),
  });
}

function bodyTexts(doc: DocxDocument): string[] {
  return mainPart(doc).paragraphs.map((p) => p.text);
}

function cellTexts(tbl: Table): string[][] {
  return tbl.rows.map((r) => r.cells.map((c) => c.text));
}

// ── Substitution ────────────────────────────────────────────────────

describe("renderDocument: substitution", () => {
  it("substitutes mapped values and sweeps unknown tokens", async () => {
    const ctx = await setup(
      [para("Name: {resp_lname}, {unknown}"), splitPara("Age {a", "ge}")],
      ["KEY", "resp_lname", "age"],
    );
    const { doc, data } = await renderDocument(["K1", "Cruz", "30"], ctx);

    expect(bodyTexts(doc)).toEqual(["Name: Cruz, ", "Age 30"]);
    expect(data).toEqual({ age: "30", resp_lname: "Cruz" });
  });

  it("reaches nested tables and headers", async () => {
    const ctx = await setup([table([[table([["Age {age}"]])]])], ["KEY", "age", "resp_lname"], {
      header: "Family {resp_lname}",
    });
    const { doc } = await renderDocument(["K1", "30", "Cruz"], ctx);

    const nested = mainPart(doc).tables[0].rows[0].cells[0].tables[0];
    expect(nested.rows[0].cells[0].text).toBe("Age 30");
    const header = doc.parts.find((p) => p.path.startsWith("word/header"));
    expect(header?.paragraphs[0].text).toBe("Family Cruz");
  });

  it("blanks mapped placeholders whose cells are missing", async () => {
    const ctx = await setup([para("[{age}]")], ["KEY", "age"]);
    const { doc } = await renderDocument(["K1"], ctx);
    expect(bodyTexts(doc)).toEqual(["[]"]);
  });

  it("renders every row from an untouched template", async () => {
    const ctx = await setup([para("{resp_lname}")], ["KEY", "resp_lname"]);
    const first = await renderDocument(["K1", "Cruz"], ctx);
    const second = await renderDocument(["K2", "Reyes"], ctx);
    expect(bodyTexts(first.doc)).toEqual(["Cruz"]);
    expect(bodyTexts(second.doc)).toEqual(["Reyes"]);
  });
});

describe("buildReplacementData", () => {
  it("reads one cell per mapped placeholder", () => {
    const mapping = new Map([
      ["a", 2],
      ["b", 5],
    ]);
    expect(buildReplacementData(["k", "x", "y"], mapping)).toEqual({ a: "y", b: "" });
  });
});

// ── Ranked needs ────────────────────────────────────────────────────

describe("renderDocument: ranked needs", () => {
  const template = (): Block[] => [
    para("Needs: {bus_info_needs}"),
    para("Ranks: {bus_info_needs_rank}"),
    para("R1 {bus_info_needs_rank_reason1} R4 {bus_info_needs_rank_reason4}"),
    para("Other: {bus_info_needs_o}"),
    table([
      ["Information Needs", "Rank", "Reason"],
      ["{bus_info_needs}", "{bus_info_needs_rank}", "{bus_info_needs_rank_reason1}"],
    ]),
  ];
  const COLUMNS = ["KEY", "bus_info_needs", "bus_info_needs_o"];
  const ROW = ["K1", "A, B, Others, specify", "X"];
  const FILLED = [
    ["Information Needs", "Rank", "Reason"],
    ["", "", ""],
    ["A", "1", ""],
    ["B", "2", ""],
    ["Others, specify: X", "3", ""],
  ];

  it("expands inline placeholders and fills the roster in 'both' mode", async () => {
    const ctx = await setup(template(), COLUMNS, { mode: "both" });
    const { doc } = await renderDocument(ROW, ctx);

    expect(bodyTexts(doc)).toEqual([
      "Needs: A\nB\nOthers, specify: X",
      "Ranks: 1\n2\n3",
      "R1  R4 ",
      "Other: X",
    ]);
    expect(cellTexts(mainPart(doc).tables[0])).toEqual(FILLED);
  });

  it("keeps the raw answer inline in 'table' mode", async () => {
    const ctx = await setup(template(), COLUMNS, { mode: "table" });
    const { doc } = await renderDocument(ROW, ctx);

    expect(bodyTexts(doc).slice(0, 2)).toEqual(["Needs: A, B, Others, specify", "Ranks: "]);
    expect(cellTexts(mainPart(doc).tables[0])).toEqual(FILLED);
  });

  it("treats the roster as a plain table in 'inline' mode", async () => {
    const ctx = await setup(template(), COLUMNS, { mode: "inline" });
    const { doc } = await renderDocument(ROW, ctx);

    expect(cellTexts(mainPart(doc).tables[0])).toEqual([
      ["Information Needs", "Rank", "Reason"],
      ["A\nB\nOthers, specify: X", "1\n2\n3", ""],
    ]);
  });

  it("leaves the roster unfilled for a blank answer", async () => {
    const ctx = await setup(template(), COLUMNS);
    const { doc } = await renderDocument(["K1", "nan", ""], ctx);

    expect(bodyTexts(doc)).toEqual(["Needs: ", "Ranks: ", "R1  R4 ", "Other: "]);
    expect(cellTexts(mainPart(doc).tables[0])).toEqual([
      ["Information Needs", "Rank", "Reason"],
      ["", "", ""],
    ]);
  });
});

// ── Linked rosters ──────────────────────────────────────────────────

describe("renderDocument: linked rosters", () => {
  const members = linkedGrid(
    ["PARENT_KEY", "hhcomp_hhmmbr_fname", "hhcomp_hhmmbr_lname", "hhcomp_hhmmbr_hhreltn"],
    [
      ["K1", "Ana", "Cruz", "Daughter"],
      ["K1", "Ben", "Cruz", "Son"],
      ["K2", "Cy", "Reyes", "Head"],
    ],
  );
  const labor = linkedGrid(
    ["PARENT_KEY", "hh_labor_stat", "hh_labor_pri_src", "hh_calc_total_inc"],
    [
      ["K1", "Employed", "Farming", "1000"],
      ["K1", "Employed", "Fishing", "500"],
    ],
  );
  const memberTable = () =>
    table([
      ["No.", "Name of HH Member", "Relationship"],
      ["", "", ""],
      ["old", "x", "y"],
    ]);
  const laborTable = () =>
    table([
      ["Labor Force Status", "", ""],
      ["No.", "Status", "Source"],
      ["", "", ""],
      ["old", "x", "y"],
    ]);
  const template = (): Block[] => [para("Total income: {hh_calc_total_sum}"), memberTable(), laborTable()];

  it("repopulates rosters from the row's records", async () => {
    const ctx = await setup(template(), ["KEY"], { linked: [members, labor] });
    const { doc } = await renderDocument(["K1"], ctx);

    expect(bodyTexts(doc)).toEqual(["Total income: 1500"]);
    expect(cellTexts(mainPart(doc).tables[0])).toEqual([
      ["No.", "Name of HH Member", "Relationship"],
      ["", "", ""],
      ["1", "Ana Cruz", "Daughter"],
      ["2", "Ben Cruz", "Son"],
    ]);
    expect(cellTexts(mainPart(doc).tables[1])).toEqual([
      ["Labor Force Status", "", ""],
      ["No.", "Status", "Source"],
      ["", "", ""],
      ["1", "Employed", "Farming"],
      ["2", "Employed", "Fishing"],
    ]);
  });

  it("empties rosters whose category has no records", async () => {
    const ctx = await setup(template(), ["KEY"], { linked: [members, labor] });
    const { doc } = await renderDocument(["K2"], ctx);

    expect(bodyTexts(doc)).toEqual(["Total income: 0"]);
    expect(mainPart(doc).tables[0].rows).toHaveLength(3);
    expect(mainPart(doc).tables[1].rows).toHaveLength(3);
  });

  it("leaves rosters alone when the row has no records", async () => {
    const ctx = await setup(template(), ["KEY"], { linked: [members, labor] });
    const { doc } = await renderDocument(["K9"], ctx);

    expect(bodyTexts(doc)).toEqual(["Total income: "]);
    expect(cellTexts(mainPart(doc).tables[0])[2]).toEqual(["old", "x", "y"]);
  });

  it("finds rosters nested inside other tables", async () => {
    const ctx = await setup([table([[memberTable()]])], ["KEY"], { linked: [members] });
    const { doc } = await renderDocument(["K2"], ctx);

    const nested = mainPart(doc).tables[0].rows[0].cells[0].tables[0];
    expect(cellTexts(nested)[2]).toEqual(["1", "Cy Reyes", "Head"]);
  });
});

// ── Images ──────────────────────────────────────────────────────────

describe("renderDocument: images", () => {
  const COLUMNS = ["KEY", "resp_pix", "resp_lname"];
  const template = (): Block[] => [para("Photo: {resp_pix} end {resp_lname}")];

  it("embeds the picture between the surrounding text", async () => {
    tmp = makeTempDir();
    await writePng(path.join(tmp, "resp1.png"));
    const ctx = await setup(template(), COLUMNS, { imageFolder: tmp });

    const { doc } = await renderDocument(["K1", "resp1", "Cruz"], ctx);

    const p = mainPart(doc).paragraphs[0];
    expect(p.text).toBe("Photo:  end Cruz");
    expect(p.hasGraphics()).toBe(true);
    const saved = new PizZip(doc.toBuffer());
    expect(saved.file("word/media/docgen_image1.png")).not.toBeNull();
  });

  it("embeds a bitmap found by its base name", async () => {
    tmp = makeTempDir();
    writeBmp(path.join(tmp, "resp1.bmp"));
    const ctx = await setup(template(), COLUMNS, { imageFolder: tmp });

    const { doc } = await renderDocument(["K1", "resp1", "Cruz"], ctx);

    const p = mainPart(doc).paragraphs[0];
    expect(p.text).toBe("Photo:  end Cruz");
    expect(p.hasGraphics()).toBe(true);
    const saved = new PizZip(doc.toBuffer());
    expect(saved.file("word/media/docgen_image1.bmp")).not.toBeNull();
  });

  it("substitutes the file name when no file matches", async () => {
    tmp = makeTempDir();
    const ctx = await setup(template(), COLUMNS, { imageFolder: tmp });
    const { doc } = await renderDocument(["K1", "ghost.png", "Cruz"], ctx);

    expect(bodyTexts(doc)).toEqual(["Photo: ghost.png end Cruz"]);
    expect(mainPart(doc).paragraphs[0].hasGraphics()).toBe(false);
  });

  it("writes a note when the file cannot be decoded", async () => {
    tmp = makeTempDir();
    writeFileSync(path.join(tmp, "bad.png"), "not an image");
    const ctx = await setup(template(), COLUMNS, { imageFolder: tmp });
    const { doc } = await renderDocument(["K1", "bad.png", "Cruz"], ctx);

    expect(bodyTexts(doc)).toEqual(["Photo: [Image not found: bad.png] end Cruz"]);
  });

  it("treats the image field as text without an image folder", async () => {
    const ctx = await setup(template(), COLUMNS);
    const { doc } = await renderDocument(["K1", "resp1", "Cruz"], ctx);
    expect(bodyTexts(doc)).toEqual(["Photo: resp1 end Cruz"]);
  });
});

// ── renderRow ───────────────────────────────────────────────────────

describe("renderRow", () => {
  const COLUMNS = ["KEY", "pckg_brgy", "resp_lname"];
  const template = (): Block[] => [para("{pckg_brgy} / {resp_lname}")];

  it("writes the document under its derived name", async () => {
    tmp = makeTempDir();
    const ctx = await setup(template(), COLUMNS);

    const outcome = await renderRow({ index: 2, rowNumber: 6, row: ["K1", "San Jose", "Cruz"], outputDir: tmp }, ctx);

    const expectedPath = path.join(tmp, "San Jose_Cruz_002.docx");
    expect(outcome).toEqual({
      ok: true,
      document: { index: 2, fileName: "San Jose_Cruz_002.docx", path: expectedPath },
    });
    expect(existsSync(expectedPath)).toBe(true);
    const saved = DocxDocument.load(readFileSync(expectedPath));
    expect(documentParagraphs(saved).map((p) => p.text)).toEqual(["San Jose / Cruz"]);
  });

  it("returns a failed outcome instead of throwing", async () => {
    const ctx = await setup(template(), COLUMNS);
    const outcome = await renderRow(
      { index: 3, rowNumber: 7, row: ["K1", "", ""], outputDir: "/nonexistent/docgen-out" },
      ctx,
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.index).toBe(3);
      expect(outcome.failure.rowNumber).toBe(7);
      expect(outcome.failure.message).toContain("ENOENT");
    }
  });
});
