/**
 * Test fixtures: DOCX templates built with the docx package, XLSX/CSV
 * datasets written with xlsx, PNG images drawn with sharp. Everything is
 * written into throwaway temp directories.
 */

import { mkdtempSync, readFileSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { Document, Footer, Header, Packer, Paragraph, Table, TableCell, TableRow, TextRun } from "docx";
import PizZip from "pizzip";
import sharp from "sharp";
import * as XLSX from "xlsx";

import { DocxDocument, type DocxPart } from "../../src/docx/document.js";
import { documentParagraphs } from "../../src/docx/walk.js";

export type Block = Paragraph | Table;
export type CellContent = string | Table | Block[];

// ── DOCX ────────────────────────────────────────────────────────────

export function para(text: string): Paragraph {
  return new Paragraph({ children: [new TextRun(text)] });
}

/** One paragraph whose text is spread over several runs. */
export function splitPara(...parts: string[]): Paragraph {
  return new Paragraph({
    children: parts.map((text, i) => new TextRun({ text, bold: i % 2 === 1 })),
  });
}

export function table(rows: CellContent[][]): Table {
  return new Table({
    rows: rows.map(
      (cells) =>
        new TableRow({
          children: cells.map((content) => new TableCell({ children: cellChildren(content) })),
        }),
    ),
  });
}

function cellChildren(content: CellContent): Block[] {
  if (typeof content === "string") return [para(content)];
  if (content instanceof Table) return [content, new Paragraph("")];
  return content;
}

export async function buildDocx(
  children: Block[],
  opts: { header?: string; footer?: string } = {},
): Promise<Buffer> {
  const doc = new Document({
    sections: [
      {
        headers: opts.header ? { default: new Header({ children: [para(opts.header)] }) } : undefined,
        footers: opts.footer ? { default: new Footer({ children: [para(opts.footer)] }) } : undefined,
        children,
      },
    ],
  });
  return Packer.toBuffer(doc);
}

export async function writeDocx(filePath: string, children: Block[]): Promise<string> {
  writeFileSync(filePath, await buildDocx(children));
  return filePath;
}

/** Paragraph texts of every part, body first. */
export function paragraphTexts(docx: Buffer): string[] {
  return documentParagraphs(DocxDocument.load(docx)).map((p) => p.text);
}

export function fullText(docx: Buffer): string {
  return paragraphTexts(docx).join("\n");
}

/** The main document part; headers and footers follow it. */
export function mainPart(doc: DocxDocument): DocxPart {
  return doc.parts[0];
}

/** Cell texts of the body's `index`-th top-level table. */
export function tableTexts(docx: Buffer, index = 0): string[][] {
  const tbl = mainPart(DocxDocument.load(docx)).tables[index];
  return tbl.rows.map((row) => row.cells.map((cell) => cell.text));
}

// ── Datasets ────────────────────────────────────────────────────────

/** Primary layout: labels in row 0, blank rows 1–2, field names (with KEY) in row 3. */
export function primaryGrid(header: string[], data: string[][]): string[][] {
  const blank = header.map(() => "");
  return [header, blank, blank, header, ...data];
}

/** Linked layout: field names (with PARENT_KEY) in row 3. */
export function linkedGrid(header: string[], data: string[][]): string[][] {
  const blank = header.map(() => "");
  return [blank, blank, blank, header, ...data];
}

/** Rows may hold xlsx cell objects, such as `{ t: "n", v: 1500, z: "#,##0" }`. */
export function writeXlsx(filePath: string, rows: unknown[][]): string {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Sheet1");
  const buf: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(buf)) throw new Error("xlsx did not return a buffer");
  writeFileSync(filePath, buf);
  return filePath;
}

/** Values must not contain commas, quotes or newlines. */
export function writeCsv(filePath: string, rows: string[][]): string {
  writeFileSync(filePath, rows.map((r) => r.join(",")).join("\n") + "\n");
  return filePath;
}

// ── Images / archives / temp dirs ───────────────────────────────────

export async function writePng(filePath: string, width = 40, height = 20): Promise<string> {
  const png = await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } },
  })
    .png()
    .toBuffer();
  writeFileSync(filePath, png);
  return filePath;
}

/** Uncompressed 24-bit BMP of a single pixel. */
export function writeBmp(filePath: string): string {
  const bmp = Buffer.alloc(58);
  bmp.write("BM", 0, "ascii");
  bmp.writeUInt32LE(58, 2); // file size
  bmp.writeUInt32LE(54, 10); // pixel data offset
  bmp.writeUInt32LE(40, 14); // BITMAPINFOHEADER
  bmp.writeInt32LE(1, 18); // width
  bmp.writeInt32LE(1, 22); // height
  bmp.writeUInt16LE(1, 26); // planes
  bmp.writeUInt16LE(24, 28); // bits per pixel
  bmp.writeUInt32LE(4, 34); // pixel data size, row padded to 4 bytes
  bmp.writeInt32LE(2835, 38);
  bmp.writeInt32LE(2835, 42);
  bmp.set([30, 30, 200], 54); // BGR
  writeFileSync(filePath, bmp);
  return filePath;
}

export function makeTempDir(prefix = "docgen-test-"): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function zipEntryNames(zipPath: string): string[] {
  const zip = new PizZip(readFileSync(zipPath));
  return Object.keys(zip.files).filter((name) => !zip.files[name].dir).sort();
}

export function zipEntry(zipPath: string, name: string): Buffer {
  const file = new PizZip(readFileSync(zipPath)).file(name);
  if (!file) throw new Error(`${name} not in ${zipPath}`);
  return file.asNodeBuffer();
}
