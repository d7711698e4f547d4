/**
 * WordprocessingML element wrappers: paragraphs, tables, rows and cells.
 *
 * Semantics follow what Word users see: a paragraph's text is the merged
 * text of its runs (so a `{token}` split across runs is still one token),
 * a cell's text is its direct paragraphs joined by newlines, and nested
 * tables are reached through `TableCell.tables`.
 */

import {
  childElements,
  cloneNode,
  element,
  firstChild,
  getAttr,
  innerText,
  textNode,
  type XmlElement,
  type XmlNode,
} from "./xml.js";
import type { DocxPart } from "./document.js";

/** Wrappers whose runs count as paragraph content. */
const RUN_CONTAINERS = new Set([
  "w:hyperlink",
  "w:ins",
  "w:smartTag",
  "w:fldSimple",
  "w:customXml",
  "w:sdt",
  "w:sdtContent",
]);

// ── Paragraph ───────────────────────────────────────────────────────

export class Paragraph {
  constructor(
    readonly part: DocxPart,
    readonly node: XmlElement,
  ) {}

  get text(): string {
    return this.runs().map(runText).join("");
  }

  /** True when the paragraph holds a drawing or legacy picture. */
  hasGraphics(): boolean {
    return this.runs().some((r) =>
      r.children.some((c) => c.type === "element" && (c.name === "w:drawing" || c.name === "w:pict")),
    );
  }

  /**
   * Replace the paragraph content with a single run of `text`, keeping the
   * paragraph properties and the first run's formatting.
   */
  setText(text: string): void {
    const rPr = this.firstRunProperties();
    this.clear();
    this.addRun(text, rPr);
  }

  /**
   * Apply `transform` to the paragraph text. Paragraphs with graphics are
   * transformed run by run so embedded pictures survive.
   */
  replaceText(transform: (text: string) => string): boolean {
    if (!this.hasGraphics()) {
      const before = this.text;
      const after = transform(before);
      if (after === before) return false;
      this.setText(after);
      return true;
    }

    let changed = false;
    for (const run of this.runs()) {
      const before = runText(run);
      if (!before) continue;
      const after = transform(before);
      if (after === before) continue;
      const rPr = firstChild(run, "w:rPr");
      run.children = buildRunChildren(after, rPr ? cloneNode(rPr) : undefined);
      changed = true;
    }
    return changed;
  }

  /** Remove every child except the paragraph properties. */
  clear(): void {
    this.node.children = this.node.children.filter(
      (c) => c.type === "element" && c.name === "w:pPr",
    );
    this.node.selfClosing = false;
  }

  addRun(text: string, rPr?: XmlElement): XmlElement {
    const run = element("w:r", {}, buildRunChildren(text, rPr ? cloneNode(rPr) : undefined));
    this.append(run);
    return run;
  }

  /** Append an inline picture already registered with the part. */
  addPicture(picture: InlinePicture): XmlElement {
    const run = element("w:r", {}, [buildDrawing(picture)]);
    this.append(run);
    return run;
  }

  firstRunProperties(): XmlElement | undefined {
    for (const run of this.runs()) {
      const rPr = firstChild(run, "w:rPr");
      if (rPr) return rPr;
    }
    return undefined;
  }

  private append(node: XmlNode): void {
    this.node.children.push(node);
    this.node.selfClosing = false;
  }

  private runs(): XmlElement[] {
    const out: XmlElement[] = [];
    const visit = (node: XmlElement): void => {
      for (const child of childElements(node)) {
        if (child.name === "w:r") out.push(child);
        else if (RUN_CONTAINERS.has(child.name)) visit(child);
      }
    };
    visit(this.node);
    return out;
  }
}

function runText(run: XmlElement): string {
  let text = "";
  for (const child of childElements(run)) {
    switch (child.name) {
      case "w:t":
        text += innerText(child);
        break;
      case "w:tab":
        text += "\t";
        break;
      case "w:br":
      case "w:cr":
        text += "\n";
        break;
    }
  }
  return text;
}

function buildRunChildren(text: string, rPr?: XmlElement): XmlNode[] {
  const children: XmlNode[] = rPr ? [rPr] : [];
  const lines = text.split("\n");
  lines.forEach((line, lineIdx) => {
    if (lineIdx > 0) children.push(element("w:br"));
    line.split("\t").forEach((segment, segIdx) => {
      if (segIdx > 0) children.push(element("w:tab"));
      if (segment) {
        children.push(element("w:t", { "xml:space": "preserve" }, [textNode(segment)]));
      }
    });
  });
  return children;
}

// ── Inline pictures ─────────────────────────────────────────────────

export const EMU_PER_INCH = 914400;

export interface InlinePicture {
  relationshipId: string;
  docPrId: number;
  name: string;
  widthEmu: number;
  heightEmu: number;
}

const NS_A = "http://schemas.openxmlformats.org/drawingml/2006/main";
const NS_PIC = "http://schemas.openxmlformats.org/drawingml/2006/picture";

function buildDrawing(p: InlinePicture): XmlElement {
  const cx = String(p.widthEmu);
  const cy = String(p.heightEmu);
  const pic = element("pic:pic", { "xmlns:pic": NS_PIC }, [
    element("pic:nvPicPr", {}, [
      element("pic:cNvPr", { id: "0", name: p.name }),
      element("pic:cNvPicPr"),
    ]),
    element("pic:blipFill", {}, [
      element("a:blip", { "r:embed": p.relationshipId }),
      element("a:stretch", {}, [element("a:fillRect")]),
    ]),
    element("pic:spPr", {}, [
      element("a:xfrm", {}, [
        element("a:off", { x: "0", y: "0" }),
        element("a:ext", { cx, cy }),
      ]),
      element("a:prstGeom", { prst: "rect" }, [element("a:avLst")]),
    ]),
  ]);

  return element("w:drawing", {}, [
    element("wp:inline", { distT: "0", distB: "0", distL: "0", distR: "0" }, [
      element("wp:extent", { cx, cy }),
      element("wp:docPr", { id: String(p.docPrId), name: `Picture ${p.docPrId}` }),
      element("wp:cNvGraphicFramePr", {}, [
        element("a:graphicFrameLocks", { "xmlns:a": NS_A, noChangeAspect: "1" }),
      ]),
      element("a:graphic", { "xmlns:a": NS_A }, [
        element("a:graphicData", { uri: NS_PIC }, [pic]),
      ]),
    ]),
  ]);
}

// ── Tables ──────────────────────────────────────────────────────────

export class Table {
  constructor(
    readonly part: DocxPart,
    readonly node: XmlElement,
  ) {}

  get rows(): TableRow[] {
    return childElements(this.node, "w:tr").map((tr) => new TableRow(this.part, tr));
  }

  /** Text of the first `count` rows, every cell joined by a space. */
  leadingText(count = 2): string {
    return this.rows
      .slice(0, count)
      .flatMap((row) => row.cells.map((cell) => cell.text))
      .join(" ");
  }

  /** Drop every row after the first `keep`. */
  truncateRows(keep: number): void {
    let seen = 0;
    this.node.children = this.node.children.filter((c) => {
      if (c.type !== "element" || c.name !== "w:tr") return true;
      seen += 1;
      return seen <= keep;
    });
  }

  /** Append an empty row with one cell per grid column. */
  addRow(): TableRow {
    const widths = this.gridWidths();
    const cells = widths.map((w) =>
      element("w:tc", {}, [
        element("w:tcPr", {}, w ? [element("w:tcW", { "w:w": w, "w:type": "dxa" })] : []),
        element("w:p"),
      ]),
    );
    const tr = element("w:tr", {}, cells);
    this.node.children.push(tr);
    return new TableRow(this.part, tr);
  }

  private gridWidths(): Array<string | undefined> {
    const grid = firstChild(this.node, "w:tblGrid");
    const cols = grid ? childElements(grid, "w:gridCol") : [];
    if (cols.length > 0) return cols.map((c) => getAttr(c, "w:w"));
    const rows = this.rows;
    const last = rows[rows.length - 1];
    return Array.from({ length: last ? last.cells.length : 1 }, () => undefined);
  }
}

export class TableRow {
  constructor(
    readonly part: DocxPart,
    readonly node: XmlElement,
  ) {}

  get cells(): TableCell[] {
    return childElements(this.node, "w:tc").map((tc) => new TableCell(this.part, tc));
  }
}

export class TableCell {
  constructor(
    readonly part: DocxPart,
    readonly node: XmlElement,
  ) {}

  get paragraphs(): Paragraph[] {
    return childElements(this.node, "w:p").map((p) => new Paragraph(this.part, p));
  }

  get tables(): Table[] {
    return childElements(this.node, "w:tbl").map((t) => new Table(this.part, t));
  }

  get text(): string {
    return this.paragraphs.map((p) => p.text).join("\n");
  }

  /** Replace all cell content with a single paragraph holding `text`. */
  setText(text: string): void {
    const p = this.clear();
    if (text) p.addRun(text);
  }

  /**
   * Remove all content except the cell properties and leave one empty
   * paragraph (a cell must always end in a paragraph).
   */
  clear(): Paragraph {
    this.node.children = this.node.children.filter(
      (c) => c.type === "element" && c.name === "w:tcPr",
    );
    return this.addParagraph();
  }

  addParagraph(): Paragraph {
    const p = element("w:p");
    this.node.children.push(p);
    this.node.selfClosing = false;
    return new Paragraph(this.part, p);
  }
}
