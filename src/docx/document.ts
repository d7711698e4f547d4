/**
 * DOCX package: loads a .docx into editable parts (main document, headers,
 * footers), registers embedded images, and writes the package back out.
 */

import PizZip from "pizzip";

import { Paragraph, Table, type InlinePicture } from "./elements.js";
import {
  childElements,
  element,
  getAttr,
  parseXml,
  serializeXml,
  setAttr,
  type XmlElement,
} from "./xml.js";

const MAIN_PART = "word/document.xml";
const HEADER_FOOTER_RE = /^word\/(header|footer)\d*\.xml$/;
const CONTENT_TYPES = "[Content_Types].xml";
const REL_IMAGE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image";
const NS_REL_PACKAGE = "http://schemas.openxmlformats.org/package/2006/relationships";

const REQUIRED_NAMESPACES: Record<string, string> = {
  "xmlns:r": "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  "xmlns:wp": "http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing",
};

export interface ImageData {
  data: Buffer;
  /** Lower-case extension without the dot, e.g. "png". */
  extension: string;
  contentType: string;
}

// ── Part ────────────────────────────────────────────────────────────

/**
 * One XML part holding block content. For the main document the block
 * container is `<w:body>`; for headers and footers it is the root element.
 */
export class DocxPart {
  private readonly root: XmlElement;
  readonly container: XmlElement;

  constructor(
    readonly doc: DocxDocument,
    readonly path: string,
    private readonly tree: XmlElement,
  ) {
    const root = childElements(tree)[0];
    if (!root) throw new Error(`Part ${path} has no root element`);
    this.root = root;
    const body = root.name === "w:document" ? childElements(root, "w:body")[0] : root;
    if (!body) throw new Error(`Part ${path} has no <w:body>`);
    this.container = body;
  }

  get paragraphs(): Paragraph[] {
    return childElements(this.container, "w:p").map((p) => new Paragraph(this, p));
  }

  get tables(): Table[] {
    return childElements(this.container, "w:tbl").map((t) => new Table(this, t));
  }

  /** Register an image with this part and describe it for `Paragraph.addPicture`. */
  embedImage(image: ImageData, name: string, widthEmu: number, heightEmu: number): InlinePicture {
    this.ensureNamespaces();
    return {
      relationshipId: this.doc.addImageRelationship(this.path, image),
      docPrId: this.doc.nextDrawingId(),
      name,
      widthEmu,
      heightEmu,
    };
  }

  serialize(): string {
    return serializeXml(this.tree);
  }

  private ensureNamespaces(): void {
    for (const [attr, uri] of Object.entries(REQUIRED_NAMESPACES)) {
      if (getAttr(this.root, attr) === undefined) setAttr(this.root, attr, uri);
    }
  }
}

// ── Document ────────────────────────────────────────────────────────

export class DocxDocument {
  readonly parts: DocxPart[];
  private drawingId: number;
  private mediaCounter = 0;

  private constructor(private readonly zip: PizZip) {
    const main = zip.file(MAIN_PART);
    if (!main) throw new Error(`Not a DOCX package: ${MAIN_PART} is missing`);

    const mainXml = main.asText();
    this.parts = [new DocxPart(this, MAIN_PART, parseXml(mainXml))];
    this.drawingId = maxDocPrId(mainXml);

    const extra = Object.keys(zip.files)
      .filter((name) => HEADER_FOOTER_RE.test(name))
      .sort();
    for (const name of extra) {
      const file = zip.file(name);
      if (!file) continue;
      const xml = file.asText();
      this.parts.push(new DocxPart(this, name, parseXml(xml)));
      this.drawingId = Math.max(this.drawingId, maxDocPrId(xml));
    }
  }

  /** Parse a DOCX buffer. Each call yields an independent instance. */
  static load(buffer: Buffer): DocxDocument {
    return new DocxDocument(new PizZip(buffer));
  }

  nextDrawingId(): number {
    this.drawingId += 1;
    return this.drawingId;
  }

  /** Store image bytes under word/media and link them from `partPath`. */
  addImageRelationship(partPath: string, image: ImageData): string {
    let mediaName: string;
    do {
      this.mediaCounter += 1;
      mediaName = `media/docgen_image${this.mediaCounter}.${image.extension}`;
    } while (this.zip.file(`word/${mediaName}`));

    this.zip.file(`word/${mediaName}`, image.data);
    this.ensureDefaultContentType(image.extension, image.contentType);

    const relsPath = relationshipsPath(partPath);
    const relsFile = this.zip.file(relsPath);
    const rels = parseXml(
      relsFile
        ? relsFile.asText()
        : `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><Relationships xmlns="${NS_REL_PACKAGE}"></Relationships>`,
    );
    const relRoot = childElements(rels, "Relationships")[0];
    if (!relRoot) throw new Error(`Malformed relationships part: ${relsPath}`);

    const taken = new Set(childElements(relRoot, "Relationship").map((r) => getAttr(r, "Id")));
    let n = taken.size + 1;
    while (taken.has(`rId${n}`)) n += 1;
    const id = `rId${n}`;

    relRoot.children.push(element("Relationship", { Id: id, Type: REL_IMAGE, Target: mediaName }));
    relRoot.selfClosing = false;
    this.zip.file(relsPath, serializeXml(rels));
    return id;
  }

  toBuffer(): Buffer {
    for (const part of this.parts) {
      this.zip.file(part.path, part.serialize());
    }
    const buf = this.zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
    return Buffer.from(buf);
  }

  private ensureDefaultContentType(extension: string, contentType: string): void {
    const file = this.zip.file(CONTENT_TYPES);
    if (!file) throw new Error(`Not a DOCX package: ${CONTENT_TYPES} is missing`);
    const tree = parseXml(file.asText());
    const types = childElements(tree, "Types")[0];
    if (!types) throw new Error(`Malformed ${CONTENT_TYPES}`);

    const exists = childElements(types, "Default").some(
      (d) => (getAttr(d, "Extension") ?? "").toLowerCase() === extension,
    );
    if (exists) return;
    types.children.unshift(element("Default", { Extension: extension, ContentType: contentType }));
    types.selfClosing = false;
    this.zip.file(CONTENT_TYPES, serializeXml(tree));
  }
}

function relationshipsPath(partPath: string): string {
  const slash = partPath.lastIndexOf("/");
  return `${partPath.slice(0, slash)}/_rels/${partPath.slice(slash + 1)}.rels`;
}

function maxDocPrId(xml: string): number {
  let max = 0;
  for (const m of xml.matchAll(/<wp:docPr\b[^>]*\bid="(\d+)"/g)) {
    max = Math.max(max, Number(m[1]));
  }
  return max;
}
