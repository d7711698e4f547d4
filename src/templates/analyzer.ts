/**
 * Template Analyzer: open a DOCX template and scan it for `{name}`
 * placeholders.
 *
 * Every paragraph is scanned on its merged run text, so Word splitting
 * `{resp_` and `lname}` into separate runs does not hide a token. Headers,
 * footers and tables nested to any depth are included.
 */

import { readFileSync } from "fs";

import { DocxDocument } from "../docx/document.js";
import { documentParagraphs } from "../docx/walk.js";
import { TemplateLoadError, errorMessage } from "../shared/errors.js";
import type { PlaceholderSet } from "../shared/types.js";

/** `{name}` with no nested braces; `name` may hold spaces and punctuation. */
export const PLACEHOLDER_RE = /\{([^}]+)\}/g;

export interface LoadedTemplate {
  path: string;
  /** Raw bytes; each render job parses its own instance from these. */
  bytes: Buffer;
  placeholders: PlaceholderSet;
}

export function extractPlaceholders(text: string): string[] {
  const names: string[] = [];
  for (const m of text.matchAll(PLACEHOLDER_RE)) {
    names.push(m[1]);
  }
  return names;
}

export function scanTemplatePlaceholders(doc: DocxDocument): PlaceholderSet {
  const found = new Set<string>();
  for (const paragraph of documentParagraphs(doc)) {
    const text = paragraph.text;
    if (!text.includes("{")) continue;
    for (const name of extractPlaceholders(text)) found.add(name);
  }
  return found;
}

/** Sorted placeholder names of a DOCX buffer. */
export function scanDocxPlaceholders(docxBuffer: Buffer): string[] {
  return [...scanTemplatePlaceholders(DocxDocument.load(docxBuffer))].sort();
}

/**
 * Read and parse a template once per batch.
 * Throws TemplateLoadError when the file is missing or is not a DOCX.
 */
export function loadTemplate(templatePath: string): LoadedTemplate {
  let bytes: Buffer;
  try {
    bytes = readFileSync(templatePath);
  } catch (err) {
    throw new TemplateLoadError(templatePath, errorMessage(err));
  }

  let doc: DocxDocument;
  try {
    doc = DocxDocument.load(bytes);
  } catch (err) {
    throw new TemplateLoadError(templatePath, errorMessage(err));
  }

  return { path: templatePath, bytes, placeholders: scanTemplatePlaceholders(doc) };
}
