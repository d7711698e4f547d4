/**
 * Placeholder substitution on paragraphs.
 */

import path from "path";

import type { Paragraph } from "../docx/elements.js";
import { appendPicture, resolveImagePath } from "../docx/images.js";
import { PLACEHOLDER_RE } from "../templates/analyzer.js";
import type { ReplacementData } from "../shared/types.js";

const LEFTOVER_RE = /\{[^}]+\}/g;

/** Replace every `{k}` whose key is in `data`; unknown tokens stay. */
export function substituteText(text: string, data: ReplacementData): string {
  return text.replace(PLACEHOLDER_RE, (token, name: string) =>
    Object.hasOwn(data, name) ? data[name] : token,
  );
}

export function clearPlaceholders(text: string): string {
  return text.replace(LEFTOVER_RE, "");
}

export interface ImageField {
  /** Placeholder name holding the image file name, e.g. "resp_pix". */
  field: string;
  folder: string;
  widthInches: number;
}

/**
 * Substitute one paragraph. When `image` is set and the paragraph holds its
 * token, a matching file in the image folder is embedded in place of the
 * token; otherwise the token is substituted as text.
 */
export async function substituteParagraph(
  paragraph: Paragraph,
  data: ReplacementData,
  image?: ImageField,
): Promise<void> {
  const text = paragraph.text;
  if (!text.includes("{")) return;

  if (image) {
    const token = `{${image.field}}`;
    const fileName = (data[image.field] ?? "").trim();
    if (text.includes(token) && fileName && fileName.toLowerCase() !== "nan") {
      const imagePath = resolveImagePath(image.folder, fileName);
      if (imagePath) {
        await replaceTokenWithImage(paragraph, text, token, imagePath, image.widthInches, data);
        return;
      }
    }
  }

  paragraph.replaceText((t) => substituteText(t, data));
}

/** Rebuild the paragraph as: text before the token, picture, text after. */
async function replaceTokenWithImage(
  paragraph: Paragraph,
  text: string,
  token: string,
  imagePath: string,
  widthInches: number,
  data: ReplacementData,
): Promise<void> {
  const at = text.indexOf(token);
  const before = substituteText(text.slice(0, at), data);
  const after = substituteText(text.slice(at + token.length), data);
  const rPr = paragraph.firstRunProperties();

  paragraph.clear();
  if (before) paragraph.addRun(before, rPr);
  try {
    await appendPicture(paragraph, imagePath, widthInches);
  } catch {
    paragraph.addRun(`[Image not found: ${path.basename(imagePath)}]`, rPr);
  }
  if (after) paragraph.addRun(after, rPr);
}

/** Remove every remaining `{...}` token from the paragraph. */
export function sweepParagraph(paragraph: Paragraph): void {
  if (!paragraph.text.includes("{")) return;
  paragraph.replaceText(clearPlaceholders);
}
