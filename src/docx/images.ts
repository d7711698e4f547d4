/**
 * Image lookup in the configured folder and inline-picture embedding.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import path from "path";
import { imageSize } from "image-size";

import { EMU_PER_INCH, type Paragraph } from "./elements.js";
import type { ImageData } from "./document.js";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".bmp", ".tiff", ".webp"] as const;

// Keyed by the type name image-size reports.
const FORMATS: Record<string, { extension: string; contentType: string }> = {
  png: { extension: "png", contentType: "image/png" },
  jpg: { extension: "jpeg", contentType: "image/jpeg" },
  gif: { extension: "gif", contentType: "image/gif" },
  bmp: { extension: "bmp", contentType: "image/bmp" },
  tiff: { extension: "tiff", contentType: "image/tiff" },
  webp: { extension: "webp", contentType: "image/webp" },
};

/**
 * Candidate file names for an image reference: the name as given, then
 * its base name with each known extension.
 */
export function imageCandidates(imageName: string): string[] {
  const ext = path.extname(imageName);
  const base = ext ? imageName.slice(0, -ext.length) : imageName;
  return [imageName, ...IMAGE_EXTENSIONS.map((e) => base + e)];
}

/** First candidate that exists in `folder`, or null. */
export function resolveImagePath(folder: string, imageName: string): string | null {
  for (const candidate of imageCandidates(imageName)) {
    const full = path.join(folder, candidate);
    if (existsSync(full)) return full;
  }
  return null;
}

/**
 * Append `imagePath` to the paragraph as an inline picture `widthInches`
 * wide, keeping the aspect ratio. Throws when the file cannot be decoded.
 */
export async function appendPicture(
  paragraph: Paragraph,
  imagePath: string,
  widthInches: number,
): Promise<void> {
  const data = await readFile(imagePath);
  // imageSize throws on data it does not recognise
  const meta = imageSize(data);
  const format = meta.type ? FORMATS[meta.type] : undefined;
  if (!format || !meta.width || !meta.height) {
    throw new Error(`Unsupported image: ${path.basename(imagePath)}`);
  }

  const image: ImageData = { data, ...format };
  const widthEmu = Math.round(widthInches * EMU_PER_INCH);
  const heightEmu = Math.round((widthEmu * meta.height) / meta.width);
  const picture = paragraph.part.embedImage(image, path.basename(imagePath), widthEmu, heightEmu);
  paragraph.addPicture(picture);
}
