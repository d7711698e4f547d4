import archiver from "archiver";
import { createWriteStream } from "fs";

export interface BundleEntry {
  /** Name inside the archive. */
  name: string;
  /** File on disk to add. */
  path: string;
}

/**
 * Write a DEFLATE-compressed zip of `entries` to `zipPath`.
 * Resolves once the archive is fully flushed to disk.
 */
export async function writeZipBundle(zipPath: string, entries: readonly BundleEntry[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(zipPath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve());
    output.on("error", (err) => reject(err));
    archive.on("error", (err) => reject(err));
    archive.pipe(output);

    for (const entry of entries) {
      archive.file(entry.path, { name: entry.name });
    }

    archive.finalize().catch(reject);
  });
}
