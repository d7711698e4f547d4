#!/usr/bin/env node
/**
 * CLI: docgen:generate
 *
 * Usage: npm run docgen:generate -- --template <t.docx> --data <main.xlsx>
 *          [--linked <a.xlsx> [<b.xlsx> ...]] [--images <dir>] [--out <dir>]
 *          [--width <inches>] [--workers <n>] [--ranked-needs <both|table|inline>]
 *
 * Renders one document per data row and writes Generated_Documents.zip
 * into the output directory (default: ./out).
 */

import "dotenv/config";
import path from "path";

import { generateBatch } from "../batch/orchestrator.js";
import { ProgressReporter } from "../batch/progress.js";
import { BatchAbortedError, errorMessage } from "../shared/errors.js";
import { createConsoleLogger } from "../shared/log.js";
import { resolveRunOptions } from "../shared/run_config.js";

const USAGE =
  "Usage: npm run docgen:generate -- --template <t.docx> --data <main.xlsx> [--linked <a.xlsx> ...] " +
  "[--images <dir>] [--out <dir>] [--width <inches>] [--workers <n>] [--ranked-needs <both|table|inline>]";

async function main() {
  const args = process.argv.slice(2);
  let templatePath = "";
  let dataPath = "";
  const linkedPaths: string[] = [];
  let imageFolder = "";
  let outDir = "out";
  let width: string | undefined;
  let workers: string | undefined;
  let rankedNeedsMode: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === "--template" && next !== undefined) {
      templatePath = next;
      i++;
    } else if (args[i] === "--data" && next !== undefined) {
      dataPath = next;
      i++;
    } else if (args[i] === "--linked") {
      while (args[i + 1] !== undefined && !args[i + 1].startsWith("--")) {
        linkedPaths.push(args[i + 1]);
        i++;
      }
    } else if (args[i] === "--images" && next !== undefined) {
      imageFolder = next;
      i++;
    } else if (args[i] === "--out" && next !== undefined) {
      outDir = next;
      i++;
    } else if (args[i] === "--width" && next !== undefined) {
      width = next;
      i++;
    } else if (args[i] === "--workers" && next !== undefined) {
      workers = next;
      i++;
    } else if (args[i] === "--ranked-needs" && next !== undefined) {
      rankedNeedsMode = next;
      i++;
    }
  }

  if (!templatePath || !dataPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const startTime = Date.now();
  const logger = createConsoleLogger(startTime);

  const progress = new ProgressReporter();
  let lastPercent = -1;
  progress.subscribe(({ percent, message }) => {
    const rounded = Math.floor(percent);
    if (rounded === lastPercent) return;
    lastPercent = rounded;
    logger.info("PROGRESS", `${String(rounded).padStart(3)}% ${message}`);
  });

  try {
    const overrides = resolveRunOptions({ imageWidth: width, workers, rankedNeedsMode });
    logger.info("CONFIG", `Template: ${templatePath}`);
    logger.info("CONFIG", `Data: ${dataPath}`);
    for (const linked of linkedPaths) logger.info("CONFIG", `Linked: ${linked}`);
    if (imageFolder) logger.info("CONFIG", `Images: ${imageFolder}`);

    const result = await generateBatch(
      {
        templatePath,
        primaryDataPath: dataPath,
        linkedDataPaths: linkedPaths,
        imageFolder: imageFolder || null,
        destinationDir: path.resolve(outDir),
        ...overrides,
      },
      { logger, progress },
    );

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log();
    console.log(`  ✓ Generated ${result.generated.length} of ${result.totalRows} documents in ${totalTime}s`);
    console.log(`    ${result.archivePath}`);
    if (result.failures.length > 0) {
      console.log(`  ✗ ${result.failures.length} row(s) failed:`);
      for (const f of result.failures) {
        console.log(`    row ${f.rowNumber}: ${f.message}`);
      }
    }
  } catch (err) {
    const label = err instanceof BatchAbortedError && err.level === "warning" ? "Warning" : "Error";
    console.error(`\n  ✗ ${label}: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
