/**
 * Batch Orchestrator
 *
 * Pipeline:
 *   1. Load the template and scan its placeholders
 *   2. Load the primary dataset and map placeholders to columns
 *   3. Locate the KEY column and the data rows
 *   4. Index every linked dataset by PARENT_KEY
 *   5. Freeze a RenderContext and render every row on a fixed-size pool
 *   6. Zip the generated documents and remove the temp directory
 *
 * Configuration problems abort with BatchAbortedError before any row is
 * rendered. Row failures are collected and never stop sibling rows.
 */

import { mkdirSync, rmSync } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";

import { loadTemplate } from "../templates/analyzer.js";
import { loadGrid } from "../datasets/loader.js";
import {
  DATA_START_ROW,
  HEADER_ROW_COUNT,
  KEY_MARKER,
  KEY_ROW,
  buildColumnMapping,
  findMarkerColumn,
} from "../datasets/column_mapper.js";
import { LinkedIndex } from "../datasets/linked_index.js";
import { createRenderContext } from "../render/context.js";
import { renderRow } from "../render/row_renderer.js";
import { writeZipBundle } from "../exports/bundle.js";
import { BatchAbortedError, errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/log.js";
import {
  defaultWorkerCount,
  parseGenerationConfig,
  type GenerationConfigInput,
} from "../shared/run_config.js";
import type { BatchResult, GeneratedDocument, RenderJob, RowFailure } from "../shared/types.js";
import { runPool } from "./pool.js";
import { PACKAGING_PROGRESS, ProgressReporter, RENDER_PROGRESS_SHARE } from "./progress.js";

export interface BatchOptions {
  logger?: Logger;
  progress?: ProgressReporter;
}

export async function generateBatch(
  input: GenerationConfigInput,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const config = parseGenerationConfig(input);
  const logger = options.logger ?? silentLogger;
  const progress = options.progress ?? new ProgressReporter();

  progress.report(0, "Initializing conversion...");

  // ── 1–3. Template, mapping, KEY column ──
  const template = loadTemplate(config.templatePath);
  if (template.placeholders.size === 0) {
    throw new BatchAbortedError("warning", "No placeholders found in template");
  }
  logger.info("TEMPLATE", `${template.placeholders.size} placeholder(s) found in ${path.basename(config.templatePath)}`);

  const grid = loadGrid(config.primaryDataPath);
  const mapping = buildColumnMapping(template.placeholders, grid, logger);
  if (mapping.size === 0) {
    throw new BatchAbortedError(
      "error",
      `No matching columns found between template and dataset headers in rows 1-${HEADER_ROW_COUNT}`,
    );
  }
  logger.info("MAP", `${mapping.size} of ${template.placeholders.size} placeholder(s) mapped`);

  const keyColumn = findMarkerColumn(grid, KEY_MARKER);
  if (keyColumn === null) {
    throw new BatchAbortedError("error", `${KEY_MARKER} column not found in row ${KEY_ROW + 1} of the main dataset`);
  }

  const dataRows = grid.slice(DATA_START_ROW);
  if (dataRows.length === 0) {
    throw new BatchAbortedError("warning", `No data found starting from row ${DATA_START_ROW + 1}`);
  }

  // ── 4–5. Linked index and frozen context ──
  const linkedIndex = LinkedIndex.fromFiles(config.linkedDataPaths, logger);
  const ctx = createRenderContext({
    templateBytes: template.bytes,
    placeholders: template.placeholders,
    mapping,
    keyColumn,
    linkedIndex,
    imageFolder: config.imageFolder,
    imageWidthInches: config.imageWidthInches,
    rankedNeedsMode: config.rankedNeedsMode,
    fields: config.fields,
  });

  mkdirSync(config.destinationDir, { recursive: true });
  const tempDir = path.join(config.destinationDir, `temp_documents_${uuidv4().slice(0, 8)}`);
  mkdirSync(tempDir);

  try {
    const jobs: RenderJob[] = dataRows.map((row, i) => ({
      index: i + 1,
      rowNumber: DATA_START_ROW + i + 1,
      row,
      outputDir: tempDir,
    }));

    const poolSize = config.maxWorkers ?? defaultWorkerCount();
    logger.info("RENDER", `Rendering ${jobs.length} row(s) with ${poolSize} worker(s)`);

    const outcomes = await runPool(jobs, poolSize, (job) => renderRow(job, ctx), (completed, total) => {
      progress.report((completed / total) * RENDER_PROGRESS_SHARE, `Processing document ${completed} of ${total}`);
    });

    const generated: GeneratedDocument[] = [];
    const failures: RowFailure[] = [];
    outcomes.forEach((result, i) => {
      const job = jobs[i];
      if (!result.ok) {
        failures.push({ index: job.index, rowNumber: job.rowNumber, message: errorMessage(result.error) });
      } else if (result.value.ok) {
        generated.push(result.value.document);
      } else {
        failures.push(result.value.failure);
      }
    });
    for (const failure of failures) {
      logger.error("RENDER", `Row ${failure.rowNumber} (document ${failure.index}) failed: ${failure.message}`);
    }

    // ── 6. Package ──
    progress.report(PACKAGING_PROGRESS, "Creating ZIP file...");
    const archivePath = path.join(config.destinationDir, config.archiveName);
    await writeZipBundle(
      archivePath,
      generated.map((doc) => ({ name: doc.fileName, path: doc.path })),
    );
    logger.info("PACKAGE", `${generated.length} document(s) written to ${archivePath}`);

    progress.report(100, `Successfully generated ${generated.length} documents!`);
    return { archivePath, generated, failures, totalRows: jobs.length };
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
}
