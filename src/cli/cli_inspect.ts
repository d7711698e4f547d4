#!/usr/bin/env node
/**
 * CLI: docgen:inspect
 *
 * Usage: npm run docgen:inspect -- --template <t.docx> [--data <main.xlsx>]
 *
 * Lists the template's placeholders. With a dataset, also shows which
 * column each placeholder maps to and where the KEY column is.
 */

import "dotenv/config";

import { loadTemplate } from "../templates/analyzer.js";
import { loadGrid } from "../datasets/loader.js";
import {
  DATA_START_ROW,
  KEY_MARKER,
  buildColumnMapping,
  columnLetter,
  findMarkerColumn,
} from "../datasets/column_mapper.js";
import { errorMessage } from "../shared/errors.js";
import { createConsoleLogger } from "../shared/log.js";

function main() {
  const args = process.argv.slice(2);
  let templatePath = "";
  let dataPath = "";

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--template" && i + 1 < args.length) {
      templatePath = args[i + 1];
      i++;
    }
    if (args[i] === "--data" && i + 1 < args.length) {
      dataPath = args[i + 1];
      i++;
    }
  }

  if (!templatePath) {
    console.error("Usage: npm run docgen:inspect -- --template <t.docx> [--data <main.xlsx>]");
    process.exit(1);
  }

  const logger = createConsoleLogger();

  try {
    const template = loadTemplate(templatePath);
    const names = [...template.placeholders].sort();
    logger.info("TEMPLATE", `${names.length} placeholder(s) in ${templatePath}`);
    for (const name of names) console.log(`    {${name}}`);

    if (!dataPath) return;

    const grid = loadGrid(dataPath);
    const mapping = buildColumnMapping(template.placeholders, grid, logger);
    logger.info("MAP", `${mapping.size} of ${names.length} placeholder(s) mapped`);
    for (const [name, column] of mapping) {
      console.log(`    {${name}} → column ${columnLetter(column)}`);
    }

    const keyColumn = findMarkerColumn(grid, KEY_MARKER);
    logger.info(
      "KEY",
      keyColumn === null ? `${KEY_MARKER} column not found` : `${KEY_MARKER} column: ${columnLetter(keyColumn)}`,
    );
    logger.info("DATA", `${Math.max(0, grid.length - DATA_START_ROW)} data row(s)`);
  } catch (err) {
    console.error(`\n  ✗ ${errorMessage(err)}`);
    process.exit(1);
  }
}

main();
