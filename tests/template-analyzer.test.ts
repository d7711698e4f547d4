/**
 * Template Analyzer Tests
 *
 * Verifies:
 * - Tokens in triply nested tables, headers and footers are found
 * - Tokens split across runs are found whole
 * - Names may hold spaces and punctuation
 * - Missing or non-DOCX templates raise TemplateLoadError
 */

import { describe, it, expect, afterEach } from "vitest";
import { rmSync, writeFileSync } from "fs";
import path from "path";

import { extractPlaceholders, loadTemplate, scanDocxPlaceholders } from "../src/templates/analyzer.js";
import { TemplateLoadError } from "../src/shared/errors.js";
import { buildDocx, makeTempDir, para, splitPara, table, writeDocx } from "./helpers/fixtures.js";

let tmp: string | undefined;

afterEach(() => {
  if (tmp) rmSync(tmp, { recursive: true, force: true });
  tmp = undefined;
});

describe("extractPlaceholders", () => {
  it("captures every brace-delimited name without nesting", () => {
    expect(extractPlaceholders("{a} and {b c} and {d-e.f} {}")).toEqual(["a", "b c", "d-e.f"]);
  });
});

describe("scanDocxPlaceholders", () => {
  it("finds tokens inside triply nested tables", async () => {
    const level3 = table([["{deep}"]]);
    const level2 = table([[level3, "{second}"]]);
    const level1 = table([[level2], ["{first}"]]);
    const docx = await buildDocx([para("Top {top}"), level1]);

    expect(scanDocxPlaceholders(docx)).toEqual(["deep", "first", "second", "top"]);
  });

  it("includes headers and footers", async () => {
    const docx = await buildDocx([para("{body}")], { header: "Page {head}", footer: "{foot}" });
    expect(scanDocxPlaceholders(docx)).toEqual(["body", "foot", "head"]);
  });

  it("finds tokens split across runs and deduplicates", async () => {
    const docx = await buildDocx([splitPara("Name: {resp_", "lname}"), para("{resp_lname} {first name}")]);
    expect(scanDocxPlaceholders(docx)).toEqual(["first name", "resp_lname"]);
  });
});

describe("loadTemplate", () => {
  it("returns bytes and the placeholder set", async () => {
    tmp = makeTempDir();
    const file = await writeDocx(path.join(tmp, "t.docx"), [para("{name} is {age}")]);

    const template = loadTemplate(file);

    expect([...template.placeholders].sort()).toEqual(["age", "name"]);
    expect(template.bytes.length).toBeGreaterThan(0);
  });

  it("raises TemplateLoadError for a missing file", () => {
    expect(() => loadTemplate("/nonexistent/template.docx")).toThrow(TemplateLoadError);
  });

  it("raises TemplateLoadError for a file that is not a DOCX", () => {
    tmp = makeTempDir();
    const file = path.join(tmp, "fake.docx");
    writeFileSync(file, "plain text");
    expect(() => loadTemplate(file)).toThrow(TemplateLoadError);
  });
});
