/** Shared types for the document batch generator */

/** A tabular dataset: rows of cell text, blanks as "". Rows may be ragged. */
export type Grid = string[][];

/** Distinct `{name}` tokens found in a template. */
export type PlaceholderSet = ReadonlySet<string>;

/** Placeholder name → zero-based column index in the primary dataset. */
export type ColumnMapping = ReadonlyMap<string, number>;

/** One linked-dataset row: row-3 header label (trimmed) → cell text. */
export type LinkedRecord = Readonly<Record<string, string>>;

/** Values substituted for `{key}` tokens while rendering one row. */
export type ReplacementData = Record<string, string>;

/** The unit of parallel work: one primary data row. */
export interface RenderJob {
  /** 1-based position within the batch; used in the output file name. */
  index: number;
  /** 1-based spreadsheet row number, for messages. */
  rowNumber: number;
  row: readonly string[];
  outputDir: string;
}

export interface GeneratedDocument {
  index: number;
  fileName: string;
  path: string;
}

export interface RowFailure {
  index: number;
  rowNumber: number;
  message: string;
}

export type RenderOutcome =
  | { ok: true; document: GeneratedDocument }
  | { ok: false; failure: RowFailure };

export interface BatchResult {
  archivePath: string;
  /** Successfully rendered documents, in batch order. Files no longer exist on disk. */
  generated: GeneratedDocument[];
  failures: RowFailure[];
  totalRows: number;
}

export interface ProgressEvent {
  /** 0–100 */
  percent: number;
  message: string;
}
