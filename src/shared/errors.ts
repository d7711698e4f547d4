/** The template file is missing or is not a readable DOCX package. */
export class TemplateLoadError extends Error {
  constructor(
    readonly templatePath: string,
    reason: string,
  ) {
    super(`Cannot open template ${templatePath}: ${reason}`);
    this.name = "TemplateLoadError";
  }
}

/** A dataset file is missing, unreadable, or of an unsupported type. */
export class DatasetLoadError extends Error {
  constructor(
    readonly datasetPath: string,
    reason: string,
  ) {
    super(`Cannot read dataset ${datasetPath}: ${reason}`);
    this.name = "DatasetLoadError";
  }
}

/**
 * A configuration problem found before any row is rendered. `level`
 * separates "nothing to do" (warning) from "cannot proceed" (error).
 */
export class BatchAbortedError extends Error {
  constructor(
    readonly level: "warning" | "error",
    message: string,
  ) {
    super(message);
    this.name = "BatchAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
