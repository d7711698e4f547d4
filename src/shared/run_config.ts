/**
 * Run Configuration Module
 *
 * Batch settings are validated with zod. Tunables can come from CLI flags
 * or the environment (loaded through dotenv in the CLI entry points):
 *
 *   DOCGEN_IMAGE_WIDTH         picture width in inches (default 1.0)
 *   DOCGEN_MAX_WORKERS         worker pool size (default min(4, CPUs))
 *   DOCGEN_RANKED_NEEDS_MODE   both | table | inline (default both)
 *
 * CLI values take priority over environment values.
 */

import os from "os";
import { z } from "zod";

export const RANKED_NEEDS_MODES = ["both", "table", "inline"] as const;

/**
 * Where the ranked multiselect field is rendered:
 * - both:   inline placeholders get the ranked list AND the roster table is filled
 * - table:  only the roster table is filled; inline placeholders get the raw value
 * - inline: only inline placeholders are expanded; the roster table is treated as plain
 */
export type RankedNeedsMode = (typeof RANKED_NEEDS_MODES)[number];

export const MAX_DEFAULT_WORKERS = 4;

export function defaultWorkerCount(): number {
  return Math.max(1, Math.min(MAX_DEFAULT_WORKERS, os.availableParallelism()));
}

export const DesignatedFieldsSchema = z.object({
  /** Comma-separated multiselect expanded into a ranked list. */
  rankedNeeds: z.string().min(1).default("bus_info_needs"),
  /** Free text merged into the "Others, specify" item. */
  rankedNeedsOther: z.string().min(1).default("bus_info_needs_o"),
  /** Holds an image file name; substituted with the picture when found. */
  image: z.string().min(1).default("resp_pix"),
  barangay: z.string().min(1).default("pckg_brgy"),
  lastName: z.string().min(1).default("resp_lname"),
});

export const GenerationConfigSchema = z.object({
  templatePath: z.string().min(1),
  primaryDataPath: z.string().min(1),
  linkedDataPaths: z.array(z.string().min(1)).default([]),
  imageFolder: z.string().min(1).nullable().default(null),
  imageWidthInches: z.number().positive().default(1.0),
  destinationDir: z.string().min(1),
  archiveName: z.string().min(1).default("Generated_Documents.zip"),
  maxWorkers: z.number().int().min(1).optional(),
  rankedNeedsMode: z.enum(RANKED_NEEDS_MODES).default("both"),
  fields: DesignatedFieldsSchema.default({}),
});

export type DesignatedFields = z.infer<typeof DesignatedFieldsSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;

export function parseGenerationConfig(input: GenerationConfigInput): GenerationConfig {
  return GenerationConfigSchema.parse(input);
}

// ── CLI / environment overrides ─────────────────────────────────────

export interface RunOverrides {
  imageWidthInches?: number;
  maxWorkers?: number;
  rankedNeedsMode?: RankedNeedsMode;
}

export interface RawRunOptions {
  imageWidth?: string;
  workers?: string;
  rankedNeedsMode?: string;
}

const WidthSchema = z.coerce.number().positive();
const WorkersSchema = z.coerce.number().int().min(1);
const ModeSchema = z.enum(RANKED_NEEDS_MODES);

/**
 * Resolve tunables from CLI strings and environment variables.
 * Unset values are left undefined so schema defaults apply.
 */
export function resolveRunOptions(
  cli: RawRunOptions,
  env: NodeJS.ProcessEnv = process.env,
): RunOverrides {
  const out: RunOverrides = {};

  const width = pick(cli.imageWidth, env.DOCGEN_IMAGE_WIDTH);
  if (width !== undefined) out.imageWidthInches = parseOption(WidthSchema, width, "image width");

  const workers = pick(cli.workers, env.DOCGEN_MAX_WORKERS);
  if (workers !== undefined) out.maxWorkers = parseOption(WorkersSchema, workers, "worker count");

  const mode = pick(cli.rankedNeedsMode, env.DOCGEN_RANKED_NEEDS_MODE);
  if (mode !== undefined) {
    out.rankedNeedsMode = parseOption(ModeSchema, mode.toLowerCase(), "ranked-needs mode");
  }

  return out;
}

/** First value that is set and not blank, trimmed. */
function pick(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

function parseOption<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, label: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${label}: "${raw}"`);
  }
  return result.data;
}
