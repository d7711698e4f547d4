/**
 * Render Context
 *
 * Everything a render job reads, assembled once before fan-out and frozen.
 * Jobs never write to it; each job parses its own document from
 * `templateBytes`.
 */

import type { LinkedIndex } from "../datasets/linked_index.js";
import type { DesignatedFields, RankedNeedsMode } from "../shared/run_config.js";
import type { ColumnMapping, PlaceholderSet } from "../shared/types.js";

export interface RenderContext {
  readonly templateBytes: Buffer;
  readonly placeholders: PlaceholderSet;
  readonly mapping: ColumnMapping;
  readonly keyColumn: number;
  readonly linkedIndex: LinkedIndex;
  readonly imageFolder: string | null;
  readonly imageWidthInches: number;
  readonly rankedNeedsMode: RankedNeedsMode;
  readonly fields: Readonly<DesignatedFields>;
}

export function createRenderContext(input: RenderContext): RenderContext {
  return Object.freeze({
    ...input,
    fields: Object.freeze({ ...input.fields }),
  });
}
