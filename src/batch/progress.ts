/**
 * Progress events for a batch. Workers report through one reporter; a CLI
 * or test subscribes to receive events in order.
 */

import type { ProgressEvent } from "../shared/types.js";

export type ProgressListener = (event: ProgressEvent) => void;

export class ProgressReporter {
  private readonly listeners = new Set<ProgressListener>();

  /** Returns a function that removes the listener. */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  report(percent: number, message: string): void {
    const event: ProgressEvent = { percent: Math.max(0, Math.min(100, percent)), message };
    for (const listener of this.listeners) listener(event);
  }
}

export const RENDER_PROGRESS_SHARE = 80;
export const PACKAGING_PROGRESS = 85;
