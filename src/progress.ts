/**
 * Report Progress Utilities
 *
 * Single-line progress on stderr while the inventory is listed and
 * enriched. Disabled when stderr is not a terminal, so redirected output
 * stays clean.
 */

import type { EnrichmentProgress } from "./types.js";

/**
 * Progress reporter interface
 */
export type ProgressReporter = {
  setLabel: (label: string) => void;
  setPercent: (percent: number) => void;
  done: () => void;
};

/**
 * Anything progress can be drawn on; process.stderr by default
 */
export type ProgressStream = {
  write: (chunk: string) => unknown;
  isTTY?: boolean;
};

export type ReportProgressOptions = {
  label: string;
  enabled?: boolean;
  indeterminate?: boolean;
  stream?: ProgressStream;
};

/**
 * No-op progress reporter for when progress is disabled
 */
const noopReporter: ProgressReporter = {
  setLabel: () => {},
  setPercent: () => {},
  done: () => {},
};

export function createReportProgress(options: ReportProgressOptions): ProgressReporter {
  const stream = options.stream ?? process.stderr;
  if (options.enabled === false || !stream.isTTY) return noopReporter;

  let label = options.label;
  let percent = 0;
  let done = false;
  let width = 0;

  const render = () => {
    if (done) return;
    const suffix = options.indeterminate ? "..." : ` ${Math.round(percent)}%`;
    const line = `${label}${suffix}`;
    // Pad over whatever a longer previous line left behind
    stream.write(`\r${line.padEnd(width)}  `);
    width = Math.max(width, line.length);
  };

  render();

  return {
    setLabel: (newLabel: string) => {
      label = newLabel;
      render();
    },
    setPercent: (newPercent: number) => {
      percent = Math.max(0, Math.min(100, newPercent));
      render();
    },
    done: () => {
      if (done) return;
      done = true;
      stream.write("\r" + " ".repeat(width + 2) + "\r");
    },
  };
}

/**
 * Execute an operation with progress reporting
 */
export async function withReportProgress<T>(
  label: string,
  fn: (progress: ProgressReporter) => Promise<T>,
  options?: Omit<ReportProgressOptions, "label">,
): Promise<T> {
  const progress = createReportProgress({ label, indeterminate: true, ...options });
  try {
    return await fn(progress);
  } finally {
    progress.done();
  }
}

export function formatEnrichmentLabel(event: EnrichmentProgress): string {
  const user = event.userName ? ` (${event.userName})` : "";
  return `Enriching ${event.workspaceId}${user}, ${event.remaining} remaining`;
}

/**
 * Progress for the enrichment phase, fed by the enricher's progress events
 */
export function createEnrichmentProgress(
  total: number,
  options?: Omit<ReportProgressOptions, "label" | "indeterminate">,
): { update: (event: EnrichmentProgress) => void; done: () => void } {
  const progress = createReportProgress({
    ...options,
    label: `Enriching ${total} workspaces`,
    indeterminate: false,
  });

  return {
    update: (event) => {
      progress.setLabel(formatEnrichmentLabel(event));
      progress.setPercent(event.total > 0 ? (event.completed / event.total) * 100 : 100);
    },
    done: progress.done,
  };
}
