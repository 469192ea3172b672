/**
 * Report Assembler
 *
 * Turns enrichment outcomes into the final, sorted list of report rows.
 */

import type { EnrichmentOutcome, ReportRow } from "../types.js";

export type AssembleOptions = {
  /** Emit failed workspaces as rows carrying only their inventory fields and the error */
  includeFailed?: boolean;
};

export type AssembledReport = {
  rows: ReportRow[];
  failed: number;
  unused: number;
};

/**
 * Code-unit comparison, independent of locale
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareRows(a: ReportRow, b: ReportRow): number {
  return (
    compareOrdinal(a.workspace.userName, b.workspace.userName) ||
    compareOrdinal(a.directoryName ?? "", b.directoryName ?? "")
  );
}

export function assembleReport(
  outcomes: readonly EnrichmentOutcome[],
  options: AssembleOptions = {},
): AssembledReport {
  const includeFailed = options.includeFailed ?? true;
  const rows: ReportRow[] = [];
  let failed = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      rows.push(outcome.row);
      continue;
    }
    failed += 1;
    if (includeFailed) {
      rows.push({
        workspace: outcome.workspace,
        region: outcome.region,
        enrichmentError: outcome.error.message,
      });
    }
  }

  // Array.prototype.sort is stable, ties keep inventory order
  rows.sort(compareRows);

  return {
    rows,
    failed,
    unused: rows.filter((row) => row.activity?.unused === true).length,
  };
}
