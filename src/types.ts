/**
 * Report Data Model
 *
 * The joined, per-workspace record and the outcome types that flow from
 * the enricher to the assembler.
 */

import type { DirectoryComputerInfo, DirectoryUserInfo } from "./directory/types.js";
import type { QueryFailedError } from "./errors.js";
import type { ActivityVerdict } from "./metrics/types.js";
import type { SubnetInfo } from "./network/types.js";
import type { ConnectionStatus, WorkspaceRecord } from "./workspaces/types.js";

// =============================================================================
// Resolution
// =============================================================================

/**
 * Outcome of looking something up by key. "not-found" is a normal result,
 * kept distinct from a found entry whose fields happen to be empty.
 */
export type Resolution<T> =
  | { status: "found"; value: T }
  | { status: "not-found"; key: string };

export function found<T>(value: T): Resolution<T> {
  return { status: "found", value };
}

export function notFound<T>(key: string): Resolution<T> {
  return { status: "not-found", key };
}

export function resolvedValue<T>(resolution: Resolution<T> | undefined): T | undefined {
  return resolution?.status === "found" ? resolution.value : undefined;
}

// =============================================================================
// Report Rows
// =============================================================================

export type FailurePolicy = "isolate" | "abort";

/**
 * Full join for one workspace. Fields left undefined were not resolved,
 * either because a best-effort lookup failed or because enrichment of the
 * workspace failed (see enrichmentError).
 */
export type ReportRow = Readonly<{
  workspace: WorkspaceRecord;
  region: string;
  user?: Resolution<DirectoryUserInfo>;
  computer?: Resolution<DirectoryComputerInfo>;
  connection?: ConnectionStatus;
  subnet?: SubnetInfo;
  activity?: ActivityVerdict;
  directoryName?: string;
  bundleName?: string;
  tags?: Readonly<Record<string, string>>;
  /** Set when the row stands in for a workspace whose enrichment failed */
  enrichmentError?: string;
}>;

export type EnrichmentOutcome =
  | { status: "ok"; row: ReportRow }
  | { status: "failed"; workspace: WorkspaceRecord; region: string; error: QueryFailedError };

export type EnrichmentProgress = {
  workspaceId: string;
  userName: string;
  completed: number;
  remaining: number;
  total: number;
  failed: boolean;
};
