/**
 * Workspace Enricher
 *
 * Joins each inventoried workspace with its directory owner and computer,
 * connection status, subnet placement, activity verdict and display names.
 *
 * - Lookups for one workspace run concurrently; only the manager name
 *   waits on the user entry (inside DirectoryLookup).
 * - Workspaces are processed in batches of `concurrency`, each result
 *   stored at its inventory position.
 * - QueryFailedError is either isolated to its workspace or aborts the
 *   enumeration, depending on the failure policy.
 */

import { isQueryFailedError, type QueryFailedError } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import { notFound } from "../types.js";
import type { DirectoryLookup, DirectoryUserInfo } from "../directory/types.js";
import type { ActivityClassifier, ActivityWindow } from "../metrics/types.js";
import type { SubnetLookup } from "../network/types.js";
import type { WorkspaceDetailsLookup, WorkspaceRecord } from "../workspaces/types.js";
import type {
  EnrichmentOutcome,
  EnrichmentProgress,
  FailurePolicy,
  ReportRow,
} from "../types.js";
import { ReportBuffer } from "./buffer.js";

export const DEFAULT_CONCURRENCY = 4;

export type EnricherDependencies = {
  directory: DirectoryLookup;
  details: WorkspaceDetailsLookup;
  subnets: SubnetLookup;
  activity: ActivityClassifier;
};

export type EnricherOptions = {
  region: string;
  window: ActivityWindow;
  failurePolicy?: FailurePolicy;
  concurrency?: number;
  onProgress?: (progress: EnrichmentProgress) => void;
  logger?: ReportLogger;
};

export type EnrichmentAbort = {
  index: number;
  workspace: WorkspaceRecord;
  error: QueryFailedError;
};

export type EnrichmentResult = {
  /** Inventory-ordered outcomes; a strict prefix when aborted */
  outcomes: EnrichmentOutcome[];
  aborted?: EnrichmentAbort;
};

export function createEnricher(deps: EnricherDependencies, options: EnricherOptions): Enricher {
  return new Enricher(deps, options);
}

export class Enricher {
  private deps: EnricherDependencies;
  private options: EnricherOptions;
  private logger: ReportLogger;

  constructor(deps: EnricherDependencies, options: EnricherOptions) {
    this.deps = deps;
    this.options = options;
    this.logger = options.logger ?? createSilentLogger();
  }

  get failurePolicy(): FailurePolicy {
    return this.options.failurePolicy ?? "isolate";
  }

  /**
   * Fetch everything known about one workspace and join it into a row
   */
  async enrichWorkspace(workspace: WorkspaceRecord): Promise<ReportRow> {
    const { directory, details, subnets, activity } = this.deps;
    const { workspaceId, userName, computerName, subnetId, directoryId, bundleId } = workspace;

    const [user, computer, connection, subnet, verdict, directoryName, bundleName, tags] = await Promise.all([
      userName ? directory.resolveUser(userName) : notFound<DirectoryUserInfo>(userName),
      computerName ? directory.resolveComputer(computerName) : undefined,
      details.getConnectionStatus(workspaceId),
      subnetId ? subnets.resolveSubnet(subnetId) : undefined,
      activity.classify(workspaceId, this.options.window),
      directoryId ? details.getDirectoryName(directoryId) : undefined,
      bundleId ? details.getBundleName(bundleId) : undefined,
      details.getTags(workspaceId),
    ]);

    return {
      workspace,
      region: this.options.region,
      user,
      computer,
      connection,
      subnet,
      activity: verdict,
      directoryName,
      bundleName,
      tags,
    };
  }

  /**
   * Enrich the whole inventory in inventory order
   */
  async enrichAll(workspaces: readonly WorkspaceRecord[]): Promise<EnrichmentResult> {
    const total = workspaces.length;
    const batchSize = Math.max(1, Math.floor(this.options.concurrency ?? DEFAULT_CONCURRENCY));
    const buffer = new ReportBuffer(total);
    let completed = 0;

    for (let start = 0; start < total; start += batchSize) {
      const batch = workspaces.slice(start, start + batchSize);

      await Promise.all(
        batch.map(async (workspace, offset) => {
          const outcome = await this.enrichOutcome(workspace);
          buffer.set(start + offset, outcome);
          completed += 1;
          this.options.onProgress?.({
            workspaceId: workspace.workspaceId,
            userName: workspace.userName,
            completed,
            remaining: total - completed,
            total,
            failed: outcome.status === "failed",
          });
        }),
      );

      if (this.failurePolicy === "abort") {
        const failedAt = buffer.firstFailure();
        if (failedAt !== undefined) {
          const failed = buffer.at(failedAt);
          if (failed?.status === "failed") {
            this.logger.error(`Aborting enumeration at ${failed.workspace.workspaceId}`, {
              error: failed.error.message,
              processed: failedAt,
              skipped: total - failedAt - 1,
            });
            return {
              outcomes: buffer.collect(failedAt),
              aborted: { index: failedAt, workspace: failed.workspace, error: failed.error },
            };
          }
        }
      }
    }

    return { outcomes: buffer.collect() };
  }

  private async enrichOutcome(workspace: WorkspaceRecord): Promise<EnrichmentOutcome> {
    const log = this.logger.withContext({ workspaceId: workspace.workspaceId });
    try {
      const row = await this.enrichWorkspace(workspace);
      log.debug("Enriched workspace", { user: workspace.userName, unused: row.activity?.unused });
      return { status: "ok", row };
    } catch (error) {
      if (!isQueryFailedError(error)) throw error;
      if (this.failurePolicy === "isolate") {
        log.warn("Enrichment failed", { source: error.source, subject: error.subject, error: error.message });
      }
      return { status: "failed", workspace, region: this.options.region, error };
    }
  }
}
