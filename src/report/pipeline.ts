/**
 * Report Pipeline
 *
 * inventory → enricher → assembler → sink, for one region.
 */

import { validateConfig, type ReportConfig } from "../config.js";
import { createDirectoryManager } from "../directory/index.js";
import { createEnricher, type EnricherDependencies, type EnrichmentResult } from "../enrichment/index.js";
import { EnumerationAbortedError } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import {
  createActivityWindow,
  createMetricActivityClassifier,
  needsRetentionAdvisory,
  RETENTION_ADVISORY_DAYS,
} from "../metrics/index.js";
import { createNetworkManager } from "../network/index.js";
import { createEnrichmentProgress, withReportProgress, type ProgressStream } from "../progress.js";
import { createWorkspacesManager, type WorkspaceInventory } from "../workspaces/index.js";
import type { ReportRow } from "../types.js";
import { assembleReport } from "./assembler.js";
import { defaultOutputPath, writeCsvReport } from "./csv.js";

export type ReportSink = (rows: readonly ReportRow[], outputPath: string) => Promise<void>;

export type ReportCollaborators = EnricherDependencies & {
  inventory: WorkspaceInventory;
  /** Called once when the run ends, whatever its outcome */
  close?: () => Promise<void>;
};

export type RunReportOptions = {
  config: ReportConfig;
  /** Defaults to the AWS and LDAP backed implementations */
  collaborators?: ReportCollaborators;
  sink?: ReportSink;
  logger?: ReportLogger;
  now?: Date;
  progressStream?: ProgressStream;
};

export type ReportSummary = {
  rows: number;
  failed: number;
  unused: number;
  outputPath: string;
};

export function createAwsCollaborators(config: ReportConfig, logger: ReportLogger): ReportCollaborators {
  const workspaces = createWorkspacesManager({
    region: config.region,
    retry: config.retry,
    logger: logger.child("workspaces"),
  });
  const activity = createMetricActivityClassifier({
    region: config.region,
    retry: config.retry,
    logger: logger.child("metrics"),
  });
  const subnets = createNetworkManager({
    region: config.region,
    retry: config.retry,
    logger: logger.child("network"),
  });
  const directory = createDirectoryManager({ ...config.ldap, logger: logger.child("directory") });

  return {
    inventory: workspaces,
    details: workspaces,
    activity,
    subnets,
    directory,
    close: async () => {
      workspaces.close();
      activity.close();
      subnets.close();
      await directory.close();
    },
  };
}

export async function runReport(options: RunReportOptions): Promise<ReportSummary> {
  const config = validateConfig(options.config);
  const logger = (options.logger ?? createSilentLogger()).withContext({ region: config.region });
  const now = options.now ?? new Date();

  const window = createActivityWindow(config.inactivityDays, now);
  if (needsRetentionAdvisory(config.inactivityDays)) {
    logger.warn(
      `CloudWatch keeps daily connection data for ${RETENTION_ADVISORY_DAYS} days; ` +
        `workspaces idle for that long are reported unused regardless of earlier activity`,
      { inactivityDays: config.inactivityDays },
    );
  }

  const outputPath = config.outputPath ?? defaultOutputPath(config.region, now);
  const sink = options.sink ?? writeCsvReport;
  const collaborators = options.collaborators ?? createAwsCollaborators(config, logger);
  const progressOptions = { enabled: config.progress, stream: options.progressStream };

  try {
    const workspaces = await withReportProgress(
      `Listing workspaces in ${config.region}`,
      () => collaborators.inventory.listWorkspaces(),
      progressOptions,
    );
    logger.info(`Found ${workspaces.length} workspaces`, {
      inactivityDays: config.inactivityDays,
      failurePolicy: config.failurePolicy,
    });

    const progress = createEnrichmentProgress(workspaces.length, progressOptions);
    let result: EnrichmentResult;
    try {
      const enricher = createEnricher(collaborators, {
        region: config.region,
        window,
        failurePolicy: config.failurePolicy,
        concurrency: config.concurrency,
        onProgress: progress.update,
        logger: logger.child("enricher"),
      });
      result = await enricher.enrichAll(workspaces);
    } finally {
      progress.done();
    }

    if (result.aborted) {
      throw new EnumerationAbortedError(
        result.aborted.workspace.workspaceId,
        result.outcomes.length,
        result.aborted.error,
      );
    }

    const report = assembleReport(result.outcomes, { includeFailed: config.includeFailed });
    await sink(report.rows, outputPath);
    logger.info(`Wrote ${report.rows.length} rows to ${outputPath}`, {
      failed: report.failed,
      unused: report.unused,
    });

    return {
      rows: report.rows.length,
      failed: report.failed,
      unused: report.unused,
      outputPath,
    };
  } finally {
    await collaborators.close?.();
  }
}
