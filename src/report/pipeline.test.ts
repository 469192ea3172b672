/**
 * Report Pipeline Tests
 */

import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { runReport, type ReportCollaborators } from "./pipeline.js";
import type { ReportConfig } from "../config.js";
import type { DirectoryUserInfo } from "../directory/types.js";
import {
  EnumerationAbortedError,
  InventoryUnavailableError,
  MetricsQueryFailedError,
} from "../errors.js";
import { MemoryTransport, createReportLogger } from "../logging/index.js";
import type { ActivityWindow } from "../metrics/types.js";
import { found, notFound, type ReportRow } from "../types.js";
import type { WorkspaceRecord } from "../workspaces/types.js";

const config: ReportConfig = {
  region: "us-east-1",
  inactivityDays: 90,
  failurePolicy: "isolate",
  includeFailed: true,
  concurrency: 1,
  progress: false,
  logLevel: "info",
  outputPath: "out/report.csv",
  ldap: { url: "ldaps://dc01.corp.example.com", baseDN: "DC=corp,DC=example,DC=com" },
};

const users = ["erin", "bob", "alice", "dave", "carol"];

const inventory: WorkspaceRecord[] = users.map((userName, i) => ({
  workspaceId: `ws-${i + 1}`,
  userName,
  state: "AVAILABLE",
  rootVolumeEncryptionEnabled: true,
  userVolumeEncryptionEnabled: true,
}));

function createCollaborators(failing: string[] = []) {
  const collaborators = {
    inventory: { listWorkspaces: vi.fn(async () => inventory) },
    directory: {
      resolveUser: vi.fn(async (name: string) =>
        name === "dave" ? notFound<DirectoryUserInfo>(name) : found({ fullName: name.toUpperCase(), enabled: true }),
      ),
      resolveComputer: vi.fn(async (name: string) => notFound<{ createdAt?: Date }>(name)),
      close: vi.fn(async () => undefined),
    },
    details: {
      getConnectionStatus: vi.fn(async () => ({ connectionState: "DISCONNECTED" })),
      getDirectoryName: vi.fn(async () => undefined),
      getBundleName: vi.fn(async () => undefined),
      getTags: vi.fn(async () => undefined),
    },
    subnets: { resolveSubnet: vi.fn(async (subnetId: string) => ({ subnetId, label: "" })) },
    activity: {
      classify: vi.fn(async (workspaceId: string, window: ActivityWindow) => {
        if (failing.includes(workspaceId)) throw new MetricsQueryFailedError(workspaceId, "Rate exceeded");
        return { unused: workspaceId === "ws-1", sampleCount: 10, window };
      }),
    },
    close: vi.fn(async () => undefined),
  } satisfies ReportCollaborators;
  return collaborators;
}

function createSink() {
  const written: Array<{ rows: readonly ReportRow[]; outputPath: string }> = [];
  const sink = vi.fn(async (rows: readonly ReportRow[], outputPath: string) => {
    written.push({ rows, outputPath });
  });
  return { sink, written };
}

describe("runReport", () => {
  it("should write every workspace sorted by user name", async () => {
    const collaborators = createCollaborators();
    const { sink, written } = createSink();

    const summary = await runReport({ config, collaborators, sink });

    expect(summary).toEqual({ rows: 5, failed: 0, unused: 1, outputPath: "out/report.csv" });
    expect(written).toHaveLength(1);
    expect(written[0].rows.map((row) => row.workspace.userName)).toEqual(["alice", "bob", "carol", "dave", "erin"]);
    expect(written[0].rows[3].user).toEqual({ status: "not-found", key: "dave" });
    expect(collaborators.inventory.listWorkspaces).toHaveBeenCalledTimes(1);
    expect(collaborators.close).toHaveBeenCalledTimes(1);
  });

  it("should classify over the configured trailing window", async () => {
    const collaborators = createCollaborators();
    const { sink } = createSink();

    await runReport({
      config: { ...config, inactivityDays: 30 },
      collaborators,
      sink,
      now: new Date("2026-03-31T00:00:00.000Z"),
    });

    expect(collaborators.activity.classify).toHaveBeenCalledWith("ws-1", {
      start: new Date("2026-03-01T00:00:00.000Z"),
      end: new Date("2026-03-31T00:00:00.000Z"),
      periodSeconds: 86_400,
    });
  });

  it("should never reach the sink when the abort policy stops the run", async () => {
    const collaborators = createCollaborators(["ws-3"]);
    const { sink } = createSink();

    const run = runReport({ config: { ...config, failurePolicy: "abort" }, collaborators, sink });

    await expect(run).rejects.toBeInstanceOf(EnumerationAbortedError);
    await expect(run).rejects.toMatchObject({ workspaceId: "ws-3", retainedRows: 2 });
    await expect(run).rejects.toThrow(
      "Enumeration aborted at workspace ws-3 (2 rows discarded): Metrics query for ws-3 failed: Rate exceeded",
    );
    expect(sink).not.toHaveBeenCalled();
    expect(collaborators.close).toHaveBeenCalledTimes(1);
  });

  it("should keep all five rows and mark failures under the isolate policy", async () => {
    const { sink, written } = createSink();

    const summary = await runReport({ config, collaborators: createCollaborators(["ws-3", "ws-4", "ws-5"]), sink });

    expect(summary.rows).toBe(5);
    expect(summary.failed).toBe(3);
    const marked = written[0].rows.filter((row) => row.enrichmentError !== undefined);
    expect(marked.map((row) => row.workspace.workspaceId).sort()).toEqual(["ws-3", "ws-4", "ws-5"]);
  });

  it("should mark only the failing workspace when one fails", async () => {
    const { sink, written } = createSink();

    const summary = await runReport({ config, collaborators: createCollaborators(["ws-3"]), sink });

    expect(summary).toMatchObject({ rows: 5, failed: 1 });
    expect(written[0].rows.filter((row) => row.enrichmentError === undefined)).toHaveLength(4);
  });

  it("should leave failed workspaces out when configured to", async () => {
    const { sink } = createSink();

    const summary = await runReport({
      config: { ...config, includeFailed: false },
      collaborators: createCollaborators(["ws-3"]),
      sink,
    });

    expect(summary).toMatchObject({ rows: 4, failed: 1 });
  });

  it("should fail the run when the inventory is unavailable", async () => {
    const collaborators = createCollaborators();
    collaborators.inventory.listWorkspaces.mockRejectedValueOnce(
      new InventoryUnavailableError("us-east-1", "AccessDeniedException"),
    );
    const { sink } = createSink();

    await expect(runReport({ config, collaborators, sink })).rejects.toThrow(
      "Unable to list workspaces in us-east-1: AccessDeniedException",
    );
    expect(collaborators.activity.classify).not.toHaveBeenCalled();
    expect(sink).not.toHaveBeenCalled();
  });

  it("should reject an invalid configuration before touching any service", async () => {
    const collaborators = createCollaborators();

    await expect(
      runReport({ config: { ...config, inactivityDays: 0 }, collaborators, sink: createSink().sink }),
    ).rejects.toThrow("Invalid report configuration");
    expect(collaborators.inventory.listWorkspaces).not.toHaveBeenCalled();
  });

  it("should warn about CloudWatch retention for long windows", async () => {
    const transport = new MemoryTransport();
    const logger = createReportLogger("report", { transports: [transport] });

    await runReport({
      config: { ...config, inactivityDays: 500 },
      collaborators: createCollaborators(),
      sink: createSink().sink,
      logger,
    });

    const warnings = transport.messages("warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith("CloudWatch keeps daily connection data for 455 days")).toBe(true);
  });

  it("should default the output path to the region and date", async () => {
    const { sink } = createSink();

    const summary = await runReport({
      config: { ...config, outputPath: undefined },
      collaborators: createCollaborators(),
      sink,
      now: new Date("2026-02-14T09:00:00.000Z"),
    });

    expect(summary.outputPath).toBe(join("reports", "workspaces-us-east-1-20260214.csv"));
  });
});
