/**
 * WorkSpaces Manager
 *
 * Inventory listing plus the per-workspace lookups served by the
 * WorkSpaces API: connection status, directory and bundle names, tags.
 */

import {
  WorkSpacesClient,
  DescribeWorkspacesCommand,
  DescribeWorkspacesConnectionStatusCommand,
  DescribeWorkspaceDirectoriesCommand,
  DescribeWorkspaceBundlesCommand,
  DescribeTagsCommand,
  type Workspace,
  type Tag,
} from "@aws-sdk/client-workspaces";

import { ConnectionStatusQueryFailedError, InventoryUnavailableError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import { withAWSRetry } from "../retry.js";
import type {
  ConnectionStatus,
  WorkspaceDetailsLookup,
  WorkspaceInventory,
  WorkspaceRecord,
  WorkspacesManagerConfig,
} from "./types.js";

const DESCRIBE_WORKSPACES_PAGE_SIZE = 25;

export function createWorkspacesManager(config: WorkspacesManagerConfig): WorkspacesManager {
  return new WorkspacesManager(config);
}

export class WorkspacesManager implements WorkspaceInventory, WorkspaceDetailsLookup {
  private config: WorkspacesManagerConfig;
  private client: WorkSpacesClient;
  private logger: ReportLogger;
  private directoryNames = new Map<string, Promise<string | undefined>>();
  private bundleNames = new Map<string, Promise<string | undefined>>();

  constructor(config: WorkspacesManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    this.client = new WorkSpacesClient({ region: config.region });
  }

  /** Release the SDK client's sockets */
  close(): void {
    this.client.destroy();
  }

  private withRetry<T>(fn: () => Promise<T>, label: string): Promise<T> {
    return withAWSRetry(fn, { retry: this.config.retry, label, logger: this.logger });
  }

  // ===========================================================================
  // Inventory
  // ===========================================================================

  /**
   * List every workspace in the region, following NextToken until exhausted
   */
  async listWorkspaces(): Promise<WorkspaceRecord[]> {
    const { region } = this.config;
    const records: WorkspaceRecord[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.withRetry(
          () => this.client.send(new DescribeWorkspacesCommand({
            Limit: DESCRIBE_WORKSPACES_PAGE_SIZE,
            NextToken: nextToken,
          })),
          "DescribeWorkspaces",
        );

        for (const workspace of response.Workspaces ?? []) {
          const record = toWorkspaceRecord(workspace);
          if (record) records.push(record);
        }
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw new InventoryUnavailableError(region, formatErrorMessage(error), { cause: error });
    }

    this.logger.debug(`Listed ${records.length} workspaces`, { region });
    return records;
  }

  // ===========================================================================
  // Per-workspace Lookups
  // ===========================================================================

  async getConnectionStatus(workspaceId: string): Promise<ConnectionStatus> {
    try {
      const response = await this.withRetry(
        () => this.client.send(new DescribeWorkspacesConnectionStatusCommand({ WorkspaceIds: [workspaceId] })),
        "DescribeWorkspacesConnectionStatus",
      );
      const status = response.WorkspacesConnectionStatus?.find((s) => s.WorkspaceId === workspaceId);
      if (!status) return {};

      return {
        connectionState: status.ConnectionState,
        stateCheckedAt: status.ConnectionStateCheckTimestamp,
        lastUserConnectionAt: status.LastKnownUserConnectionTimestamp,
      };
    } catch (error) {
      throw new ConnectionStatusQueryFailedError(workspaceId, formatErrorMessage(error), { cause: error });
    }
  }

  getDirectoryName(directoryId: string): Promise<string | undefined> {
    return this.cached(this.directoryNames, directoryId, async () => {
      const response = await this.withRetry(
        () => this.client.send(new DescribeWorkspaceDirectoriesCommand({ DirectoryIds: [directoryId] })),
        "DescribeWorkspaceDirectories",
      );
      return response.Directories?.find((d) => d.DirectoryId === directoryId)?.DirectoryName;
    });
  }

  getBundleName(bundleId: string): Promise<string | undefined> {
    return this.cached(this.bundleNames, bundleId, async () => {
      const response = await this.withRetry(
        () => this.client.send(new DescribeWorkspaceBundlesCommand({ BundleIds: [bundleId] })),
        "DescribeWorkspaceBundles",
      );
      return response.Bundles?.find((b) => b.BundleId === bundleId)?.Name;
    });
  }

  async getTags(workspaceId: string): Promise<Record<string, string> | undefined> {
    try {
      const response = await this.withRetry(
        () => this.client.send(new DescribeTagsCommand({ ResourceId: workspaceId })),
        "DescribeTags",
      );
      return fromWorkspaceTags(response.TagList);
    } catch (error) {
      this.logger.warn(`Tags unavailable for ${workspaceId}`, { error: formatErrorMessage(error) });
      return undefined;
    }
  }

  /**
   * Memoise a best-effort name lookup. Failures are logged, resolve to
   * undefined, and are evicted so a later workspace can try again.
   */
  private cached(
    cache: Map<string, Promise<string | undefined>>,
    key: string,
    load: () => Promise<string | undefined>,
  ): Promise<string | undefined> {
    const existing = cache.get(key);
    if (existing) return existing;

    const pending = load().catch((error: unknown) => {
      cache.delete(key);
      this.logger.warn(`Name lookup failed for ${key}`, { error: formatErrorMessage(error) });
      return undefined;
    });
    cache.set(key, pending);
    return pending;
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toWorkspaceRecord(workspace: Workspace): WorkspaceRecord | undefined {
  if (!workspace.WorkspaceId) return undefined;
  const properties = workspace.WorkspaceProperties;

  return {
    workspaceId: workspace.WorkspaceId,
    userName: workspace.UserName ?? "",
    computerName: workspace.ComputerName,
    ipAddress: workspace.IpAddress,
    directoryId: workspace.DirectoryId,
    bundleId: workspace.BundleId,
    subnetId: workspace.SubnetId,
    state: workspace.State ?? "UNKNOWN",
    rootVolumeEncryptionEnabled: workspace.RootVolumeEncryptionEnabled ?? false,
    userVolumeEncryptionEnabled: workspace.UserVolumeEncryptionEnabled ?? false,
    computeTypeName: properties?.ComputeTypeName,
    rootVolumeSizeGib: properties?.RootVolumeSizeGib,
    userVolumeSizeGib: properties?.UserVolumeSizeGib,
    runningMode: properties?.RunningMode,
    runningModeAutoStopTimeoutInMinutes: properties?.RunningModeAutoStopTimeoutInMinutes,
  };
}

function fromWorkspaceTags(tags?: Tag[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) {
      result[tag.Key] = tag.Value ?? "";
    }
  }
  return result;
}
