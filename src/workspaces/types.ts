/**
 * WorkSpaces Inventory Types
 */

import type { ReportLogger } from "../logging/index.js";
import type { RetryConfig } from "../retry.js";

// =============================================================================
// Inventory Records
// =============================================================================

/**
 * Running mode of a workspace
 */
export type WorkspaceRunningMode = "AUTO_STOP" | "ALWAYS_ON" | "MANUAL" | (string & {});

/**
 * Static attributes of one workspace, as read from the inventory.
 * Never modified after it is read.
 */
export type WorkspaceRecord = Readonly<{
  workspaceId: string;
  /** sAMAccountName of the owning user */
  userName: string;
  computerName?: string;
  ipAddress?: string;
  directoryId?: string;
  bundleId?: string;
  subnetId?: string;
  state: string;
  rootVolumeEncryptionEnabled: boolean;
  userVolumeEncryptionEnabled: boolean;
  computeTypeName?: string;
  rootVolumeSizeGib?: number;
  userVolumeSizeGib?: number;
  runningMode?: WorkspaceRunningMode;
  runningModeAutoStopTimeoutInMinutes?: number;
}>;

/**
 * Point-in-time connection state of a workspace
 */
export type ConnectionStatus = {
  connectionState?: string;
  stateCheckedAt?: Date;
  lastUserConnectionAt?: Date;
};

// =============================================================================
// Lookup Contracts
// =============================================================================

export interface WorkspaceInventory {
  /** Complete set of workspaces in the inventory's region; pagination is internal */
  listWorkspaces(): Promise<WorkspaceRecord[]>;
}

export interface WorkspaceDetailsLookup {
  getConnectionStatus(workspaceId: string): Promise<ConnectionStatus>;
  /** Best effort: undefined when the name could not be resolved */
  getDirectoryName(directoryId: string): Promise<string | undefined>;
  getBundleName(bundleId: string): Promise<string | undefined>;
  getTags(workspaceId: string): Promise<Record<string, string> | undefined>;
}

export type WorkspacesManagerConfig = {
  region: string;
  retry?: RetryConfig;
  logger?: ReportLogger;
};
