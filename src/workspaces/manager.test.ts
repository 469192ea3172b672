/**
 * WorkspacesManager Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  DescribeWorkspacesCommand,
  DescribeWorkspaceBundlesCommand,
  DescribeWorkspaceDirectoriesCommand,
} from "@aws-sdk/client-workspaces";
import { createWorkspacesManager, WorkspacesManager } from "./manager.js";
import { ConnectionStatusQueryFailedError, InventoryUnavailableError } from "../errors.js";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

// Real command classes, fake client
vi.mock("@aws-sdk/client-workspaces", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-workspaces")>();
  return {
    ...actual,
    WorkSpacesClient: vi.fn(function () {
      return { send: mockSend };
    }),
  };
});

const sampleWorkspace = {
  WorkspaceId: "ws-abc123",
  DirectoryId: "d-9067000001",
  UserName: "jdoe",
  IpAddress: "10.0.1.15",
  State: "AVAILABLE",
  BundleId: "wsb-bundle1",
  SubnetId: "subnet-0aa",
  ComputerName: "WSAMZN-ABC123",
  RootVolumeEncryptionEnabled: true,
  UserVolumeEncryptionEnabled: false,
  WorkspaceProperties: {
    RunningMode: "AUTO_STOP",
    RunningModeAutoStopTimeoutInMinutes: 60,
    RootVolumeSizeGib: 80,
    UserVolumeSizeGib: 50,
    ComputeTypeName: "STANDARD",
  },
};

describe("WorkspacesManager", () => {
  let manager: WorkspacesManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSend.mockReset();
    manager = createWorkspacesManager({ region: "us-east-1", retry: { attempts: 1 } });
  });

  describe("listWorkspaces", () => {
    it("should map workspace attributes into records", async () => {
      mockSend.mockResolvedValueOnce({ Workspaces: [sampleWorkspace] });

      const records = await manager.listWorkspaces();

      expect(records).toEqual([
        {
          workspaceId: "ws-abc123",
          userName: "jdoe",
          computerName: "WSAMZN-ABC123",
          ipAddress: "10.0.1.15",
          directoryId: "d-9067000001",
          bundleId: "wsb-bundle1",
          subnetId: "subnet-0aa",
          state: "AVAILABLE",
          rootVolumeEncryptionEnabled: true,
          userVolumeEncryptionEnabled: false,
          computeTypeName: "STANDARD",
          rootVolumeSizeGib: 80,
          userVolumeSizeGib: 50,
          runningMode: "AUTO_STOP",
          runningModeAutoStopTimeoutInMinutes: 60,
        },
      ]);
    });

    it("should follow NextToken until the listing is complete", async () => {
      mockSend
        .mockResolvedValueOnce({ Workspaces: [sampleWorkspace], NextToken: "page-2" })
        .mockResolvedValueOnce({ Workspaces: [{ ...sampleWorkspace, WorkspaceId: "ws-def456" }] });

      const records = await manager.listWorkspaces();

      expect(records.map((r) => r.workspaceId)).toEqual(["ws-abc123", "ws-def456"]);
      expect(mockSend).toHaveBeenCalledTimes(2);
      const secondCommand = mockSend.mock.calls[1][0];
      expect(secondCommand).toBeInstanceOf(DescribeWorkspacesCommand);
      expect(secondCommand.input.NextToken).toBe("page-2");
    });

    it("should default missing flags and skip entries without an id", async () => {
      mockSend.mockResolvedValueOnce({
        Workspaces: [{ UserName: "ghost" }, { WorkspaceId: "ws-min" }],
      });

      const records = await manager.listWorkspaces();

      expect(records).toHaveLength(1);
      expect(records[0].userName).toBe("");
      expect(records[0].state).toBe("UNKNOWN");
      expect(records[0].rootVolumeEncryptionEnabled).toBe(false);
    });

    it("should raise InventoryUnavailableError when the service fails", async () => {
      mockSend.mockRejectedValueOnce(new Error("AccessDeniedException: not authorized"));

      await expect(manager.listWorkspaces()).rejects.toBeInstanceOf(InventoryUnavailableError);
    });

    it("should retry throttled calls", async () => {
      const retrying = createWorkspacesManager({
        region: "us-east-1",
        retry: { attempts: 2, minDelayMs: 0, maxDelayMs: 0 },
      });
      mockSend
        .mockRejectedValueOnce(Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException" }))
        .mockResolvedValueOnce({ Workspaces: [sampleWorkspace] });

      const records = await retrying.listWorkspaces();

      expect(records).toHaveLength(1);
      expect(mockSend).toHaveBeenCalledTimes(2);
    });
  });

  describe("getConnectionStatus", () => {
    it("should return the status of the requested workspace", async () => {
      const checked = new Date("2026-10-18T08:00:00Z");
      const lastSeen = new Date("2026-10-17T16:30:00Z");
      mockSend.mockResolvedValueOnce({
        WorkspacesConnectionStatus: [
          {
            WorkspaceId: "ws-abc123",
            ConnectionState: "DISCONNECTED",
            ConnectionStateCheckTimestamp: checked,
            LastKnownUserConnectionTimestamp: lastSeen,
          },
        ],
      });

      const status = await manager.getConnectionStatus("ws-abc123");

      expect(status).toEqual({
        connectionState: "DISCONNECTED",
        stateCheckedAt: checked,
        lastUserConnectionAt: lastSeen,
      });
    });

    it("should return an empty status when the workspace is not reported", async () => {
      mockSend.mockResolvedValueOnce({ WorkspacesConnectionStatus: [] });

      expect(await manager.getConnectionStatus("ws-abc123")).toEqual({});
    });

    it("should raise ConnectionStatusQueryFailedError on service errors", async () => {
      mockSend.mockRejectedValueOnce(new Error("InvalidParameterValuesException"));

      const pending = manager.getConnectionStatus("ws-abc123");

      await expect(pending).rejects.toBeInstanceOf(ConnectionStatusQueryFailedError);
      await expect(pending).rejects.toMatchObject({ source: "connection-status", subject: "ws-abc123" });
    });
  });

  describe("name lookups", () => {
    it("should cache directory names per directory id", async () => {
      mockSend.mockResolvedValueOnce({
        Directories: [{ DirectoryId: "d-9067000001", DirectoryName: "corp.example.com" }],
      });

      const first = await manager.getDirectoryName("d-9067000001");
      const second = await manager.getDirectoryName("d-9067000001");

      expect(first).toBe("corp.example.com");
      expect(second).toBe("corp.example.com");
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(mockSend.mock.calls[0][0]).toBeInstanceOf(DescribeWorkspaceDirectoriesCommand);
    });

    it("should resolve a failed bundle lookup to undefined and try again later", async () => {
      mockSend
        .mockRejectedValueOnce(new Error("ResourceNotFoundException"))
        .mockResolvedValueOnce({ Bundles: [{ BundleId: "wsb-bundle1", Name: "Standard with Windows 10" }] });

      expect(await manager.getBundleName("wsb-bundle1")).toBeUndefined();
      expect(await manager.getBundleName("wsb-bundle1")).toBe("Standard with Windows 10");
      expect(mockSend.mock.calls[1][0]).toBeInstanceOf(DescribeWorkspaceBundlesCommand);
    });

    it("should convert the tag list into a record", async () => {
      mockSend.mockResolvedValueOnce({
        TagList: [
          { Key: "Team", Value: "infra" },
          { Key: "Owner", Value: "ops" },
        ],
      });

      expect(await manager.getTags("ws-abc123")).toEqual({ Team: "infra", Owner: "ops" });
    });

    it("should return undefined tags when the lookup fails", async () => {
      mockSend.mockRejectedValueOnce(new Error("AccessDeniedException"));

      expect(await manager.getTags("ws-abc123")).toBeUndefined();
    });
  });
});
