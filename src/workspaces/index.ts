export { WorkspacesManager, createWorkspacesManager } from "./manager.js";
export type {
  ConnectionStatus,
  WorkspaceDetailsLookup,
  WorkspaceInventory,
  WorkspaceRecord,
  WorkspaceRunningMode,
  WorkspacesManagerConfig,
} from "./types.js";
