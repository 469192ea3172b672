export {
  DirectoryManager,
  createDirectoryManager,
  attributeValue,
  isAccountEnabled,
  parseGeneralizedTime,
} from "./manager.js";
export type {
  DirectoryComputerInfo,
  DirectoryLookup,
  DirectoryManagerConfig,
  DirectoryUserInfo,
} from "./types.js";
