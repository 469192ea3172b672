/**
 * Network Topology Module
 */

export { NetworkManager, createNetworkManager, labelFromTags, NAME_TAG_KEY } from "./manager.js";
export type { NetworkManagerConfig, SubnetInfo, SubnetLookup } from "./types.js";
