/**
 * Network Topology Types
 */

import type { ReportLogger } from "../logging/index.js";
import type { RetryConfig } from "../retry.js";

/**
 * Placement attributes of the subnet a workspace lives in
 */
export interface SubnetInfo {
  /** Subnet ID */
  subnetId: string;
  /** Value of the "Name" tag, empty when the subnet has none */
  label: string;
  /** Availability Zone */
  availabilityZone?: string;
  /** Availability Zone ID */
  availabilityZoneId?: string;
  /** Available IP address count */
  availableIpAddressCount?: number;
}

export interface SubnetLookup {
  resolveSubnet(subnetId: string): Promise<SubnetInfo>;
}

export interface NetworkManagerConfig {
  /** Region the subnets belong to */
  region: string;
  retry?: RetryConfig;
  logger?: ReportLogger;
}
