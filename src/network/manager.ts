/**
 * Network Topology Manager
 *
 * Resolves workspace subnets to their placement: label, zone and
 * remaining address capacity.
 */

import { EC2Client, DescribeSubnetsCommand, type Subnet, type Tag } from "@aws-sdk/client-ec2";

import { TopologyQueryFailedError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import { withAWSRetry } from "../retry.js";
import type { NetworkManagerConfig, SubnetInfo, SubnetLookup } from "./types.js";

export const NAME_TAG_KEY = "Name";

/**
 * Label of a resource: the value of its exact, case-sensitive "Name" tag
 */
export function labelFromTags(tags?: Tag[]): string {
  return tags?.find((tag) => tag.Key === NAME_TAG_KEY)?.Value ?? "";
}

export function createNetworkManager(config: NetworkManagerConfig): NetworkManager {
  return new NetworkManager(config);
}

export class NetworkManager implements SubnetLookup {
  private config: NetworkManagerConfig;
  private client: EC2Client;
  private logger: ReportLogger;
  private subnets = new Map<string, Promise<SubnetInfo>>();

  constructor(config: NetworkManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    this.client = new EC2Client({ region: config.region });
  }

  close(): void {
    this.client.destroy();
  }

  /**
   * Resolve a subnet. Workspaces usually share a handful of subnets, so
   * successful lookups are kept for the lifetime of the manager.
   */
  resolveSubnet(subnetId: string): Promise<SubnetInfo> {
    const existing = this.subnets.get(subnetId);
    if (existing) return existing;

    const pending = this.describeSubnet(subnetId).catch((error: unknown) => {
      this.subnets.delete(subnetId);
      throw error;
    });
    this.subnets.set(subnetId, pending);
    return pending;
  }

  private async describeSubnet(subnetId: string): Promise<SubnetInfo> {
    let subnet: Subnet | undefined;
    try {
      const response = await withAWSRetry(
        () => this.client.send(new DescribeSubnetsCommand({ SubnetIds: [subnetId] })),
        { retry: this.config.retry, label: "DescribeSubnets", logger: this.logger },
      );
      subnet = response.Subnets?.find((s) => s.SubnetId === subnetId);
    } catch (error) {
      throw new TopologyQueryFailedError(subnetId, formatErrorMessage(error), { cause: error });
    }

    if (!subnet) {
      throw new TopologyQueryFailedError(subnetId, "subnet not returned by DescribeSubnets");
    }

    return {
      subnetId,
      label: labelFromTags(subnet.Tags),
      availabilityZone: subnet.AvailabilityZone,
      availabilityZoneId: subnet.AvailabilityZoneId,
      availableIpAddressCount: subnet.AvailableIpAddressCount,
    };
  }
}
