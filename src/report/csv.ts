/**
 * CSV Report Sink
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { resolvedValue } from "../types.js";
import type { ReportRow } from "../types.js";

type CsvColumn = {
  header: string;
  value: (row: ReportRow) => string | number | boolean | Date | undefined;
};

const COLUMNS: readonly CsvColumn[] = [
  { header: "UserName", value: (r) => r.workspace.userName },
  { header: "FullName", value: (r) => resolvedValue(r.user)?.fullName },
  { header: "Department", value: (r) => resolvedValue(r.user)?.department },
  { header: "Enabled", value: (r) => resolvedValue(r.user)?.enabled },
  { header: "Email", value: (r) => resolvedValue(r.user)?.email },
  { header: "Manager", value: (r) => resolvedValue(r.user)?.managerName },
  { header: "MobilePhone", value: (r) => resolvedValue(r.user)?.mobile },
  { header: "ComputerName", value: (r) => r.workspace.computerName },
  { header: "ComputerCreated", value: (r) => resolvedValue(r.computer)?.createdAt },
  { header: "OperatingSystem", value: (r) => resolvedValue(r.computer)?.operatingSystem },
  { header: "WorkspaceId", value: (r) => r.workspace.workspaceId },
  { header: "ConnectionState", value: (r) => r.connection?.connectionState },
  { header: "StateCheckTimestamp", value: (r) => r.connection?.stateCheckedAt },
  { header: "LastConnectionTimestamp", value: (r) => r.connection?.lastUserConnectionAt },
  { header: "UnusedForPeriod", value: (r) => r.activity?.unused },
  { header: "State", value: (r) => r.workspace.state },
  { header: "ComputeType", value: (r) => r.workspace.computeTypeName },
  { header: "IPAddress", value: (r) => r.workspace.ipAddress },
  { header: "DirectoryName", value: (r) => r.directoryName },
  { header: "DirectoryId", value: (r) => r.workspace.directoryId },
  { header: "BundleName", value: (r) => r.bundleName },
  { header: "BundleId", value: (r) => r.workspace.bundleId },
  { header: "SubnetLabel", value: (r) => r.subnet?.label },
  { header: "SubnetId", value: (r) => r.workspace.subnetId },
  { header: "SubnetAZ", value: (r) => r.subnet?.availabilityZone },
  { header: "SubnetAZId", value: (r) => r.subnet?.availabilityZoneId },
  { header: "SubnetAvailableIPs", value: (r) => r.subnet?.availableIpAddressCount },
  { header: "RootVolumeEncrypted", value: (r) => r.workspace.rootVolumeEncryptionEnabled },
  { header: "UserVolumeEncrypted", value: (r) => r.workspace.userVolumeEncryptionEnabled },
  { header: "RootVolumeSizeGib", value: (r) => r.workspace.rootVolumeSizeGib },
  { header: "UserVolumeSizeGib", value: (r) => r.workspace.userVolumeSizeGib },
  { header: "RunningMode", value: (r) => r.workspace.runningMode },
  { header: "AutoStopTimeoutMinutes", value: (r) => r.workspace.runningModeAutoStopTimeoutInMinutes },
  { header: "Region", value: (r) => r.region },
  { header: "Tags", value: (r) => (r.tags ? formatTags(r.tags) : undefined) },
  { header: "EnrichmentError", value: (r) => r.enrichmentError },
];

export const CSV_HEADERS: readonly string[] = COLUMNS.map((column) => column.header);

/** Escape a CSV field value. */
export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: string | number | boolean | Date | undefined): string {
  if (value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return csvEscape(String(value));
}

/**
 * `key:value` pairs ordered by key, joined by `;`
 */
export function formatTags(tags: Readonly<Record<string, string>>): string {
  return Object.keys(tags)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((key) => `${key}:${tags[key]}`)
    .join(";");
}

export function toCsvLine(row: ReportRow): string {
  return COLUMNS.map((column) => formatCell(column.value(row))).join(",");
}

export function toCsv(rows: readonly ReportRow[]): string {
  const lines = [CSV_HEADERS.join(","), ...rows.map(toCsvLine)];
  return `${lines.join("\n")}\n`;
}

/**
 * reports/workspaces-<region>-<yyyyMMdd>.csv, dated in UTC
 */
export function defaultOutputPath(region: string, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 10).replace(/-/g, "");
  return join("reports", `workspaces-${region}-${stamp}.csv`);
}

export async function writeCsvReport(rows: readonly ReportRow[], outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, toCsv(rows), "utf-8");
}
