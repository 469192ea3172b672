/**
 * Directory Lookup Types
 */

import type { ReportLogger } from "../logging/index.js";
import type { Resolution } from "../types.js";

export type DirectoryUserInfo = {
  fullName?: string;
  department?: string;
  enabled: boolean;
  email?: string;
  /** Display name of the manager, resolved from the manager DN */
  managerName?: string;
  mobile?: string;
};

export type DirectoryComputerInfo = {
  createdAt?: Date;
  operatingSystem?: string;
};

export interface DirectoryLookup {
  resolveUser(samAccountName: string): Promise<Resolution<DirectoryUserInfo>>;
  resolveComputer(computerName: string): Promise<Resolution<DirectoryComputerInfo>>;
  close(): Promise<void>;
}

export type DirectoryManagerConfig = {
  /** ldap:// or ldaps:// URL of a domain controller */
  url: string;
  /** Search base, e.g. DC=corp,DC=example,DC=com */
  baseDN: string;
  /** Bind identity; an anonymous session is used when omitted */
  bindDN?: string;
  bindPassword?: string;
  timeoutMs?: number;
  logger?: ReportLogger;
};
