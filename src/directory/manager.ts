/**
 * Directory Manager
 *
 * Resolves workspace owners and computers against Active Directory over
 * LDAP. A missing entry is a normal "not-found" resolution; only transport
 * and server errors raise DirectoryQueryFailedError.
 */

import { AndFilter, Client, EqualityFilter, NoSuchObjectError, type Entry } from "ldapts";

import { DirectoryQueryFailedError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import { found, notFound, type Resolution } from "../types.js";
import type {
  DirectoryComputerInfo,
  DirectoryLookup,
  DirectoryManagerConfig,
  DirectoryUserInfo,
} from "./types.js";

const USER_ATTRIBUTES = ["name", "displayName", "department", "userAccountControl", "mail", "manager", "mobile"];
const COMPUTER_ATTRIBUTES = ["whenCreated", "operatingSystem"];
const MANAGER_ATTRIBUTES = ["displayName", "name"];

/** userAccountControl flag set on disabled accounts */
const ACCOUNTDISABLE = 0x2;

const DEFAULT_TIMEOUT_MS = 10_000;

// =============================================================================
// Attribute Helpers
// =============================================================================

/**
 * First value of an attribute, matched case-insensitively
 */
export function attributeValue(entry: Entry, attribute: string): string | undefined {
  const key = Object.keys(entry).find((k) => k.toLowerCase() === attribute.toLowerCase());
  if (!key) return undefined;

  const raw = entry[key];
  const first = Array.isArray(raw) ? raw[0] : raw;
  if (first === undefined) return undefined;
  const value = typeof first === "string" ? first : first.toString("utf8");
  return value.length > 0 ? value : undefined;
}

/**
 * Parse LDAP generalized time, e.g. 20240115103000.0Z
 */
export function parseGeneralizedTime(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?(?:[.,](\d+))?(Z|[+-]\d{4})?$/.exec(value);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second = "00", fraction, zone = "Z"] = match;
  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;
  let time = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis,
  );

  if (zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const offsetMinutes = Number(zone.slice(1, 3)) * 60 + Number(zone.slice(3, 5));
    time -= sign * offsetMinutes * 60_000;
  }
  return new Date(time);
}

export function isAccountEnabled(userAccountControl: string | undefined): boolean {
  if (!userAccountControl) return true;
  const flags = Number.parseInt(userAccountControl, 10);
  if (Number.isNaN(flags)) return true;
  return (flags & ACCOUNTDISABLE) === 0;
}

// =============================================================================
// Directory Manager
// =============================================================================

export function createDirectoryManager(config: DirectoryManagerConfig): DirectoryManager {
  return new DirectoryManager(config);
}

export class DirectoryManager implements DirectoryLookup {
  private config: DirectoryManagerConfig;
  private client: Client;
  private logger: ReportLogger;
  private session: Promise<void> | null = null;
  private users = new Map<string, Promise<Resolution<DirectoryUserInfo>>>();
  private managerNames = new Map<string, Promise<string | undefined>>();

  constructor(config: DirectoryManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new Client({ url: config.url, timeout, connectTimeout: timeout });
  }

  async resolveUser(samAccountName: string): Promise<Resolution<DirectoryUserInfo>> {
    const existing = this.users.get(samAccountName);
    if (existing) return existing;

    const pending = this.lookupUser(samAccountName).catch((error: unknown) => {
      this.users.delete(samAccountName);
      throw error;
    });
    this.users.set(samAccountName, pending);
    return pending;
  }

  async resolveComputer(computerName: string): Promise<Resolution<DirectoryComputerInfo>> {
    const entry = await this.findOne(
      computerName,
      new AndFilter({
        filters: [
          new EqualityFilter({ attribute: "objectClass", value: "computer" }),
          new EqualityFilter({ attribute: "cn", value: computerName }),
        ],
      }),
      COMPUTER_ATTRIBUTES,
    );
    if (!entry) return notFound(computerName);

    return found({
      createdAt: parseGeneralizedTime(attributeValue(entry, "whenCreated")),
      operatingSystem: attributeValue(entry, "operatingSystem"),
    });
  }

  async close(): Promise<void> {
    if (!this.session) return;
    this.session = null;
    await this.client.unbind();
  }

  private async lookupUser(samAccountName: string): Promise<Resolution<DirectoryUserInfo>> {
    const entry = await this.findOne(
      samAccountName,
      new AndFilter({
        filters: [
          new EqualityFilter({ attribute: "objectClass", value: "user" }),
          new EqualityFilter({ attribute: "sAMAccountName", value: samAccountName }),
        ],
      }),
      USER_ATTRIBUTES,
    );
    if (!entry) {
      this.logger.debug(`No directory user for ${samAccountName}`);
      return notFound(samAccountName);
    }

    // Depends on the user entry, so it cannot run alongside the first search
    const managerDn = attributeValue(entry, "manager");
    const managerName = managerDn ? await this.resolveManagerName(samAccountName, managerDn) : undefined;

    return found({
      fullName: attributeValue(entry, "displayName") ?? attributeValue(entry, "name"),
      department: attributeValue(entry, "department"),
      enabled: isAccountEnabled(attributeValue(entry, "userAccountControl")),
      email: attributeValue(entry, "mail"),
      managerName,
      mobile: attributeValue(entry, "mobile"),
    });
  }

  private resolveManagerName(subject: string, managerDn: string): Promise<string | undefined> {
    const existing = this.managerNames.get(managerDn);
    if (existing) return existing;

    const pending = (async () => {
      await this.connect(subject);
      try {
        const { searchEntries } = await this.client.search(managerDn, {
          scope: "base",
          attributes: MANAGER_ATTRIBUTES,
        });
        const manager = searchEntries[0];
        return manager ? attributeValue(manager, "displayName") ?? attributeValue(manager, "name") : undefined;
      } catch (error) {
        if (error instanceof NoSuchObjectError) {
          this.logger.debug(`Manager ${managerDn} of ${subject} no longer exists`);
          return undefined;
        }
        throw new DirectoryQueryFailedError(subject, formatErrorMessage(error), { cause: error });
      }
    })().catch((error: unknown) => {
      this.managerNames.delete(managerDn);
      throw error;
    });

    this.managerNames.set(managerDn, pending);
    return pending;
  }

  private async findOne(subject: string, filter: AndFilter, attributes: string[]): Promise<Entry | undefined> {
    await this.connect(subject);
    try {
      const { searchEntries } = await this.client.search(this.config.baseDN, {
        scope: "sub",
        filter,
        attributes,
      });
      if (searchEntries.length > 1) {
        this.logger.warn(`Multiple directory entries match ${subject}, using the first`);
      }
      return searchEntries[0];
    } catch (error) {
      throw new DirectoryQueryFailedError(subject, formatErrorMessage(error), { cause: error });
    }
  }

  /**
   * Bind once per session; concurrent callers share the same bind
   */
  private connect(subject: string): Promise<void> {
    if (!this.session) {
      const { bindDN, bindPassword } = this.config;
      this.session = (bindDN ? this.client.bind(bindDN, bindPassword ?? "") : Promise.resolve()).catch(
        (error: unknown) => {
          this.session = null;
          throw new DirectoryQueryFailedError(subject, `bind failed: ${formatErrorMessage(error)}`, {
            cause: error,
          });
        },
      );
    }
    return this.session;
  }
}
