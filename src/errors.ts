/**
 * Report Error Types
 *
 * Inventory failures are fatal to a run. Per-workspace lookup failures are
 * QueryFailedError subclasses, which the enricher either isolates or turns
 * into an aborted enumeration depending on the failure policy.
 * A directory entry that does not exist is not an error (see Resolution).
 */

/**
 * Services a per-workspace lookup can fail against
 */
export type QuerySource = "directory" | "metrics" | "topology" | "connection-status";

export class InventoryUnavailableError extends Error {
  constructor(public region: string, message: string, options?: { cause?: unknown }) {
    super(`Unable to list workspaces in ${region}: ${message}`, options);
    this.name = "InventoryUnavailableError";
  }
}

/**
 * Transport or service failure while enriching a single workspace
 */
export class QueryFailedError extends Error {
  constructor(
    public source: QuerySource,
    public subject: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "QueryFailedError";
  }
}

export class DirectoryQueryFailedError extends QueryFailedError {
  constructor(subject: string, message: string, options?: { cause?: unknown }) {
    super("directory", subject, `Directory query for ${subject} failed: ${message}`, options);
    this.name = "DirectoryQueryFailedError";
  }
}

export class MetricsQueryFailedError extends QueryFailedError {
  constructor(subject: string, message: string, options?: { cause?: unknown }) {
    super("metrics", subject, `Metrics query for ${subject} failed: ${message}`, options);
    this.name = "MetricsQueryFailedError";
  }
}

export class TopologyQueryFailedError extends QueryFailedError {
  constructor(subject: string, message: string, options?: { cause?: unknown }) {
    super("topology", subject, `Subnet query for ${subject} failed: ${message}`, options);
    this.name = "TopologyQueryFailedError";
  }
}

export class ConnectionStatusQueryFailedError extends QueryFailedError {
  constructor(subject: string, message: string, options?: { cause?: unknown }) {
    super("connection-status", subject, `Connection status query for ${subject} failed: ${message}`, options);
    this.name = "ConnectionStatusQueryFailedError";
  }
}

/**
 * Raised when the abort failure policy stops the enumeration. Rows joined
 * before the failure were kept in memory but are never written.
 */
export class EnumerationAbortedError extends Error {
  constructor(
    public workspaceId: string,
    public retainedRows: number,
    public override cause: QueryFailedError,
  ) {
    super(
      `Enumeration aborted at workspace ${workspaceId} (${retainedRows} rows discarded): ${cause.message}`,
    );
    this.name = "EnumerationAbortedError";
  }
}

export class ConfigValidationError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid report configuration: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

export function isQueryFailedError(err: unknown): err is QueryFailedError {
  return err instanceof QueryFailedError;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
