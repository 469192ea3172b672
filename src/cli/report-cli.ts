/**
 * WorkSpaces Report CLI Commands
 */

import { InvalidArgumentError, type Command } from "commander";

import { MAX_CONCURRENCY, SUPPORTED_REGIONS, resolveConfig, type ReportConfigLayer } from "../config.js";
import { formatErrorMessage } from "../errors.js";
import { createReportLogger, isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/index.js";
import { MAX_INACTIVITY_DAYS, MIN_INACTIVITY_DAYS } from "../metrics/index.js";
import { runReport, type ReportSummary, type RunReportOptions } from "../report/pipeline.js";
import type { FailurePolicy } from "../types.js";

export type ReportCommandOptions = {
  region: string;
  days?: number;
  output?: string;
  failurePolicy?: FailurePolicy;
  omitFailed?: boolean;
  concurrency?: number;
  ldapUrl?: string;
  ldapBaseDn?: string;
  config?: string;
  logLevel?: LogLevel;
  progress: boolean;
};

export type ReportCliDeps = {
  run?: (options: RunReportOptions) => Promise<ReportSummary>;
  env?: NodeJS.ProcessEnv;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseFailurePolicy(value: string): FailurePolicy {
  if (value === "isolate" || value === "abort") return value;
  throw new InvalidArgumentError("Expected isolate or abort.");
}

function parseLogLevel(value: string): LogLevel {
  if (isLogLevel(value)) return value;
  throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}.`);
}

/**
 * CLI flags as the highest-precedence configuration layer
 */
export function overridesFromOptions(opts: ReportCommandOptions): ReportConfigLayer {
  return {
    region: opts.region,
    inactivityDays: opts.days,
    outputPath: opts.output,
    failurePolicy: opts.failurePolicy,
    includeFailed: opts.omitFailed ? false : undefined,
    concurrency: opts.concurrency,
    // Only an explicit --no-progress overrides the config file
    progress: opts.progress ? undefined : false,
    logLevel: opts.logLevel,
    ldap: { url: opts.ldapUrl, baseDN: opts.ldapBaseDn },
  };
}

export function createReportCli(deps: ReportCliDeps = {}) {
  const run = deps.run ?? runReport;

  return (program: Command) => {
    program
      .command("report")
      .description("Write a CSV of WorkSpaces usage and ownership for one region")
      .requiredOption("--region <region>", `Region: ${SUPPORTED_REGIONS.join(", ")}`)
      .option(
        "--days <n>",
        `Days without a connection before a workspace counts as unused (${MIN_INACTIVITY_DAYS}-${MAX_INACTIVITY_DAYS}, default 90)`,
        parseInteger,
      )
      .option("--output <path>", "CSV file to write (default reports/workspaces-<region>-<yyyyMMdd>.csv)")
      .option("--failure-policy <policy>", "isolate: mark failed workspaces; abort: stop at the first failure", parseFailurePolicy)
      .option("--omit-failed", "Leave workspaces whose enrichment failed out of the report")
      .option("--concurrency <n>", `Workspaces enriched in parallel (1-${MAX_CONCURRENCY}, default 4)`, parseInteger)
      .option("--ldap-url <url>", "Directory controller, e.g. ldaps://dc01.corp.example.com")
      .option("--ldap-base-dn <dn>", "Directory search base")
      .option("--config <file>", "JSON configuration file, overridden by flags")
      .option("--log-level <level>", `Log level: ${LOG_LEVELS.join(", ")}`, parseLogLevel)
      .option("--no-progress", "Do not draw progress on stderr")
      .action(async (opts: ReportCommandOptions) => {
        try {
          const config = await resolveConfig({
            configFile: opts.config,
            env: deps.env ?? process.env,
            overrides: overridesFromOptions(opts),
          });
          const logger = createReportLogger("report", {
            level: config.logLevel,
            secrets: config.ldap.bindPassword ? [config.ldap.bindPassword] : [],
          });

          const summary = await run({ config, logger });

          console.log(`\nWorkSpaces report for ${config.region}`);
          console.log(`  Rows: ${summary.rows} | Unused: ${summary.unused} | Failed: ${summary.failed}`);
          console.log(`  Written to ${summary.outputPath}`);
        } catch (error) {
          const name = error instanceof Error ? error.name : "Error";
          console.error(`${name}: ${formatErrorMessage(error)}`);
          process.exitCode = 1;
        }
      });
  };
}
