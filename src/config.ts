/**
 * Report configuration schema (TypeBox), defaults and source merging.
 *
 * Sources are layered defaults → JSON config file → environment → CLI flags,
 * and the merged result is validated once against the schema.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

import { ConfigValidationError, formatErrorMessage } from "./errors.js";
import { MAX_INACTIVITY_DAYS, MIN_INACTIVITY_DAYS } from "./metrics/classifier.js";

/**
 * Regions where Amazon WorkSpaces is offered
 */
export const SUPPORTED_REGIONS = [
  "us-east-1",
  "us-west-2",
  "ca-central-1",
  "sa-east-1",
  "eu-west-1",
  "eu-west-2",
  "eu-central-1",
  "af-south-1",
  "il-central-1",
  "ap-south-1",
  "ap-northeast-1",
  "ap-northeast-2",
  "ap-southeast-1",
  "ap-southeast-2",
  "us-gov-west-1",
  "us-gov-east-1",
] as const;

export type SupportedRegion = (typeof SUPPORTED_REGIONS)[number];

export function isSupportedRegion(region: string): region is SupportedRegion {
  return SUPPORTED_REGIONS.some((supported) => supported === region);
}

export const MAX_CONCURRENCY = 32;

// =============================================================================
// Schema
// =============================================================================

const ldapSchema = Type.Object({
  url: Type.String({
    minLength: 1,
    pattern: "^ldaps?://",
    description: "ldap:// or ldaps:// URL of a domain controller",
  }),
  baseDN: Type.String({ minLength: 1, description: "Search base, e.g. DC=corp,DC=example,DC=com" }),
  bindDN: Type.Optional(Type.String({ description: "Bind identity; anonymous when omitted" })),
  bindPassword: Type.Optional(Type.String()),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
});

const retrySchema = Type.Object({
  attempts: Type.Optional(Type.Integer({ minimum: 1 })),
  minDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
  maxDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
  jitter: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

export const reportConfigSchema = Type.Object({
  region: Type.String({ minLength: 1, description: "WorkSpaces region to report on" }),
  inactivityDays: Type.Integer({
    minimum: MIN_INACTIVITY_DAYS,
    maximum: MAX_INACTIVITY_DAYS,
    description: "Trailing window, in days, without a successful connection",
  }),
  outputPath: Type.Optional(Type.String({ minLength: 1 })),
  failurePolicy: Type.Union([Type.Literal("isolate"), Type.Literal("abort")]),
  includeFailed: Type.Boolean({ description: "Write failed workspaces with the EnrichmentError column set" }),
  concurrency: Type.Integer({ minimum: 1, maximum: MAX_CONCURRENCY }),
  progress: Type.Boolean(),
  logLevel: Type.Union([
    Type.Literal("trace"),
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("fatal"),
  ]),
  ldap: ldapSchema,
  retry: Type.Optional(retrySchema),
});

/** Any layer of configuration: every field optional, LDAP settings included */
export const reportConfigLayerSchema = Type.Partial(
  Type.Object({
    ...reportConfigSchema.properties,
    ldap: Type.Partial(ldapSchema),
  }),
);

export type ReportConfig = Static<typeof reportConfigSchema>;
export type ReportConfigLayer = Static<typeof reportConfigLayerSchema>;

export function getDefaultConfig(): ReportConfigLayer {
  return {
    inactivityDays: 90,
    failurePolicy: "isolate",
    includeFailed: true,
    concurrency: 4,
    progress: true,
    logLevel: "info",
  };
}

// =============================================================================
// Sources
// =============================================================================

export const ENV_LDAP_URL = "WORKSPACES_REPORT_LDAP_URL";
export const ENV_LDAP_BASE_DN = "WORKSPACES_REPORT_LDAP_BASE_DN";
export const ENV_LDAP_BIND_DN = "WORKSPACES_REPORT_LDAP_BIND_DN";
export const ENV_LDAP_BIND_PASSWORD = "WORKSPACES_REPORT_LDAP_BIND_PASSWORD";

const nonEmpty = (value: string | undefined) => (value ? value : undefined);

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ReportConfigLayer {
  return {
    region: nonEmpty(env.AWS_REGION),
    ldap: {
      url: nonEmpty(env[ENV_LDAP_URL]),
      baseDN: nonEmpty(env[ENV_LDAP_BASE_DN]),
      bindDN: nonEmpty(env[ENV_LDAP_BIND_DN]),
      bindPassword: nonEmpty(env[ENV_LDAP_BIND_PASSWORD]),
    },
  };
}

function collectIssues(schema: typeof reportConfigSchema | typeof reportConfigLayerSchema, value: unknown, prefix = ""): string[] {
  const issues: string[] = [];
  for (const error of Errors(schema, value)) {
    issues.push(`${prefix}${error.path || "(root)"}: ${error.message}`);
  }
  return issues;
}

export async function loadConfigFile(path: string): Promise<ReportConfigLayer> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigValidationError([`${path}: ${formatErrorMessage(error)}`]);
  }

  if (Check(reportConfigLayerSchema, parsed)) return parsed;

  const issues = collectIssues(reportConfigLayerSchema, parsed, `${path} `);
  throw new ConfigValidationError(issues.length > 0 ? issues : [`${path}: not a configuration object`]);
}

/**
 * Overlay `layer` on `base`; fields the layer leaves undefined keep the base value
 */
export function mergeConfig(base: ReportConfigLayer, layer: ReportConfigLayer): ReportConfigLayer {
  return {
    region: layer.region ?? base.region,
    inactivityDays: layer.inactivityDays ?? base.inactivityDays,
    outputPath: layer.outputPath ?? base.outputPath,
    failurePolicy: layer.failurePolicy ?? base.failurePolicy,
    includeFailed: layer.includeFailed ?? base.includeFailed,
    concurrency: layer.concurrency ?? base.concurrency,
    progress: layer.progress ?? base.progress,
    logLevel: layer.logLevel ?? base.logLevel,
    ldap: {
      url: layer.ldap?.url ?? base.ldap?.url,
      baseDN: layer.ldap?.baseDN ?? base.ldap?.baseDN,
      bindDN: layer.ldap?.bindDN ?? base.ldap?.bindDN,
      bindPassword: layer.ldap?.bindPassword ?? base.ldap?.bindPassword,
      timeoutMs: layer.ldap?.timeoutMs ?? base.ldap?.timeoutMs,
    },
    retry: layer.retry || base.retry ? { ...base.retry, ...layer.retry } : undefined,
  };
}

// =============================================================================
// Validation
// =============================================================================

export function validateConfig(value: unknown): ReportConfig {
  if (!Check(reportConfigSchema, value)) {
    const issues = collectIssues(reportConfigSchema, value);
    throw new ConfigValidationError(issues.length > 0 ? issues : ["Configuration does not match schema"]);
  }
  if (!isSupportedRegion(value.region)) {
    throw new ConfigValidationError([`/region: WorkSpaces is not available in "${value.region}"`]);
  }
  return value;
}

export type ResolveConfigOptions = {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically the CLI flags */
  overrides?: ReportConfigLayer;
};

export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ReportConfig> {
  let merged = getDefaultConfig();
  if (options.configFile) {
    merged = mergeConfig(merged, await loadConfigFile(options.configFile));
  }
  merged = mergeConfig(merged, configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    merged = mergeConfig(merged, options.overrides);
  }
  return validateConfig(merged);
}
