/**
 * WorkSpaces usage report
 */

export * from "./errors.js";
export * from "./types.js";
export * from "./config.js";
export * from "./retry.js";
export * from "./progress.js";
export * from "./logging/index.js";
export * from "./workspaces/index.js";
export * from "./metrics/index.js";
export * from "./network/index.js";
export * from "./directory/index.js";
export * from "./enrichment/index.js";
export { assembleReport, compareOrdinal, compareRows } from "./report/assembler.js";
export type { AssembleOptions, AssembledReport } from "./report/assembler.js";
export { CSV_HEADERS, csvEscape, defaultOutputPath, formatTags, toCsv, toCsvLine, writeCsvReport } from "./report/csv.js";
export { createAwsCollaborators, runReport } from "./report/pipeline.js";
export type { ReportCollaborators, ReportSink, ReportSummary, RunReportOptions } from "./report/pipeline.js";
export { createReportCli, overridesFromOptions } from "./cli/report-cli.js";
