export { ReportBuffer } from "./buffer.js";
export { DEFAULT_CONCURRENCY, Enricher, createEnricher } from "./enricher.js";
export type {
  EnricherDependencies,
  EnricherOptions,
  EnrichmentAbort,
  EnrichmentResult,
} from "./enricher.js";
