export {
  MetricActivityClassifier,
  createMetricActivityClassifier,
  createActivityWindow,
  classifySamples,
  needsRetentionAdvisory,
  CONNECTION_SUCCESS_METRIC,
  WORKSPACES_METRIC_NAMESPACE,
  MAX_INACTIVITY_DAYS,
  MIN_INACTIVITY_DAYS,
  RETENTION_ADVISORY_DAYS,
  SECONDS_PER_DAY,
} from "./classifier.js";
export type {
  ActivityClassifier,
  ActivityVerdict,
  ActivityWindow,
  MetricActivityClassifierConfig,
} from "./types.js";
