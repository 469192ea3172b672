/**
 * Activity Classification Types
 */

import type { ReportLogger } from "../logging/index.js";
import type { RetryConfig } from "../retry.js";

/**
 * Trailing range over which usage is evaluated. One sample per day.
 */
export type ActivityWindow = {
  start: Date;
  end: Date;
  periodSeconds: number;
};

/**
 * Result of classifying one workspace over one window
 */
export type ActivityVerdict = {
  /** True when no successful connection was recorded in the window */
  unused: boolean;
  /** Greatest daily maximum, undefined when the window had no samples */
  peak?: number;
  sampleCount: number;
  window: ActivityWindow;
};

export interface ActivityClassifier {
  classify(workspaceId: string, window: ActivityWindow): Promise<ActivityVerdict>;
}

export type MetricActivityClassifierConfig = {
  region: string;
  retry?: RetryConfig;
  logger?: ReportLogger;
};
