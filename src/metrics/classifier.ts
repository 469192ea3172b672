/**
 * Metric Activity Classifier
 *
 * Decides whether a workspace was used within a trailing window from the
 * CloudWatch ConnectionSuccess metric. Samples are requested at one per day
 * with the Maximum statistic: CloudWatch coarsens older data (one-hour
 * points are kept 455 days), and finer periods over long windows come back
 * silently empty instead of failing.
 */

import { CloudWatchClient, GetMetricStatisticsCommand, type Datapoint } from "@aws-sdk/client-cloudwatch";

import { MetricsQueryFailedError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type ReportLogger } from "../logging/index.js";
import { withAWSRetry } from "../retry.js";
import type {
  ActivityClassifier,
  ActivityVerdict,
  ActivityWindow,
  MetricActivityClassifierConfig,
} from "./types.js";

export const WORKSPACES_METRIC_NAMESPACE = "AWS/WorkSpaces";
export const CONNECTION_SUCCESS_METRIC = "ConnectionSuccess";

export const SECONDS_PER_DAY = 86_400;
const MS_PER_DAY = SECONDS_PER_DAY * 1000;

export const MIN_INACTIVITY_DAYS = 1;
export const MAX_INACTIVITY_DAYS = 999;

/** Beyond this many days CloudWatch no longer holds hourly data */
export const RETENTION_ADVISORY_DAYS = 455;

/**
 * Build the window [now - inactivityDays, now]
 */
export function createActivityWindow(inactivityDays: number, now: Date = new Date()): ActivityWindow {
  if (
    !Number.isInteger(inactivityDays) ||
    inactivityDays < MIN_INACTIVITY_DAYS ||
    inactivityDays > MAX_INACTIVITY_DAYS
  ) {
    throw new RangeError(
      `Inactivity days must be an integer between ${MIN_INACTIVITY_DAYS} and ${MAX_INACTIVITY_DAYS}, got ${inactivityDays}`,
    );
  }

  return {
    start: new Date(now.getTime() - inactivityDays * MS_PER_DAY),
    end: new Date(now.getTime()),
    periodSeconds: SECONDS_PER_DAY,
  };
}

export function needsRetentionAdvisory(inactivityDays: number): boolean {
  return inactivityDays >= RETENTION_ADVISORY_DAYS;
}

/**
 * Reduce daily maxima to a verdict. Any day with a maximum of at least one
 * successful connection means the workspace was used.
 */
export function classifySamples(dailyMaxima: readonly number[], window: ActivityWindow): ActivityVerdict {
  if (dailyMaxima.length === 0) {
    return { unused: true, sampleCount: 0, window };
  }
  const peak = Math.max(...dailyMaxima);
  return { unused: peak < 1, peak, sampleCount: dailyMaxima.length, window };
}

export function createMetricActivityClassifier(config: MetricActivityClassifierConfig): MetricActivityClassifier {
  return new MetricActivityClassifier(config);
}

export class MetricActivityClassifier implements ActivityClassifier {
  private config: MetricActivityClassifierConfig;
  private client: CloudWatchClient;
  private logger: ReportLogger;

  constructor(config: MetricActivityClassifierConfig) {
    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    this.client = new CloudWatchClient({ region: config.region });
  }

  close(): void {
    this.client.destroy();
  }

  async classify(workspaceId: string, window: ActivityWindow): Promise<ActivityVerdict> {
    let datapoints: Datapoint[];
    try {
      const response = await withAWSRetry(
        () => this.client.send(new GetMetricStatisticsCommand({
          Namespace: WORKSPACES_METRIC_NAMESPACE,
          MetricName: CONNECTION_SUCCESS_METRIC,
          Dimensions: [{ Name: "WorkspaceId", Value: workspaceId }],
          StartTime: window.start,
          EndTime: window.end,
          Period: window.periodSeconds,
          Statistics: ["Maximum"],
        })),
        { retry: this.config.retry, label: "GetMetricStatistics", logger: this.logger },
      );
      datapoints = response.Datapoints ?? [];
    } catch (error) {
      throw new MetricsQueryFailedError(workspaceId, formatErrorMessage(error), { cause: error });
    }

    const maxima = datapoints
      .map((point) => point.Maximum)
      .filter((value): value is number => typeof value === "number");

    const verdict = classifySamples(maxima, window);
    this.logger.trace(`Classified ${workspaceId}`, {
      samples: verdict.sampleCount,
      peak: verdict.peak,
      unused: verdict.unused,
    });
    return verdict;
  }
}
