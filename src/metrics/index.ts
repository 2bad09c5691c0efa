export { computeMetrics, computeMetricsByType, sumRevenue } from "./aggregator.ts";
export type { AggregateOptions } from "./aggregator.ts";
export { TRACKED_METRICS, UNASSIGNED_AGENT } from "./types.ts";
export type { MetricsSnapshot, TrackedMetric } from "./types.ts";
