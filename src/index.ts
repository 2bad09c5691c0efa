export { ManifestStore, parseRevenue, validateManifest } from "./manifests/index.ts";
export type { Project, Task, Diagnostic, StoreSnapshot } from "./manifests/index.ts";
export { computeMetrics, computeMetricsByType } from "./metrics/index.ts";
export type { MetricsSnapshot, TrackedMetric } from "./metrics/index.ts";
export {
  PatternDetector,
  PatternProposal,
  ProposalState,
  FilePatternStore,
  FileSnapshotStore,
} from "./patterns/index.ts";
export type { Pattern, PatternCandidate, PatternStore } from "./patterns/index.ts";
export { formatStatusReport, formatDiagnostics, formatMoney } from "./report/format.ts";
export { getSettings, getLogger } from "./infra/index.ts";
export type { Settings } from "./infra/index.ts";
