/**
 * Pattern detection — per-type metric improvements that need operator confirmation.
 */
export { PatternDetector, DEFAULT_THRESHOLD, describeImprovement } from "./detector.ts";
export type { PatternDetectorOptions } from "./detector.ts";
export { PatternProposal } from "./proposal-fsm.ts";
export type { ProposalTransition } from "./proposal-fsm.ts";
export { ProposalState, ProposalEvent } from "./states.ts";
export { FilePatternStore, PatternSchema } from "./pattern-store.ts";
export type { PatternStore } from "./pattern-store.ts";
export { FileSnapshotStore, MetricsSnapshotSchema } from "./snapshot-store.ts";
export type { Pattern, PatternCandidate } from "./types.ts";
