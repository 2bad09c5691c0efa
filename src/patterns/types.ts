/** Types for pattern detection. */
import type { TrackedMetric } from "../metrics/types.ts";

/** A metric improvement large enough to propose as a pattern. */
export interface PatternCandidate {
  projectType: string;
  metric: TrackedMetric;
  previousValue: number;
  currentValue: number;
  /** Fractional change, 0.25 = +25%. */
  improvement: number;
  description: string;
}

/** A confirmed, persisted pattern. Never updated or deleted. */
export interface Pattern extends PatternCandidate {
  id: string;
  detectedAt: string;
  confirmedAt: string;
}
