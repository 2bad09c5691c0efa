/**
 * PatternDetector — turn per-type metric improvements into pattern proposals.
 *
 * Comparison is always between two snapshots of the same project type. A
 * detection that crosses the threshold leaves at most one pending proposal
 * per type; nothing is persisted until the caller confirms it.
 */
import { CrossTypeComparisonError, InvalidStateTransition } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { TRACKED_METRICS, type MetricsSnapshot, type TrackedMetric } from "../metrics/types.ts";
import type { PatternStore } from "./pattern-store.ts";
import { PatternProposal } from "./proposal-fsm.ts";
import { ProposalEvent } from "./states.ts";
import type { Pattern, PatternCandidate } from "./types.ts";

const logger = getLogger("pattern_detector");

export const DEFAULT_THRESHOLD = 0.25;

// Absorbs float noise such as (0.5 - 0.4) / 0.4 = 0.24999999999999994.
const THRESHOLD_EPSILON = 1e-9;

const METRIC_LABELS: Record<TrackedMetric, string> = {
  completionRate: "task completion rate",
  revenuePerUser: "revenue per user",
  totalRevenue: "total revenue",
};

export interface PatternDetectorOptions {
  store: PatternStore;
  /** Minimum fractional improvement, 0.25 = +25%. */
  threshold?: number;
  metrics?: readonly TrackedMetric[];
  now?: () => Date;
}

/** Human-readable summary, e.g. "task completion rate +25%". */
export function describeImprovement(metric: TrackedMetric, improvement: number): string {
  return `${METRIC_LABELS[metric]} +${Math.round(improvement * 100)}%`;
}

export class PatternDetector {
  readonly threshold: number;
  readonly metrics: readonly TrackedMetric[];
  private readonly store: PatternStore;
  private readonly now: () => Date;
  private readonly pendingByType = new Map<string, PatternProposal>();

  constructor(options: PatternDetectorOptions) {
    this.store = options.store;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.metrics = options.metrics ?? TRACKED_METRICS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Compare two snapshots of one project type without touching detector state.
   * Returns the largest tracked improvement at or above the threshold.
   */
  evaluate(previous: MetricsSnapshot, current: MetricsSnapshot): PatternCandidate | null {
    const projectType = requireSameType(previous, current);

    let best: PatternCandidate | null = null;
    for (const metric of this.metrics) {
      const before = previous[metric];
      const after = current[metric];
      // No baseline to measure a relative change against.
      if (before <= 0) continue;

      const improvement = (after - before) / before;
      if (improvement + THRESHOLD_EPSILON < this.threshold) continue;
      if (best && improvement <= best.improvement) continue;

      best = {
        projectType,
        metric,
        previousValue: before,
        currentValue: after,
        improvement,
        description: describeImprovement(metric, improvement),
      };
    }
    return best;
  }

  /**
   * Run one detection cycle for the snapshots' project type. Any proposal
   * still pending for that type is discarded first.
   */
  detect(previous: MetricsSnapshot, current: MetricsSnapshot): PatternProposal | null {
    const candidate = this.evaluate(previous, current);
    const projectType = requireSameType(previous, current);

    const superseded = this.pendingByType.get(projectType);
    if (superseded) {
      superseded.transition(ProposalEvent.SUPERSEDED);
      this.pendingByType.delete(projectType);
    }

    if (!candidate) {
      logger.debug({ projectType }, "no_pattern_detected");
      return null;
    }

    const proposal = new PatternProposal(candidate, this.now());
    this.pendingByType.set(projectType, proposal);
    logger.info(
      {
        projectType,
        metric: candidate.metric,
        improvement: candidate.improvement,
        proposalId: proposal.id,
      },
      "pattern_pending_confirmation",
    );
    return proposal;
  }

  /** Pending proposal for a type, or null. */
  pending(projectType: string): PatternProposal | null {
    return this.pendingByType.get(projectType) ?? null;
  }

  pendingAll(): PatternProposal[] {
    return [...this.pendingByType.values()];
  }

  /**
   * Operator decision on the pending proposal for a type.
   * Accepted proposals are persisted and returned; rejected ones return null.
   */
  async confirm(projectType: string, accepted: boolean): Promise<Pattern | null> {
    const proposal = this.pendingByType.get(projectType);
    if (!proposal) {
      throw new InvalidStateTransition(`No pattern pending confirmation for type "${projectType}"`);
    }
    // Taken out before any await so a second decision cannot reuse it.
    this.pendingByType.delete(projectType);

    if (!accepted) {
      proposal.transition(ProposalEvent.REJECTED);
      return null;
    }

    const pattern: Pattern = {
      ...proposal.candidate,
      id: proposal.id,
      detectedAt: proposal.detectedAt.toISOString(),
      confirmedAt: this.now().toISOString(),
    };
    try {
      await this.store.save(pattern);
    } catch (err) {
      // Still undecided: back in its slot, or superseded if a newer detection took it.
      if (this.pendingByType.has(projectType)) {
        proposal.transition(ProposalEvent.SUPERSEDED);
      } else {
        this.pendingByType.set(projectType, proposal);
      }
      throw err;
    }
    proposal.transition(ProposalEvent.CONFIRMED);
    return pattern;
  }
}

function requireSameType(previous: MetricsSnapshot, current: MetricsSnapshot): string {
  if (previous.projectType === null || current.projectType === null) {
    throw new CrossTypeComparisonError("Pattern detection needs per-type snapshots");
  }
  if (previous.projectType !== current.projectType) {
    throw new CrossTypeComparisonError(
      `Cannot compare "${previous.projectType}" against "${current.projectType}"`,
    );
  }
  return current.projectType;
}
