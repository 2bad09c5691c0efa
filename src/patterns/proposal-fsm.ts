/**
 * PatternProposal — a detected candidate waiting for operator confirmation.
 *
 * Pure state: validates transitions and records history, performs no I/O.
 *
 *   pending → persisted   (confirmed)
 *   pending → discarded   (rejected, or superseded by the next detection)
 */
import { InvalidStateTransition } from "../infra/errors.ts";
import { shortId } from "../infra/id.ts";
import { getLogger } from "../infra/logger.ts";
import { ProposalEvent, ProposalState, TERMINAL_STATES } from "./states.ts";
import type { PatternCandidate } from "./types.ts";

const logger = getLogger("pattern_proposal");

export interface ProposalTransition {
  fromState: ProposalState;
  toState: ProposalState;
  event: ProposalEvent;
  timestamp: number;
}

type TransitionKey = `${ProposalState}:${ProposalEvent}`;

const TRANSITION_TABLE = new Map<TransitionKey, ProposalState>([
  [`${ProposalState.PENDING}:${ProposalEvent.CONFIRMED}`, ProposalState.PERSISTED],
  [`${ProposalState.PENDING}:${ProposalEvent.REJECTED}`, ProposalState.DISCARDED],
  [`${ProposalState.PENDING}:${ProposalEvent.SUPERSEDED}`, ProposalState.DISCARDED],
]);

export class PatternProposal {
  readonly id: string;
  readonly candidate: Readonly<PatternCandidate>;
  readonly detectedAt: Date;
  state: ProposalState = ProposalState.PENDING;
  readonly history: ProposalTransition[] = [];

  constructor(candidate: PatternCandidate, detectedAt: Date = new Date(), id: string = shortId()) {
    this.id = id;
    this.candidate = Object.freeze({ ...candidate });
    this.detectedAt = detectedAt;
  }

  get projectType(): string {
    return this.candidate.projectType;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.state);
  }

  canTransition(event: ProposalEvent): boolean {
    return TRANSITION_TABLE.has(`${this.state}:${event}`);
  }

  /** Execute a transition. Returns the new state. Throws on invalid. */
  transition(event: ProposalEvent): ProposalState {
    if (this.isTerminal) {
      throw new InvalidStateTransition(
        `Pattern proposal ${this.id} is in terminal state ${this.state}, cannot process ${event}`,
      );
    }

    const target = TRANSITION_TABLE.get(`${this.state}:${event}`);
    if (target === undefined) {
      throw new InvalidStateTransition(`No transition defined for (${this.state}, ${event})`);
    }

    const fromState = this.state;
    this.history.push({ fromState, toState: target, event, timestamp: Date.now() });
    this.state = target;

    logger.info(
      { proposalId: this.id, projectType: this.projectType, from: fromState, to: target, trigger: event },
      "pattern_proposal_state_changed",
    );
    return target;
  }
}
