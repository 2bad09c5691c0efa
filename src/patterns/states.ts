/** Lifecycle states of a pattern proposal. */
export const ProposalState = {
  PENDING: "pending",
  PERSISTED: "persisted",
  DISCARDED: "discarded",
} as const;

export type ProposalState = (typeof ProposalState)[keyof typeof ProposalState];

/** Signals that move a proposal out of PENDING. */
export const ProposalEvent = {
  CONFIRMED: "confirmed",
  REJECTED: "rejected",
  SUPERSEDED: "superseded",
} as const;

export type ProposalEvent = (typeof ProposalEvent)[keyof typeof ProposalEvent];

export const TERMINAL_STATES: ReadonlySet<ProposalState> = new Set([
  ProposalState.PERSISTED,
  ProposalState.DISCARDED,
]);
