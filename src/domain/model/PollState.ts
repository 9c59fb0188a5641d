export const PollState = {
  SUBMITTED: 'SUBMITTED',
  POLLING: 'POLLING',
  READY: 'READY',
  FAILED: 'FAILED',
  TIMED_OUT: 'TIMED_OUT',
} as const;

export type PollState = (typeof PollState)[keyof typeof PollState];

const VALID_TRANSITIONS: Record<PollState, readonly PollState[]> = {
  [PollState.SUBMITTED]: [PollState.POLLING],
  [PollState.POLLING]: [PollState.POLLING, PollState.READY, PollState.FAILED, PollState.TIMED_OUT],
  [PollState.READY]: [],
  [PollState.FAILED]: [],
  [PollState.TIMED_OUT]: [],
};

export function canTransition(from: PollState, to: PollState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: PollState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}
