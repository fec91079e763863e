export enum TrialStatus {
  NOT_DONE = 'not_done',
  IN_PROGRESS = 'in_progress',
  DONE = 'done',
}

// Enforced. No way back out of DONE.
export const TRIAL_TRANSITIONS: Record<TrialStatus, TrialStatus[]> = {
  [TrialStatus.NOT_DONE]:    [TrialStatus.IN_PROGRESS],
  [TrialStatus.IN_PROGRESS]: [TrialStatus.DONE],
  [TrialStatus.DONE]:        [],
};

export enum SessionPhase {
  INERT = 'inert',
  INITIALISED = 'initialised',
  ENDING = 'ending',
}

export const SESSION_TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  [SessionPhase.INERT]:       [SessionPhase.INITIALISED],
  [SessionPhase.INITIALISED]: [SessionPhase.ENDING],
  [SessionPhase.ENDING]:      [SessionPhase.INERT],  // back to a reusable session
};
