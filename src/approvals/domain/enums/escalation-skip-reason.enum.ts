export enum EscalationSkipReason {
  NOT_DUE = 'not_due',
  MAX_DEPTH_REACHED = 'max_depth_reached',
  NO_PENDING_REVIEWERS = 'no_pending_reviewers',
  NO_ESCALATION_TARGET = 'no_escalation_target',
}
