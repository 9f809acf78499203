/**
 * Time source for the workflow. Delegation expiry and escalation timeouts
 * are evaluated against this clock, never against the wall clock directly.
 */
export abstract class ClockPort {
  abstract now(): Date;
}
