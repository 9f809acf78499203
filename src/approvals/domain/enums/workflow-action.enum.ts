/**
 * Operations that act on a document. Carried by InvalidTransition errors
 * so callers can say which action was refused.
 */
export enum WorkflowAction {
  SUBMIT = 'submit',
  EDIT = 'edit',
  DECIDE = 'decide',
  RESUBMIT = 'resubmit',
  CHECK_ESCALATION = 'checkEscalation',
  DELEGATE = 'delegate',
  REVOKE_DELEGATION = 'revokeDelegation',
}
