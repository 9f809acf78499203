import { DocumentStatus } from '../enums/document-status.enum';
import { WorkflowAction } from '../enums/workflow-action.enum';
import {
  DocumentLockedException,
  InvalidTransitionException,
  UnderReviewException,
} from '../errors/approval-workflow.errors';

/**
 * Approval State Machine Utility
 *
 * Valid Transitions:
 * - DRAFT → REVIEW (submit, author)
 * - REVIEW → APPROVED (every required reviewer approved)
 * - REVIEW → REJECTED (any reviewer rejected)
 * - REJECTED → REVIEW (resubmit, author; opens a new cycle)
 *
 * APPROVED is terminal. No other edge exists, including same-state edges.
 */
export class ApprovalStateMachine {
  /**
   * Valid state transitions map
   * Key: from state, Value: array of valid to states
   */
  private static readonly VALID_TRANSITIONS: Map<
    DocumentStatus,
    DocumentStatus[]
  > = new Map([
    [DocumentStatus.DRAFT, [DocumentStatus.REVIEW]],
    [DocumentStatus.REVIEW, [DocumentStatus.APPROVED, DocumentStatus.REJECTED]],
    [DocumentStatus.REJECTED, [DocumentStatus.REVIEW]],
    // APPROVED is terminal (no transitions allowed)
  ]);

  /**
   * Check if a state transition is valid
   *
   * @param fromStatus - Current document status
   * @param toStatus - Target document status
   */
  static isValidTransition(
    fromStatus: DocumentStatus,
    toStatus: DocumentStatus,
  ): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * Validate a state transition and throw if invalid
   *
   * @throws InvalidTransitionException carrying the current status and action
   */
  static validateTransition(
    documentId: string,
    fromStatus: DocumentStatus,
    toStatus: DocumentStatus,
    action: WorkflowAction,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      throw new InvalidTransitionException(documentId, fromStatus, action);
    }
  }

  /**
   * Require the document to be in a given status before an action that does
   * not itself change status (decide, delegate, checkEscalation).
   */
  static assertStatus(
    documentId: string,
    status: DocumentStatus,
    required: DocumentStatus,
    action: WorkflowAction,
  ): void {
    if (status !== required) {
      throw new InvalidTransitionException(documentId, status, action);
    }
  }

  static isTerminal(status: DocumentStatus): boolean {
    return status === DocumentStatus.APPROVED;
  }

  static canEdit(status: DocumentStatus): boolean {
    return status === DocumentStatus.DRAFT;
  }

  /**
   * Content and escalation settings change only in draft. An approved
   * document is locked; one under review waits for its outcome.
   */
  static assertEditable(documentId: string, status: DocumentStatus): void {
    if (this.canEdit(status)) {
      return;
    }
    if (this.isTerminal(status)) {
      throw new DocumentLockedException(documentId);
    }
    if (status === DocumentStatus.REVIEW) {
      throw new UnderReviewException(documentId);
    }
    throw new InvalidTransitionException(documentId, status, WorkflowAction.EDIT);
  }
}
