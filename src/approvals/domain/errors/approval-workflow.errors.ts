import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { DocumentStatus } from '../enums/document-status.enum';
import { DecisionVerdict } from '../enums/decision-verdict.enum';
import { WorkflowAction } from '../enums/workflow-action.enum';

/**
 * Approval workflow error taxonomy
 *
 * Every error is a deterministic function of the document's state and the
 * caller's input. Each kind extends the @nestjs/common HTTP exception the
 * request layer answers with:
 * - 409: InvalidTransition, DocumentLocked, UnderReview, DuplicateDecision,
 *   DecisionImmutable, AlreadyDelegated
 * - 400: MissingReviewers, SelfApproval, DecisionRequiresReason,
 *   InvalidDelegation, InvalidEscalationLadder, InvalidEscalationTimeout
 * - 403: NotAReviewer, NotAnAssignedReviewer, RedelegationNotAllowed,
 *   DelegationExpired, NotDocumentAuthor
 * - 404: DocumentNotFound
 *
 * The response body is { statusCode, code, message, ...context }.
 */
export enum ApprovalErrorCode {
  INVALID_TRANSITION = 'InvalidTransition',
  DOCUMENT_LOCKED = 'DocumentLocked',
  UNDER_REVIEW = 'UnderReview',
  MISSING_REVIEWERS = 'MissingReviewers',
  NOT_A_REVIEWER = 'NotAReviewer',
  SELF_APPROVAL = 'SelfApproval',
  DUPLICATE_DECISION = 'DuplicateDecision',
  DECISION_IMMUTABLE = 'DecisionImmutable',
  DECISION_REQUIRES_REASON = 'DecisionRequiresReason',
  NOT_AN_ASSIGNED_REVIEWER = 'NotAnAssignedReviewer',
  ALREADY_DELEGATED = 'AlreadyDelegated',
  REDELEGATION_NOT_ALLOWED = 'RedelegationNotAllowed',
  DELEGATION_EXPIRED = 'DelegationExpired',
  DOCUMENT_NOT_FOUND = 'DocumentNotFound',
  NOT_DOCUMENT_AUTHOR = 'NotDocumentAuthor',
  INVALID_DELEGATION = 'InvalidDelegation',
  INVALID_ESCALATION_LADDER = 'InvalidEscalationLadder',
  INVALID_ESCALATION_TIMEOUT = 'InvalidEscalationTimeout',
}

export type ApprovalErrorContext = {
  documentId: string;
  status?: DocumentStatus;
  action?: WorkflowAction;
  field?: string;
  reviewerId?: string;
  actorId?: string;
  cycleId?: string;
  verdict?: DecisionVerdict;
  existingVerdict?: DecisionVerdict;
  delegatorId?: string;
  substituteId?: string;
  expiresAt?: string;
};

export interface ApprovalWorkflowError {
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;
}

function buildErrorBody(
  statusCode: HttpStatus,
  code: ApprovalErrorCode,
  message: string,
  context: ApprovalErrorContext,
) {
  return { statusCode, code, message, ...context };
}

export function isApprovalWorkflowError(
  error: unknown,
): error is HttpException & ApprovalWorkflowError {
  return (
    error instanceof HttpException &&
    'code' in error &&
    'context' in error &&
    Object.values<string>(ApprovalErrorCode).includes(String(error.code))
  );
}

export class InvalidTransitionException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, status: DocumentStatus, action: WorkflowAction) {
    const context: ApprovalErrorContext = { documentId, status, action };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.INVALID_TRANSITION,
        `Cannot ${action} document ${documentId}: current status is '${status}'`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.INVALID_TRANSITION;
    this.context = context;
  }
}

export class DocumentLockedException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string) {
    const context: ApprovalErrorContext = {
      documentId,
      status: DocumentStatus.APPROVED,
      action: WorkflowAction.EDIT,
    };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.DOCUMENT_LOCKED,
        `Document ${documentId} is approved and locked against edits`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.DOCUMENT_LOCKED;
    this.context = context;
  }
}

export class UnderReviewException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string) {
    const context: ApprovalErrorContext = {
      documentId,
      status: DocumentStatus.REVIEW,
      action: WorkflowAction.EDIT,
    };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.UNDER_REVIEW,
        `Document ${documentId} is under review and cannot be edited`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.UNDER_REVIEW;
    this.context = context;
  }
}

export class MissingReviewersException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string) {
    const context: ApprovalErrorContext = { documentId, field: 'reviewerIds' };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.MISSING_REVIEWERS,
        'At least one reviewer is required',
        context,
      ),
    );
    this.code = ApprovalErrorCode.MISSING_REVIEWERS;
    this.context = context;
  }
}

export class NotAReviewerException
  extends ForbiddenException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, actorId: string, cycleId: string) {
    const context: ApprovalErrorContext = { documentId, actorId, cycleId };
    super(
      buildErrorBody(
        HttpStatus.FORBIDDEN,
        ApprovalErrorCode.NOT_A_REVIEWER,
        `User '${actorId}' is not an assigned reviewer or active substitute for document ${documentId}`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.NOT_A_REVIEWER;
    this.context = context;
  }
}

export class SelfApprovalException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, actorId: string, field: string) {
    const context: ApprovalErrorContext = { documentId, actorId, field };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.SELF_APPROVAL,
        `User '${actorId}' authored document ${documentId} and cannot review it`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.SELF_APPROVAL;
    this.context = context;
  }
}

export class DuplicateDecisionException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(
    documentId: string,
    cycleId: string,
    reviewerId: string,
    verdict: DecisionVerdict,
  ) {
    const context: ApprovalErrorContext = {
      documentId,
      cycleId,
      reviewerId,
      verdict,
    };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.DUPLICATE_DECISION,
        `Reviewer '${reviewerId}' has already recorded '${verdict}' in this review cycle`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.DUPLICATE_DECISION;
    this.context = context;
  }
}

export class DecisionImmutableException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(
    documentId: string,
    cycleId: string,
    reviewerId: string,
    existingVerdict: DecisionVerdict,
    verdict?: DecisionVerdict,
  ) {
    const context: ApprovalErrorContext = {
      documentId,
      cycleId,
      reviewerId,
      existingVerdict,
      verdict,
    };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.DECISION_IMMUTABLE,
        `Reviewer '${reviewerId}' already decided '${existingVerdict}'; decisions cannot be changed`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.DECISION_IMMUTABLE;
    this.context = context;
  }
}

export class DecisionRequiresReasonException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, reviewerId: string) {
    const context: ApprovalErrorContext = {
      documentId,
      reviewerId,
      field: 'reason',
    };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.DECISION_REQUIRES_REASON,
        'A reason is required when rejecting a document',
        context,
      ),
    );
    this.code = ApprovalErrorCode.DECISION_REQUIRES_REASON;
    this.context = context;
  }
}

export class NotAnAssignedReviewerException
  extends ForbiddenException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, delegatorId: string) {
    const context: ApprovalErrorContext = { documentId, delegatorId };
    super(
      buildErrorBody(
        HttpStatus.FORBIDDEN,
        ApprovalErrorCode.NOT_AN_ASSIGNED_REVIEWER,
        `User '${delegatorId}' is not assigned to the current review cycle of document ${documentId}`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.NOT_AN_ASSIGNED_REVIEWER;
    this.context = context;
  }
}

export class AlreadyDelegatedException
  extends ConflictException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, delegatorId: string, substituteId: string) {
    const context: ApprovalErrorContext = {
      documentId,
      delegatorId,
      substituteId,
    };
    super(
      buildErrorBody(
        HttpStatus.CONFLICT,
        ApprovalErrorCode.ALREADY_DELEGATED,
        `Reviewer '${delegatorId}' already has an active delegation to '${substituteId}'. Revoke it first.`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.ALREADY_DELEGATED;
    this.context = context;
  }
}

export class RedelegationNotAllowedException
  extends ForbiddenException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, delegatorId: string) {
    const context: ApprovalErrorContext = { documentId, delegatorId };
    super(
      buildErrorBody(
        HttpStatus.FORBIDDEN,
        ApprovalErrorCode.REDELEGATION_NOT_ALLOWED,
        `User '${delegatorId}' is acting as a substitute and cannot delegate further`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.REDELEGATION_NOT_ALLOWED;
    this.context = context;
  }
}

export class DelegationExpiredException
  extends ForbiddenException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(
    documentId: string,
    delegatorId: string,
    substituteId: string,
    expiresAt: Date,
  ) {
    const context: ApprovalErrorContext = {
      documentId,
      delegatorId,
      substituteId,
      expiresAt: expiresAt.toISOString(),
    };
    super(
      buildErrorBody(
        HttpStatus.FORBIDDEN,
        ApprovalErrorCode.DELEGATION_EXPIRED,
        `Delegation from '${delegatorId}' to '${substituteId}' expired at ${expiresAt.toISOString()}`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.DELEGATION_EXPIRED;
    this.context = context;
  }
}

export class DocumentNotFoundException
  extends NotFoundException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string) {
    const context: ApprovalErrorContext = { documentId };
    super(
      buildErrorBody(
        HttpStatus.NOT_FOUND,
        ApprovalErrorCode.DOCUMENT_NOT_FOUND,
        `Document ${documentId} not found`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.DOCUMENT_NOT_FOUND;
    this.context = context;
  }
}

export class NotDocumentAuthorException
  extends ForbiddenException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, actorId: string, action: WorkflowAction) {
    const context: ApprovalErrorContext = { documentId, actorId, action };
    super(
      buildErrorBody(
        HttpStatus.FORBIDDEN,
        ApprovalErrorCode.NOT_DOCUMENT_AUTHOR,
        `Only the author can ${action} document ${documentId}`,
        context,
      ),
    );
    this.code = ApprovalErrorCode.NOT_DOCUMENT_AUTHOR;
    this.context = context;
  }
}

export class InvalidDelegationException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, field: string, message: string) {
    const context: ApprovalErrorContext = { documentId, field };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.INVALID_DELEGATION,
        message,
        context,
      ),
    );
    this.code = ApprovalErrorCode.INVALID_DELEGATION;
    this.context = context;
  }
}

export class InvalidEscalationLadderException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string, message: string) {
    const context: ApprovalErrorContext = {
      documentId,
      field: 'escalationLadder',
    };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.INVALID_ESCALATION_LADDER,
        message,
        context,
      ),
    );
    this.code = ApprovalErrorCode.INVALID_ESCALATION_LADDER;
    this.context = context;
  }
}

export class InvalidEscalationTimeoutException
  extends BadRequestException
  implements ApprovalWorkflowError
{
  readonly code: ApprovalErrorCode;
  readonly context: ApprovalErrorContext;

  constructor(documentId: string) {
    const context: ApprovalErrorContext = {
      documentId,
      field: 'escalationTimeoutHours',
    };
    super(
      buildErrorBody(
        HttpStatus.BAD_REQUEST,
        ApprovalErrorCode.INVALID_ESCALATION_TIMEOUT,
        'escalationTimeoutHours must be a non-negative number',
        context,
      ),
    );
    this.code = ApprovalErrorCode.INVALID_ESCALATION_TIMEOUT;
    this.context = context;
  }
}
