import { ApprovalDocument } from '../../src/approvals/domain/entities/approval-document.entity';
import { Decision } from '../../src/approvals/domain/entities/decision.entity';
import { Delegation } from '../../src/approvals/domain/entities/delegation.entity';
import { ReviewCycle } from '../../src/approvals/domain/entities/review-cycle.entity';
import { ReviewerAssignment } from '../../src/approvals/domain/entities/reviewer-assignment.entity';
import { CycleOutcome } from '../../src/approvals/domain/enums/cycle-outcome.enum';
import { DecisionVerdict } from '../../src/approvals/domain/enums/decision-verdict.enum';
import { DocumentStatus } from '../../src/approvals/domain/enums/document-status.enum';
import { ApprovalUnitOfWork } from '../../src/approvals/domain/unit-of-work/approval-unit-of-work';
import { AUTHOR_ID, TEST_START } from './approval-testing';

export const DOCUMENT_ID = 'doc-1';
export const CYCLE_ID = 'cycle-1';

export interface ReviewFixture {
  uow: ApprovalUnitOfWork;
  cycle: ReviewCycle;
}

/**
 * A document in review with one open cycle, assembled without going through
 * the workflow
 */
export function reviewFixture(
  options: {
    reviewerIds?: string[];
    document?: Partial<ApprovalDocument>;
    decisions?: Decision[];
    delegations?: Delegation[];
  } = {},
): ReviewFixture {
  const reviewerIds = options.reviewerIds ?? ['reviewer-1', 'reviewer-2'];
  const cycle: ReviewCycle = {
    id: CYCLE_ID,
    documentId: DOCUMENT_ID,
    cycleNumber: 1,
    reviewerIds,
    outcome: CycleOutcome.PENDING,
    createdAt: TEST_START,
    closedAt: null,
  };
  const document: ApprovalDocument = {
    id: DOCUMENT_ID,
    authorId: AUTHOR_ID,
    title: 'Quarterly budget',
    body: 'Spend plan for Q2',
    status: DocumentStatus.REVIEW,
    currentCycleId: CYCLE_ID,
    escalationTimeoutHours: null,
    escalationLadder: [],
    escalationDepth: 0,
    createdAt: TEST_START,
    updatedAt: TEST_START,
    ...options.document,
  };

  const uow = new ApprovalUnitOfWork({
    document,
    cycles: [cycle],
    assignments: reviewerIds.map((reviewerId) => assignment(reviewerId)),
    decisions: options.decisions ?? [],
    delegations: options.delegations ?? [],
    escalations: [],
  });

  return { uow, cycle };
}

export function assignment(
  reviewerId: string,
  overrides: Partial<ReviewerAssignment> = {},
): ReviewerAssignment {
  return {
    id: `assignment-${reviewerId}`,
    cycleId: CYCLE_ID,
    reviewerId,
    assignedAt: TEST_START,
    escalated: false,
    escalationDepth: 0,
    ...overrides,
  };
}

export function decision(
  reviewerId: string,
  verdict: DecisionVerdict,
  overrides: Partial<Decision> = {},
): Decision {
  return {
    id: `decision-${reviewerId}`,
    cycleId: CYCLE_ID,
    reviewerId,
    actingActorId: reviewerId,
    verdict,
    reason: verdict === DecisionVerdict.REJECT ? 'Needs work' : null,
    decidedAt: TEST_START,
    ...overrides,
  };
}

export function delegation(
  delegatorId: string,
  substituteId: string,
  expiresAt: Date,
  overrides: Partial<Delegation> = {},
): Delegation {
  return {
    id: `delegation-${delegatorId}-${substituteId}`,
    documentId: DOCUMENT_ID,
    cycleId: CYCLE_ID,
    delegatorId,
    substituteId,
    expiresAt,
    revoked: false,
    revokedAt: null,
    createdAt: TEST_START,
    ...overrides,
  };
}
