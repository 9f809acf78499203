import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Decision } from '../entities/decision.entity';
import { ReviewCycle } from '../entities/review-cycle.entity';
import { ReviewerAssignment } from '../entities/reviewer-assignment.entity';
import { CycleOutcome } from '../enums/cycle-outcome.enum';
import { DecisionVerdict } from '../enums/decision-verdict.enum';
import {
  DecisionImmutableException,
  DecisionRequiresReasonException,
  DuplicateDecisionException,
} from '../errors/approval-workflow.errors';
import { ApprovalUnitOfWork } from '../unit-of-work/approval-unit-of-work';

/**
 * Outcome of a cycle from its full decision set.
 *
 * Any reject wins, whatever order the decisions arrived in. Approval needs
 * an approve from every assigned reviewer, escalated ones included. A cycle
 * with no assignments stays pending.
 */
export function computeCycleOutcome(
  assignments: ReviewerAssignment[],
  decisions: Decision[],
): CycleOutcome {
  if (decisions.some((decision) => decision.verdict === DecisionVerdict.REJECT)) {
    return CycleOutcome.REJECTED;
  }
  if (assignments.length === 0) {
    return CycleOutcome.PENDING;
  }

  const approved = new Set(
    decisions
      .filter((decision) => decision.verdict === DecisionVerdict.APPROVE)
      .map((decision) => decision.reviewerId),
  );
  return assignments.every((assignment) => approved.has(assignment.reviewerId))
    ? CycleOutcome.APPROVED
    : CycleOutcome.PENDING;
}

/**
 * Decision Ledger Domain Service
 *
 * Write-once record of reviewer verdicts, one per (cycle, reviewer). The
 * ledger never updates or removes a decision.
 */
@Injectable()
export class DecisionLedgerDomainService {
  /**
   * Fails when the reviewer already has a decision in the cycle:
   * DuplicateDecision for the same verdict, DecisionImmutable otherwise.
   * Without a verdict (e.g. before delegating) any existing decision is
   * reported as immutable.
   */
  assertNotRecorded(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    reviewerId: string,
    verdict?: DecisionVerdict,
  ): void {
    const existing = this.findDecision(uow, cycle, reviewerId);
    if (!existing) {
      return;
    }
    if (verdict !== undefined && existing.verdict === verdict) {
      throw new DuplicateDecisionException(
        uow.document.id,
        cycle.id,
        reviewerId,
        verdict,
      );
    }
    throw new DecisionImmutableException(
      uow.document.id,
      cycle.id,
      reviewerId,
      existing.verdict,
      verdict,
    );
  }

  record(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    reviewerId: string,
    actingActorId: string,
    verdict: DecisionVerdict,
    reason: string | undefined,
    now: Date,
  ): Decision {
    this.assertNotRecorded(uow, cycle, reviewerId, verdict);

    const trimmedReason = reason?.trim() ?? '';
    if (verdict === DecisionVerdict.REJECT && trimmedReason.length === 0) {
      throw new DecisionRequiresReasonException(uow.document.id, reviewerId);
    }

    const decision: Decision = {
      id: randomUUID(),
      cycleId: cycle.id,
      reviewerId,
      actingActorId,
      verdict,
      reason: trimmedReason.length > 0 ? trimmedReason : null,
      decidedAt: now,
    };
    uow.addDecision(decision);

    return decision;
  }

  findDecision(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    reviewerId: string,
  ): Decision | null {
    return (
      uow
        .decisionsFor(cycle.id)
        .find((decision) => decision.reviewerId === reviewerId) ?? null
    );
  }

  outcome(uow: ApprovalUnitOfWork, cycle: ReviewCycle): CycleOutcome {
    return computeCycleOutcome(
      uow.assignmentsFor(cycle.id),
      uow.decisionsFor(cycle.id),
    );
  }

  /**
   * Assigned reviewers without a decision, in assignment order
   */
  pendingReviewers(uow: ApprovalUnitOfWork, cycle: ReviewCycle): string[] {
    const decided = new Set(
      uow.decisionsFor(cycle.id).map((decision) => decision.reviewerId),
    );
    return uow
      .assignmentsFor(cycle.id)
      .map((assignment) => assignment.reviewerId)
      .filter((reviewerId) => !decided.has(reviewerId));
  }
}
