import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { ApprovalDocument } from '../entities/approval-document.entity';
import { EscalationRecord } from '../entities/escalation-record.entity';
import { ReviewCycle } from '../entities/review-cycle.entity';
import { ReviewerAssignment } from '../entities/reviewer-assignment.entity';
import { EscalationSkipReason } from '../enums/escalation-skip-reason.enum';
import { ApprovalUnitOfWork } from '../unit-of-work/approval-unit-of-work';
import { DecisionLedgerDomainService } from './decision-ledger.domain.service';

const MS_PER_HOUR = 60 * 60 * 1000;

export type EscalationEvaluation =
  | {
      escalated: true;
      record: EscalationRecord;
      assignment: ReviewerAssignment | null; // null when the target was already assigned
    }
  | {
      escalated: false;
      reason: EscalationSkipReason;
      overdueReviewerIds: string[];
    };

/**
 * Escalation Tracker Domain Service
 *
 * Measures how long each pending reviewer has been waiting and, once the
 * document's timeout has elapsed for at least one of them, adds the next
 * approver from the escalation ladder to the cycle.
 *
 * A reviewer's clock starts at their assignment and restarts every time an
 * escalation fires because of them. At most one escalation fires per
 * evaluation and per instant, and never beyond the configured maximum depth.
 */
@Injectable()
export class EscalationTrackerDomainService {
  private readonly logger = new Logger(EscalationTrackerDomainService.name);

  constructor(
    private readonly configService: ConfigService<AllConfigType>,
    private readonly ledger: DecisionLedgerDomainService,
  ) {}

  /**
   * The document's own timeout; 0 is a real value, only null falls back
   */
  effectiveTimeoutHours(document: ApprovalDocument): number {
    return (
      document.escalationTimeoutHours ??
      this.configService.getOrThrow('approvals.defaultEscalationTimeoutHours', {
        infer: true,
      })
    );
  }

  maxDepth(): number {
    return this.configService.getOrThrow('approvals.maxEscalationDepth', {
      infer: true,
    });
  }

  evaluate(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    now: Date,
  ): EscalationEvaluation {
    const document = uow.document;
    const pending = this.ledger.pendingReviewers(uow, cycle);
    if (pending.length === 0) {
      return this.skip(EscalationSkipReason.NO_PENDING_REVIEWERS, []);
    }

    // One escalation per instant: the baselines it reset start counting
    // only once the clock has moved past it
    if (this.escalatedAtOrAfter(uow, cycle, now)) {
      return this.skip(EscalationSkipReason.NOT_DUE, []);
    }

    const timeoutHours = this.effectiveTimeoutHours(document);
    const overdue = pending.filter(
      (reviewerId) =>
        now.getTime() - this.baselineFor(uow, cycle, reviewerId).getTime() >=
        timeoutHours * MS_PER_HOUR,
    );
    if (overdue.length === 0) {
      return this.skip(EscalationSkipReason.NOT_DUE, []);
    }

    const depth = document.escalationDepth;
    const maxDepth = this.maxDepth();
    if (depth >= maxDepth) {
      this.logger.warn(
        `Document ${document.id} reached max escalation depth ${maxDepth}; ${overdue.length} reviewer(s) still overdue`,
      );
      return this.skip(EscalationSkipReason.MAX_DEPTH_REACHED, overdue);
    }

    const targetId = document.escalationLadder[depth];
    if (targetId === undefined) {
      this.logger.warn(
        `Document ${document.id} has no escalation ladder entry for depth ${depth + 1}`,
      );
      return this.skip(EscalationSkipReason.NO_ESCALATION_TARGET, overdue);
    }

    const nextDepth = depth + 1;
    const alreadyAssigned = uow
      .assignmentsFor(cycle.id)
      .some((assignment) => assignment.reviewerId === targetId);

    let assignment: ReviewerAssignment | null = null;
    if (!alreadyAssigned) {
      assignment = {
        id: randomUUID(),
        cycleId: cycle.id,
        reviewerId: targetId,
        assignedAt: now,
        escalated: true,
        escalationDepth: nextDepth,
      };
      uow.addAssignment(assignment);
    }

    const record: EscalationRecord = {
      id: randomUUID(),
      documentId: document.id,
      cycleId: cycle.id,
      depth: nextDepth,
      escalatedToId: targetId,
      escalatedFromIds: overdue,
      triggeredAt: now,
      timeoutHours,
    };
    uow.addEscalation(record);
    uow.updateDocument({ escalationDepth: nextDepth }, now);

    return { escalated: true, record, assignment };
  }

  /**
   * Later of the reviewer's assignment and the last escalation they caused
   */
  baselineFor(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    reviewerId: string,
  ): Date {
    const assignment = uow
      .assignmentsFor(cycle.id)
      .find((candidate) => candidate.reviewerId === reviewerId);
    let baseline = assignment ? assignment.assignedAt : cycle.createdAt;

    for (const record of uow.escalationsFor(cycle.id)) {
      if (
        record.escalatedFromIds.includes(reviewerId) &&
        record.triggeredAt.getTime() > baseline.getTime()
      ) {
        baseline = record.triggeredAt;
      }
    }
    return baseline;
  }

  private escalatedAtOrAfter(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    now: Date,
  ): boolean {
    return uow
      .escalationsFor(cycle.id)
      .some((record) => record.triggeredAt.getTime() >= now.getTime());
  }

  private skip(
    reason: EscalationSkipReason,
    overdueReviewerIds: string[],
  ): EscalationEvaluation {
    return { escalated: false, reason, overdueReviewerIds };
  }
}
