import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Delegation, DelegationState } from '../entities/delegation.entity';
import { ReviewCycle } from '../entities/review-cycle.entity';
import {
  AlreadyDelegatedException,
  DelegationExpiredException,
  InvalidDelegationException,
  NotAReviewerException,
  NotAnAssignedReviewerException,
  RedelegationNotAllowedException,
  SelfApprovalException,
} from '../errors/approval-workflow.errors';
import { ApprovalUnitOfWork } from '../unit-of-work/approval-unit-of-work';
import { DecisionLedgerDomainService } from './decision-ledger.domain.service';

export interface DelegationGrant {
  delegatorId: string;
  substituteId: string;
  expiresAt: Date;
}

/**
 * Delegation Manager Domain Service
 *
 * Time-bound, one-hop substitute authority. A delegation belongs to the
 * document and the cycle it was granted in; it lapses at expiresAt without
 * any write, and a substitute can never pass the authority on.
 *
 * Rules:
 * - Only a reviewer assigned to the current cycle may delegate
 * - At most one active delegation per delegator
 * - An active substitute cannot delegate (no chains)
 * - The substitute cannot be the delegator or the document's author
 * - A reviewer who already decided has nothing left to delegate
 */
@Injectable()
export class DelegationManagerDomainService {
  constructor(private readonly ledger: DecisionLedgerDomainService) {}

  delegate(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    grant: DelegationGrant,
    now: Date,
  ): Delegation {
    const documentId = uow.document.id;
    const { delegatorId, substituteId, expiresAt } = grant;

    // No chains: an active substitute cannot hand the authority on
    const actingAsSubstitute = uow
      .delegationsFor(cycle.id)
      .some(
        (delegation) =>
          delegation.substituteId === delegatorId &&
          this.isActive(delegation, now),
      );
    if (actingAsSubstitute) {
      throw new RedelegationNotAllowedException(documentId, delegatorId);
    }

    const assigned = uow
      .assignmentsFor(cycle.id)
      .some((assignment) => assignment.reviewerId === delegatorId);
    if (!assigned) {
      throw new NotAnAssignedReviewerException(documentId, delegatorId);
    }

    const existing = this.findActiveDelegation(uow, cycle, delegatorId, now);
    if (existing) {
      throw new AlreadyDelegatedException(
        documentId,
        delegatorId,
        existing.substituteId,
      );
    }

    if (substituteId === delegatorId) {
      throw new InvalidDelegationException(
        documentId,
        'substituteId',
        'A reviewer cannot delegate to themselves',
      );
    }
    if (expiresAt.getTime() <= now.getTime()) {
      throw new InvalidDelegationException(
        documentId,
        'expiresAt',
        'Delegation expiry must be in the future',
      );
    }
    if (substituteId === uow.document.authorId) {
      throw new SelfApprovalException(documentId, substituteId, 'substituteId');
    }

    this.ledger.assertNotRecorded(uow, cycle, delegatorId);

    const delegation: Delegation = {
      id: randomUUID(),
      documentId,
      cycleId: cycle.id,
      delegatorId,
      substituteId,
      expiresAt,
      revoked: false,
      revokedAt: null,
      createdAt: now,
    };
    uow.addDelegation(delegation);

    return delegation;
  }

  /**
   * Revoke the delegator's active delegation, if any. Calling it again, or
   * with nothing to revoke, changes nothing and returns null.
   */
  revoke(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle | null,
    delegatorId: string,
    now: Date,
  ): Delegation | null {
    if (!cycle) {
      return null;
    }
    const active = this.findActiveDelegation(uow, cycle, delegatorId, now);
    if (!active) {
      return null;
    }
    return uow.updateDelegation(active.id, { revoked: true, revokedAt: now });
  }

  /**
   * Substitute currently acting for the reviewer in the given cycle, or null.
   * Expiry is evaluated against `now`, never stored.
   */
  resolveActiveSubstitution(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    reviewerId: string,
    now: Date,
  ): string | null {
    return (
      this.findActiveDelegation(uow, cycle, reviewerId, now)?.substituteId ??
      null
    );
  }

  /**
   * Whose obligation a decision by `actingActorId` satisfies.
   *
   * A directly assigned reviewer always acts for themselves. A substitute
   * acts for `onBehalfOf` when given, otherwise for the first delegator (in
   * assignment order) who has not decided yet.
   *
   * @throws DelegationExpiredException when the actor's delegation lapsed
   * @throws NotAReviewerException when the actor holds no authority at all
   */
  resolveEffectiveReviewer(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    actingActorId: string,
    now: Date,
    onBehalfOf?: string,
  ): string {
    const assignedIds = uow
      .assignmentsFor(cycle.id)
      .map((assignment) => assignment.reviewerId);

    if (onBehalfOf === undefined || onBehalfOf === actingActorId) {
      if (assignedIds.includes(actingActorId)) {
        return actingActorId;
      }
    }

    const candidates = uow
      .delegationsFor(cycle.id)
      .filter(
        (delegation) =>
          delegation.substituteId === actingActorId &&
          !delegation.revoked &&
          assignedIds.includes(delegation.delegatorId) &&
          (onBehalfOf === undefined ||
            onBehalfOf === actingActorId ||
            delegation.delegatorId === onBehalfOf),
      );

    const active = candidates.filter((delegation) =>
      this.isActive(delegation, now),
    );
    if (active.length > 0) {
      const byAssignmentOrder = [...active].sort(
        (a, b) =>
          assignedIds.indexOf(a.delegatorId) - assignedIds.indexOf(b.delegatorId),
      );
      const open = byAssignmentOrder.find(
        (delegation) =>
          this.ledger.findDecision(uow, cycle, delegation.delegatorId) === null,
      );
      return (open ?? byAssignmentOrder[0]).delegatorId;
    }

    const lapsed = candidates
      .filter((delegation) => delegation.expiresAt.getTime() <= now.getTime())
      .sort((a, b) => b.expiresAt.getTime() - a.expiresAt.getTime());
    if (lapsed.length > 0) {
      throw new DelegationExpiredException(
        uow.document.id,
        lapsed[0].delegatorId,
        actingActorId,
        lapsed[0].expiresAt,
      );
    }

    throw new NotAReviewerException(uow.document.id, actingActorId, cycle.id);
  }

  isActive(delegation: Delegation, now: Date): boolean {
    return !delegation.revoked && delegation.expiresAt.getTime() > now.getTime();
  }

  describe(delegation: Delegation, now: Date): DelegationState {
    if (delegation.revoked) {
      return 'revoked';
    }
    return this.isActive(delegation, now) ? 'active' : 'expired';
  }

  private findActiveDelegation(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    delegatorId: string,
    now: Date,
  ): Delegation | null {
    return (
      uow
        .delegationsFor(cycle.id)
        .find(
          (delegation) =>
            delegation.delegatorId === delegatorId &&
            this.isActive(delegation, now),
        ) ?? null
    );
  }
}
