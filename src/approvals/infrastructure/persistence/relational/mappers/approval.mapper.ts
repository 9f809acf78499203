import { ApprovalDocument } from '../../../../domain/entities/approval-document.entity';
import { Decision } from '../../../../domain/entities/decision.entity';
import { Delegation } from '../../../../domain/entities/delegation.entity';
import { EscalationRecord } from '../../../../domain/entities/escalation-record.entity';
import { NotificationEvent } from '../../../../domain/entities/notification-event.entity';
import { ReviewCycle } from '../../../../domain/entities/review-cycle.entity';
import { ReviewerAssignment } from '../../../../domain/entities/reviewer-assignment.entity';
import { ApprovalDocumentEntity } from '../entities/approval-document.entity';
import { EscalationRecordEntity } from '../entities/escalation-record.entity';
import { NotificationEventEntity } from '../entities/notification-event.entity';
import { ReviewCycleEntity } from '../entities/review-cycle.entity';
import { ReviewDecisionEntity } from '../entities/review-decision.entity';
import { ReviewDelegationEntity } from '../entities/review-delegation.entity';
import { ReviewerAssignmentEntity } from '../entities/reviewer-assignment.entity';

export class ApprovalDocumentMapper {
  static toDomain(entity: ApprovalDocumentEntity): ApprovalDocument {
    return {
      id: entity.id,
      authorId: entity.authorId,
      title: entity.title,
      body: entity.body,
      status: entity.status,
      currentCycleId: entity.currentCycleId ?? null,
      escalationTimeoutHours:
        entity.escalationTimeoutHours === null
          ? null
          : Number(entity.escalationTimeoutHours),
      escalationLadder: entity.escalationLadder ?? [],
      escalationDepth: entity.escalationDepth,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: ApprovalDocument): ApprovalDocumentEntity {
    const entity = new ApprovalDocumentEntity();
    entity.id = domain.id;
    entity.authorId = domain.authorId;
    entity.title = domain.title;
    entity.body = domain.body;
    entity.status = domain.status;
    entity.currentCycleId = domain.currentCycleId;
    entity.escalationTimeoutHours = domain.escalationTimeoutHours;
    entity.escalationLadder = [...domain.escalationLadder];
    entity.escalationDepth = domain.escalationDepth;
    entity.createdAt = domain.createdAt;
    entity.updatedAt = domain.updatedAt;
    return entity;
  }
}

export class ReviewCycleMapper {
  static toDomain(entity: ReviewCycleEntity): ReviewCycle {
    return {
      id: entity.id,
      documentId: entity.documentId,
      cycleNumber: entity.cycleNumber,
      reviewerIds: entity.reviewerIds ?? [],
      outcome: entity.outcome,
      createdAt: entity.createdAt,
      closedAt: entity.closedAt ?? null,
    };
  }

  static toPersistence(domain: ReviewCycle): ReviewCycleEntity {
    const entity = new ReviewCycleEntity();
    entity.id = domain.id;
    entity.documentId = domain.documentId;
    entity.cycleNumber = domain.cycleNumber;
    entity.reviewerIds = [...domain.reviewerIds];
    entity.outcome = domain.outcome;
    entity.createdAt = domain.createdAt;
    entity.closedAt = domain.closedAt;
    return entity;
  }
}

export class ReviewerAssignmentMapper {
  static toDomain(entity: ReviewerAssignmentEntity): ReviewerAssignment {
    return {
      id: entity.id,
      cycleId: entity.cycleId,
      reviewerId: entity.reviewerId,
      assignedAt: entity.assignedAt,
      escalated: entity.escalated,
      escalationDepth: entity.escalationDepth,
    };
  }

  static toPersistence(domain: ReviewerAssignment): ReviewerAssignmentEntity {
    const entity = new ReviewerAssignmentEntity();
    entity.id = domain.id;
    entity.cycleId = domain.cycleId;
    entity.reviewerId = domain.reviewerId;
    entity.assignedAt = domain.assignedAt;
    entity.escalated = domain.escalated;
    entity.escalationDepth = domain.escalationDepth;
    return entity;
  }

  /**
   * Reviewers assigned at cycle start share one timestamp, so their order
   * comes from the cycle's reviewer list; escalated reviewers follow by depth.
   */
  static inAssignmentOrder(
    cycles: ReviewCycleEntity[],
    assignments: ReviewerAssignmentEntity[],
  ): ReviewerAssignmentEntity[] {
    const reviewerOrder = new Map<string, string[]>();
    for (const cycle of cycles) {
      reviewerOrder.set(cycle.id, cycle.reviewerIds ?? []);
    }
    const rank = (assignment: ReviewerAssignmentEntity): number => {
      const index = (reviewerOrder.get(assignment.cycleId) ?? []).indexOf(
        assignment.reviewerId,
      );
      return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };

    return [...assignments].sort(
      (a, b) =>
        a.escalationDepth - b.escalationDepth ||
        rank(a) - rank(b) ||
        a.assignedAt.getTime() - b.assignedAt.getTime(),
    );
  }
}

export class DecisionMapper {
  static toDomain(entity: ReviewDecisionEntity): Decision {
    return {
      id: entity.id,
      cycleId: entity.cycleId,
      reviewerId: entity.reviewerId,
      actingActorId: entity.actingActorId,
      verdict: entity.verdict,
      reason: entity.reason ?? null,
      decidedAt: entity.decidedAt,
    };
  }

  static toPersistence(domain: Decision): ReviewDecisionEntity {
    const entity = new ReviewDecisionEntity();
    entity.id = domain.id;
    entity.cycleId = domain.cycleId;
    entity.reviewerId = domain.reviewerId;
    entity.actingActorId = domain.actingActorId;
    entity.verdict = domain.verdict;
    entity.reason = domain.reason;
    entity.decidedAt = domain.decidedAt;
    return entity;
  }
}

export class DelegationMapper {
  static toDomain(entity: ReviewDelegationEntity): Delegation {
    return {
      id: entity.id,
      documentId: entity.documentId,
      cycleId: entity.cycleId,
      delegatorId: entity.delegatorId,
      substituteId: entity.substituteId,
      expiresAt: entity.expiresAt,
      revoked: entity.revoked,
      revokedAt: entity.revokedAt ?? null,
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(domain: Delegation): ReviewDelegationEntity {
    const entity = new ReviewDelegationEntity();
    entity.id = domain.id;
    entity.documentId = domain.documentId;
    entity.cycleId = domain.cycleId;
    entity.delegatorId = domain.delegatorId;
    entity.substituteId = domain.substituteId;
    entity.expiresAt = domain.expiresAt;
    entity.revoked = domain.revoked;
    entity.revokedAt = domain.revokedAt;
    entity.createdAt = domain.createdAt;
    return entity;
  }
}

export class EscalationRecordMapper {
  static toDomain(entity: EscalationRecordEntity): EscalationRecord {
    return {
      id: entity.id,
      documentId: entity.documentId,
      cycleId: entity.cycleId,
      depth: entity.depth,
      escalatedToId: entity.escalatedToId,
      escalatedFromIds: entity.escalatedFromIds ?? [],
      triggeredAt: entity.triggeredAt,
      timeoutHours: Number(entity.timeoutHours),
    };
  }

  static toPersistence(domain: EscalationRecord): EscalationRecordEntity {
    const entity = new EscalationRecordEntity();
    entity.id = domain.id;
    entity.documentId = domain.documentId;
    entity.cycleId = domain.cycleId;
    entity.depth = domain.depth;
    entity.escalatedToId = domain.escalatedToId;
    entity.escalatedFromIds = [...domain.escalatedFromIds];
    entity.triggeredAt = domain.triggeredAt;
    entity.timeoutHours = domain.timeoutHours;
    return entity;
  }
}

export class NotificationEventMapper {
  static toDomain(entity: NotificationEventEntity): NotificationEvent {
    return {
      id: entity.id,
      documentId: entity.documentId,
      recipientId: entity.recipientId,
      type: entity.type,
      cycleId: entity.cycleId ?? null,
      message: entity.message,
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(domain: NotificationEvent): NotificationEventEntity {
    const entity = new NotificationEventEntity();
    entity.id = domain.id;
    entity.documentId = domain.documentId;
    entity.recipientId = domain.recipientId;
    entity.type = domain.type;
    entity.cycleId = domain.cycleId;
    entity.message = domain.message;
    entity.createdAt = domain.createdAt;
    return entity;
  }
}
