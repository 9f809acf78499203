import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { ApprovalDocument } from '../../../../domain/entities/approval-document.entity';
import { NotificationEvent } from '../../../../domain/entities/notification-event.entity';
import { DocumentStatus } from '../../../../domain/enums/document-status.enum';
import { ApprovalDocumentRepositoryPort } from '../../../../domain/repositories/approval-document.repository.port';
import {
  ApprovalAggregate,
  ApprovalChangeSet,
} from '../../../../domain/unit-of-work/approval-unit-of-work';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { ApprovalDocumentEntity } from '../entities/approval-document.entity';
import { EscalationRecordEntity } from '../entities/escalation-record.entity';
import { NotificationEventEntity } from '../entities/notification-event.entity';
import { ReviewCycleEntity } from '../entities/review-cycle.entity';
import { ReviewDecisionEntity } from '../entities/review-decision.entity';
import { ReviewDelegationEntity } from '../entities/review-delegation.entity';
import { ReviewerAssignmentEntity } from '../entities/reviewer-assignment.entity';
import {
  ApprovalDocumentMapper,
  DecisionMapper,
  DelegationMapper,
  EscalationRecordMapper,
  NotificationEventMapper,
  ReviewCycleMapper,
  ReviewerAssignmentMapper,
} from '../mappers/approval.mapper';

@Injectable()
export class ApprovalDocumentRelationalRepository
  implements ApprovalDocumentRepositoryPort
{
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(ApprovalDocumentEntity)
    private readonly documentRepository: Repository<ApprovalDocumentEntity>,
    @InjectRepository(NotificationEventEntity)
    private readonly notificationRepository: Repository<NotificationEventEntity>,
  ) {}

  async create(document: ApprovalDocument): Promise<ApprovalDocument> {
    const saved = await this.documentRepository.save(
      ApprovalDocumentMapper.toPersistence(document),
    );
    return ApprovalDocumentMapper.toDomain(saved);
  }

  /**
   * Reads every table inside one REPEATABLE READ transaction, so a commit
   * landing between the queries cannot mix two versions of the document.
   */
  async loadAggregate(
    documentId: string,
  ): Promise<NullableType<ApprovalAggregate>> {
    return this.dataSource.transaction('REPEATABLE READ', async (manager) => {
      const document = await manager.findOne(ApprovalDocumentEntity, {
        where: { id: documentId },
      });
      if (!document) {
        return null;
      }

      const cycles = await manager.find(ReviewCycleEntity, {
        where: { documentId },
        order: { cycleNumber: 'ASC' },
      });
      const cycleIds = cycles.map((cycle) => cycle.id);

      // Never-submitted drafts have no cycles to query
      let assignments: ReviewerAssignmentEntity[] = [];
      let decisions: ReviewDecisionEntity[] = [];
      if (cycleIds.length > 0) {
        assignments = await manager.find(ReviewerAssignmentEntity, {
          where: { cycleId: In(cycleIds) },
          order: { assignedAt: 'ASC', escalationDepth: 'ASC' },
        });
        decisions = await manager.find(ReviewDecisionEntity, {
          where: { cycleId: In(cycleIds) },
          order: { decidedAt: 'ASC' },
        });
      }

      const delegations = await manager.find(ReviewDelegationEntity, {
        where: { documentId },
        order: { createdAt: 'ASC' },
      });
      const escalations = await manager.find(EscalationRecordEntity, {
        where: { documentId },
        order: { triggeredAt: 'ASC', depth: 'ASC' },
      });

      return {
        document: ApprovalDocumentMapper.toDomain(document),
        cycles: cycles.map((entity) => ReviewCycleMapper.toDomain(entity)),
        assignments: ReviewerAssignmentMapper.inAssignmentOrder(
          cycles,
          assignments,
        ).map((entity) => ReviewerAssignmentMapper.toDomain(entity)),
        decisions: decisions.map((entity) => DecisionMapper.toDomain(entity)),
        delegations: delegations.map((entity) =>
          DelegationMapper.toDomain(entity),
        ),
        escalations: escalations.map((entity) =>
          EscalationRecordMapper.toDomain(entity),
        ),
      };
    });
  }

  /**
   * Writes the change set in one transaction. Decisions, assignments and
   * escalation records are insert-only; the unique constraints on
   * (cycle_id, reviewer_id) reject a duplicate even across processes.
   */
  async commit(changeSet: ApprovalChangeSet): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      if (changeSet.document) {
        await manager.save(
          ApprovalDocumentMapper.toPersistence(changeSet.document),
        );
      }

      for (const cycle of changeSet.createdCycles) {
        await manager.insert(
          ReviewCycleEntity,
          ReviewCycleMapper.toPersistence(cycle),
        );
      }
      for (const cycle of changeSet.updatedCycles) {
        await manager.update(ReviewCycleEntity, cycle.id, {
          outcome: cycle.outcome,
          closedAt: cycle.closedAt,
        });
      }

      for (const assignment of changeSet.createdAssignments) {
        await manager.insert(
          ReviewerAssignmentEntity,
          ReviewerAssignmentMapper.toPersistence(assignment),
        );
      }
      for (const decision of changeSet.createdDecisions) {
        await manager.insert(
          ReviewDecisionEntity,
          DecisionMapper.toPersistence(decision),
        );
      }

      for (const delegation of changeSet.createdDelegations) {
        await manager.insert(
          ReviewDelegationEntity,
          DelegationMapper.toPersistence(delegation),
        );
      }
      for (const delegation of changeSet.updatedDelegations) {
        await manager.update(ReviewDelegationEntity, delegation.id, {
          revoked: delegation.revoked,
          revokedAt: delegation.revokedAt,
        });
      }

      for (const record of changeSet.createdEscalations) {
        await manager.insert(
          EscalationRecordEntity,
          EscalationRecordMapper.toPersistence(record),
        );
      }
      for (const notification of changeSet.notifications) {
        await manager.insert(
          NotificationEventEntity,
          NotificationEventMapper.toPersistence(notification),
        );
      }
    });
  }

  async findIdsByStatus(status: DocumentStatus): Promise<string[]> {
    const entities = await this.documentRepository.find({
      select: { id: true },
      where: { status },
      order: { updatedAt: 'ASC' },
    });
    return entities.map((entity) => entity.id);
  }

  async findNotifications(
    recipientId: string,
    documentId?: string,
  ): Promise<NotificationEvent[]> {
    const entities = await this.notificationRepository.find({
      where: documentId ? { recipientId, documentId } : { recipientId },
      order: { createdAt: 'DESC' },
    });
    return entities.map((entity) => NotificationEventMapper.toDomain(entity));
  }
}
