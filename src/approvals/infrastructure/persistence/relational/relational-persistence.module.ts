import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ApprovalDocumentRepositoryPort } from '../../../domain/repositories/approval-document.repository.port';
import { ApprovalDocumentEntity } from './entities/approval-document.entity';
import { EscalationRecordEntity } from './entities/escalation-record.entity';
import { NotificationEventEntity } from './entities/notification-event.entity';
import { ReviewCycleEntity } from './entities/review-cycle.entity';
import { ReviewDecisionEntity } from './entities/review-decision.entity';
import { ReviewDelegationEntity } from './entities/review-delegation.entity';
import { ReviewerAssignmentEntity } from './entities/reviewer-assignment.entity';
import { ApprovalDocumentRelationalRepository } from './repositories/approval-document.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      ApprovalDocumentEntity,
      ReviewCycleEntity,
      ReviewerAssignmentEntity,
      ReviewDecisionEntity,
      ReviewDelegationEntity,
      EscalationRecordEntity,
      NotificationEventEntity,
    ]),
  ],
  providers: [
    ApprovalDocumentRelationalRepository,
    {
      provide: ApprovalDocumentRepositoryPort,
      useClass: ApprovalDocumentRelationalRepository,
    },
  ],
  exports: [TypeOrmModule, ApprovalDocumentRepositoryPort],
})
export class RelationalApprovalPersistenceModule {}
