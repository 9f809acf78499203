import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { ApprovalsController, NotificationsController } from './approvals.controller';
import { ApprovalsService } from './approvals.service';
import { ClockPort } from './domain/ports/clock.port';
import { ApprovalWorkflowDomainService } from './domain/services/approval-workflow.domain.service';
import { DecisionLedgerDomainService } from './domain/services/decision-ledger.domain.service';
import { DelegationManagerDomainService } from './domain/services/delegation-manager.domain.service';
import { DocumentLockService } from './domain/services/document-lock.service';
import { EscalationTrackerDomainService } from './domain/services/escalation-tracker.domain.service';
import { SystemClock } from './infrastructure/clock/system-clock';
import { RelationalApprovalPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { EscalationSchedulerService } from './scheduler/escalation-scheduler.service';

@Module({
  imports: [
    RelationalApprovalPersistenceModule, // ApprovalDocumentRepositoryPort
    AuditModule,
  ],
  providers: [
    {
      provide: ClockPort,
      useClass: SystemClock,
    },
    DocumentLockService,
    DecisionLedgerDomainService,
    DelegationManagerDomainService,
    EscalationTrackerDomainService,
    ApprovalWorkflowDomainService,
    ApprovalsService,
    EscalationSchedulerService,
  ],
  controllers: [ApprovalsController, NotificationsController],
  exports: [ApprovalWorkflowDomainService, ApprovalsService],
})
export class ApprovalsModule {}
