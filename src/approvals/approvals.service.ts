import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { ApprovalDocument } from './domain/entities/approval-document.entity';
import { Decision } from './domain/entities/decision.entity';
import { EscalationRecord } from './domain/entities/escalation-record.entity';
import { NotificationEvent } from './domain/entities/notification-event.entity';
import {
  ApprovalWorkflowDomainService,
  CycleHistory,
  DelegationView,
} from './domain/services/approval-workflow.domain.service';
import { ApprovalDocumentResponseDto } from './dto/approval-document-response.dto';
import { CreateApprovalDocumentDto } from './dto/create-approval-document.dto';
import { CreateDelegationDto } from './dto/create-delegation.dto';
import { DecideResponseDto } from './dto/decide-response.dto';
import { DecisionResponseDto } from './dto/decision-response.dto';
import { DelegationResponseDto } from './dto/delegation-response.dto';
import { EscalationCheckResponseDto } from './dto/escalation-check-response.dto';
import { EscalationRecordResponseDto } from './dto/escalation-record-response.dto';
import { NotificationResponseDto } from './dto/notification-response.dto';
import { RecordDecisionDto } from './dto/record-decision.dto';
import {
  ReviewCycleHistoryDto,
  ReviewerAssignmentResponseDto,
} from './dto/review-cycle-history.dto';
import { UpdateApprovalDocumentDto } from './dto/update-approval-document.dto';

/**
 * Approvals Service (Application Layer)
 *
 * Thin facade over ApprovalWorkflowDomainService that maps domain objects
 * to response DTOs. Workflow rules live in the domain services.
 */
@Injectable()
export class ApprovalsService {
  constructor(private readonly workflow: ApprovalWorkflowDomainService) {}

  async create(
    dto: CreateApprovalDocumentDto,
    actorId: string,
  ): Promise<ApprovalDocumentResponseDto> {
    const document = await this.workflow.create(actorId, dto);
    return this.toDocumentDto(document, []);
  }

  async findOne(documentId: string): Promise<ApprovalDocumentResponseDto> {
    const view = await this.workflow.getDocument(documentId);
    return this.toDocumentDto(view.document, view.pendingReviewerIds);
  }

  async update(
    documentId: string,
    dto: UpdateApprovalDocumentDto,
    actorId: string,
  ): Promise<ApprovalDocumentResponseDto> {
    await this.workflow.edit(documentId, dto, actorId);
    return this.findOne(documentId);
  }

  async submit(
    documentId: string,
    reviewerIds: string[],
    actorId: string,
  ): Promise<ApprovalDocumentResponseDto> {
    await this.workflow.submit(documentId, reviewerIds, actorId);
    return this.findOne(documentId);
  }

  async resubmit(
    documentId: string,
    actorId: string,
  ): Promise<ApprovalDocumentResponseDto> {
    await this.workflow.resubmit(documentId, actorId);
    return this.findOne(documentId);
  }

  async decide(
    documentId: string,
    dto: RecordDecisionDto,
    actorId: string,
  ): Promise<DecideResponseDto> {
    const result = await this.workflow.decide(
      documentId,
      actorId,
      dto.verdict,
      dto.reason,
      { onBehalfOf: dto.onBehalfOf },
    );
    const view = await this.workflow.getDocument(documentId);

    return {
      document: this.toDocumentDto(view.document, view.pendingReviewerIds),
      decision: this.toDecisionDto(result.decision),
      outcome: result.outcome,
    };
  }

  async getHistory(documentId: string): Promise<ReviewCycleHistoryDto[]> {
    const history = await this.workflow.getHistory(documentId);
    const delegations = await this.workflow.listDelegations(documentId);
    const stateById = new Map(
      delegations.map((view): [string, DelegationView] => [
        view.delegation.id,
        view,
      ]),
    );

    return history.map((entry) =>
      this.toHistoryDto(entry, (id) => stateById.get(id)),
    );
  }

  async delegate(
    documentId: string,
    dto: CreateDelegationDto,
    actorId: string,
  ): Promise<DelegationResponseDto> {
    const delegation = await this.workflow.delegate(
      documentId,
      actorId,
      dto.substituteId,
      dto.expiresAt,
    );
    return this.toDelegationDto({ delegation, state: 'active' });
  }

  async revoke(documentId: string, actorId: string): Promise<void> {
    await this.workflow.revoke(documentId, actorId);
  }

  async listDelegations(documentId: string): Promise<DelegationResponseDto[]> {
    const delegations = await this.workflow.listDelegations(documentId);
    return delegations.map((view) => this.toDelegationDto(view));
  }

  async checkEscalation(
    documentId: string,
  ): Promise<EscalationCheckResponseDto> {
    const result = await this.workflow.checkEscalation(documentId);
    return {
      escalated: result.escalated,
      record: result.record ? this.toEscalationDto(result.record) : null,
      reason: result.reason,
    };
  }

  async listNotifications(
    recipientId: string,
    documentId?: string,
  ): Promise<NotificationResponseDto[]> {
    const notifications = await this.workflow.listNotifications(
      recipientId,
      documentId,
    );
    return notifications.map((notification) =>
      this.toNotificationDto(notification),
    );
  }

  private toDocumentDto(
    document: ApprovalDocument,
    pendingReviewerIds: string[],
  ): ApprovalDocumentResponseDto {
    const dto = plainToClass(ApprovalDocumentResponseDto, document, {
      excludeExtraneousValues: true,
    });
    return {
      ...dto,
      currentCycleId: document.currentCycleId,
      escalationTimeoutHours: document.escalationTimeoutHours,
      escalationLadder: [...document.escalationLadder],
      pendingReviewerIds,
    };
  }

  private toDecisionDto(decision: Decision): DecisionResponseDto {
    const dto = plainToClass(DecisionResponseDto, decision, {
      excludeExtraneousValues: true,
    });
    return { ...dto, reason: decision.reason };
  }

  private toDelegationDto(view: DelegationView): DelegationResponseDto {
    const dto = plainToClass(DelegationResponseDto, view.delegation, {
      excludeExtraneousValues: true,
    });
    return { ...dto, revokedAt: view.delegation.revokedAt, state: view.state };
  }

  private toEscalationDto(record: EscalationRecord): EscalationRecordResponseDto {
    const dto = plainToClass(EscalationRecordResponseDto, record, {
      excludeExtraneousValues: true,
    });
    return { ...dto, escalatedFromIds: [...record.escalatedFromIds] };
  }

  private toNotificationDto(
    notification: NotificationEvent,
  ): NotificationResponseDto {
    const dto = plainToClass(NotificationResponseDto, notification, {
      excludeExtraneousValues: true,
    });
    return { ...dto, cycleId: notification.cycleId };
  }

  private toHistoryDto(
    entry: CycleHistory,
    findDelegation: (id: string) => DelegationView | undefined,
  ): ReviewCycleHistoryDto {
    return {
      id: entry.cycle.id,
      cycleNumber: entry.cycle.cycleNumber,
      reviewerIds: [...entry.cycle.reviewerIds],
      outcome: entry.cycle.outcome,
      createdAt: entry.cycle.createdAt,
      closedAt: entry.cycle.closedAt,
      assignments: entry.assignments.map((assignment) =>
        plainToClass(ReviewerAssignmentResponseDto, assignment, {
          excludeExtraneousValues: true,
        }),
      ),
      decisions: entry.decisions.map((decision) => this.toDecisionDto(decision)),
      escalations: entry.escalations.map((record) =>
        this.toEscalationDto(record),
      ),
      delegations: entry.delegations.map((delegation) =>
        this.toDelegationDto(
          findDelegation(delegation.id) ?? {
            delegation,
            state: delegation.revoked ? 'revoked' : 'expired',
          },
        ),
      ),
    };
  }
}
