import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  AuditService,
  WorkflowEventData,
  WorkflowEventType,
} from '../../../audit/audit.service';
import { ApprovalDocument } from '../entities/approval-document.entity';
import { Decision } from '../entities/decision.entity';
import { Delegation, DelegationState } from '../entities/delegation.entity';
import { EscalationRecord } from '../entities/escalation-record.entity';
import { NotificationEvent } from '../entities/notification-event.entity';
import { ReviewCycle } from '../entities/review-cycle.entity';
import { ReviewerAssignment } from '../entities/reviewer-assignment.entity';
import { CycleOutcome } from '../enums/cycle-outcome.enum';
import { DecisionVerdict } from '../enums/decision-verdict.enum';
import { DocumentStatus } from '../enums/document-status.enum';
import { EscalationSkipReason } from '../enums/escalation-skip-reason.enum';
import { NotificationType } from '../enums/notification-type.enum';
import { WorkflowAction } from '../enums/workflow-action.enum';
import {
  DocumentNotFoundException,
  InvalidEscalationLadderException,
  InvalidEscalationTimeoutException,
  InvalidTransitionException,
  isApprovalWorkflowError,
  MissingReviewersException,
  NotDocumentAuthorException,
  SelfApprovalException,
} from '../errors/approval-workflow.errors';
import { ClockPort } from '../ports/clock.port';
import { ApprovalDocumentRepositoryPort } from '../repositories/approval-document.repository.port';
import { ApprovalUnitOfWork } from '../unit-of-work/approval-unit-of-work';
import { ApprovalStateMachine } from '../utils/approval-state-machine.util';
import { DecisionLedgerDomainService } from './decision-ledger.domain.service';
import { DelegationManagerDomainService } from './delegation-manager.domain.service';
import { DocumentLockService } from './document-lock.service';
import { EscalationTrackerDomainService } from './escalation-tracker.domain.service';

export interface DocumentContent {
  title: string;
  body: string;
  escalationTimeoutHours?: number | null;
  escalationLadder?: string[];
}

export type DocumentContentPatch = Partial<DocumentContent>;

export interface DecideOptions {
  onBehalfOf?: string; // Delegator a substitute is deciding for
}

export interface DecideResult {
  document: ApprovalDocument;
  decision: Decision;
  outcome: CycleOutcome;
}

export interface EscalationCheckResult {
  escalated: boolean;
  record: EscalationRecord | null;
  reason: EscalationSkipReason | null;
}

export interface DocumentView {
  document: ApprovalDocument;
  currentCycle: ReviewCycle | null;
  pendingReviewerIds: string[];
}

export interface CycleHistory {
  cycle: ReviewCycle;
  assignments: ReviewerAssignment[];
  decisions: Decision[];
  escalations: EscalationRecord[];
  delegations: Delegation[];
}

export interface DelegationView {
  delegation: Delegation;
  state: DelegationState;
}

// Who attempted what; a refused attempt is audited under this event
interface WorkflowAttempt {
  actorId: string;
  event: WorkflowEventType;
}

type WorkflowStep<T> = (
  uow: ApprovalUnitOfWork,
  now: Date,
  audit: WorkflowEventData[],
) => T;

/**
 * Approval Workflow Domain Service
 *
 * Owns the document lifecycle:
 * - draft → review (submit, author)
 * - review → approved | rejected (decided by the ledger outcome)
 * - rejected → review (resubmit, author; new cycle)
 *
 * Every mutation runs under the document lock against a unit of work and
 * commits once. A thrown error commits nothing, so no partial state is left
 * behind. Audit events are written only after a successful commit; a refused
 * attempt is audited once with success: false.
 */
@Injectable()
export class ApprovalWorkflowDomainService {
  private readonly logger = new Logger(ApprovalWorkflowDomainService.name);

  constructor(
    private readonly repository: ApprovalDocumentRepositoryPort,
    private readonly ledger: DecisionLedgerDomainService,
    private readonly delegationManager: DelegationManagerDomainService,
    private readonly escalationTracker: EscalationTrackerDomainService,
    private readonly lockService: DocumentLockService,
    private readonly clock: ClockPort,
    private readonly auditService: AuditService,
  ) {}

  async create(
    authorId: string,
    content: DocumentContent,
  ): Promise<ApprovalDocument> {
    const now = this.clock.now();
    const documentId = randomUUID();
    const escalationLadder = content.escalationLadder ?? [];
    const escalationTimeoutHours = content.escalationTimeoutHours ?? null;

    try {
      this.assertEscalationSettings(
        documentId,
        authorId,
        escalationTimeoutHours,
        escalationLadder,
      );
    } catch (error) {
      this.auditRefusal(
        { actorId: authorId, event: WorkflowEventType.DOCUMENT_CREATED },
        documentId,
        error,
      );
      throw error;
    }

    const document = await this.repository.create({
      id: documentId,
      authorId,
      title: content.title,
      body: content.body,
      status: DocumentStatus.DRAFT,
      currentCycleId: null,
      escalationTimeoutHours,
      escalationLadder: [...escalationLadder],
      escalationDepth: 0,
      createdAt: now,
      updatedAt: now,
    });

    this.auditService.logWorkflowEvent({
      actorId: authorId,
      event: WorkflowEventType.DOCUMENT_CREATED,
      documentId: document.id,
      success: true,
      metadata: { ladderLength: escalationLadder.length },
    });

    return document;
  }

  /**
   * Change a draft's content or escalation settings (author only)
   */
  async edit(
    documentId: string,
    patch: DocumentContentPatch,
    actorId: string,
  ): Promise<ApprovalDocument> {
    return this.mutate(
      documentId,
      { actorId, event: WorkflowEventType.DOCUMENT_EDITED },
      (uow, now, audit) => {
        const document = uow.document;
        this.assertAuthor(document, actorId, WorkflowAction.EDIT);

        ApprovalStateMachine.assertEditable(documentId, document.status);

        const escalationTimeoutHours =
          patch.escalationTimeoutHours === undefined
            ? document.escalationTimeoutHours
            : patch.escalationTimeoutHours;
        const escalationLadder =
          patch.escalationLadder ?? document.escalationLadder;
        this.assertEscalationSettings(
          documentId,
          document.authorId,
          escalationTimeoutHours,
          escalationLadder,
        );

        const updated = uow.updateDocument(
          {
            title: patch.title ?? document.title,
            body: patch.body ?? document.body,
            escalationTimeoutHours,
            escalationLadder: [...escalationLadder],
          },
          now,
        );

        audit.push({
          actorId,
          event: WorkflowEventType.DOCUMENT_EDITED,
          documentId,
          success: true,
          metadata: { fields: Object.keys(patch) },
        });

        return updated;
      },
    );
  }

  /**
   * Open the first review cycle for a draft
   */
  async submit(
    documentId: string,
    reviewerIds: string[],
    actorId: string,
  ): Promise<ApprovalDocument> {
    return this.mutate(
      documentId,
      { actorId, event: WorkflowEventType.DOCUMENT_SUBMITTED },
      (uow, now, audit) => {
        const document = uow.document;
        this.assertAuthor(document, actorId, WorkflowAction.SUBMIT);
        ApprovalStateMachine.assertStatus(
          documentId,
          document.status,
          DocumentStatus.DRAFT,
          WorkflowAction.SUBMIT,
        );

        const reviewers = Array.from(
          new Set(reviewerIds.map((id) => id.trim()).filter((id) => id.length > 0)),
        );
        if (reviewers.length === 0) {
          throw new MissingReviewersException(documentId);
        }
        if (reviewers.includes(document.authorId)) {
          throw new SelfApprovalException(
            documentId,
            document.authorId,
            'reviewerIds',
          );
        }

        const cycle = this.openCycle(uow, reviewers, WorkflowAction.SUBMIT, now);

        audit.push({
          actorId,
          event: WorkflowEventType.DOCUMENT_SUBMITTED,
          documentId,
          success: true,
          metadata: {
            cycleId: cycle.id,
            cycleNumber: cycle.cycleNumber,
            reviewerIds: reviewers,
          },
        });

        return uow.document;
      },
    );
  }

  /**
   * Start a new cycle after a rejection with the reviewers the previous
   * cycle started with. Reviewers added by escalation are not carried over.
   */
  async resubmit(documentId: string, actorId: string): Promise<ApprovalDocument> {
    return this.mutate(
      documentId,
      { actorId, event: WorkflowEventType.DOCUMENT_RESUBMITTED },
      (uow, now, audit) => {
        const document = uow.document;
        this.assertAuthor(document, actorId, WorkflowAction.RESUBMIT);
        ApprovalStateMachine.assertStatus(
          documentId,
          document.status,
          DocumentStatus.REJECTED,
          WorkflowAction.RESUBMIT,
        );

        const previous = uow.currentCycle;
        if (!previous || previous.reviewerIds.length === 0) {
          throw new MissingReviewersException(documentId);
        }

        const cycle = this.openCycle(
          uow,
          previous.reviewerIds,
          WorkflowAction.RESUBMIT,
          now,
        );

        audit.push({
          actorId,
          event: WorkflowEventType.DOCUMENT_RESUBMITTED,
          documentId,
          success: true,
          metadata: {
            cycleId: cycle.id,
            cycleNumber: cycle.cycleNumber,
            previousCycleId: previous.id,
          },
        });

        return uow.document;
      },
    );
  }

  /**
   * Record a verdict for the current cycle and close it when the outcome is
   * no longer pending. The acting actor is either an assigned reviewer or an
   * active substitute; the decision is always filed under the reviewer whose
   * obligation it satisfies.
   */
  async decide(
    documentId: string,
    actingActorId: string,
    verdict: DecisionVerdict,
    reason?: string,
    options: DecideOptions = {},
  ): Promise<DecideResult> {
    return this.mutate(
      documentId,
      { actorId: actingActorId, event: WorkflowEventType.DECISION_RECORDED },
      (uow, now, audit) => {
        const document = uow.document;
        const cycle = uow.currentCycle;
        if (!cycle) {
          throw new InvalidTransitionException(
            documentId,
            document.status,
            WorkflowAction.DECIDE,
          );
        }
        if (actingActorId === document.authorId) {
          throw new SelfApprovalException(
            documentId,
            actingActorId,
            'actingActorId',
          );
        }

        const reviewerId = this.delegationManager.resolveEffectiveReviewer(
          uow,
          cycle,
          actingActorId,
          now,
          options.onBehalfOf,
        );

        // Before the status check: a closed cycle still reports immutability
        this.ledger.assertNotRecorded(uow, cycle, reviewerId, verdict);

        ApprovalStateMachine.assertStatus(
          documentId,
          document.status,
          DocumentStatus.REVIEW,
          WorkflowAction.DECIDE,
        );
        if (reviewerId === document.authorId) {
          throw new SelfApprovalException(documentId, reviewerId, 'reviewerId');
        }

        const decision = this.ledger.record(
          uow,
          cycle,
          reviewerId,
          actingActorId,
          verdict,
          reason,
          now,
        );

        audit.push({
          actorId: actingActorId,
          event: WorkflowEventType.DECISION_RECORDED,
          documentId,
          success: true,
          metadata: {
            cycleId: cycle.id,
            decisionId: decision.id,
            reviewerId,
            verdict,
            delegated: reviewerId !== actingActorId,
          },
        });

        const outcome = this.ledger.outcome(uow, cycle);
        if (outcome !== CycleOutcome.PENDING) {
          this.closeCycle(uow, cycle, outcome, actingActorId, now, audit);
        }

        return { document: uow.document, decision, outcome };
      },
    );
  }

  /**
   * Grant time-bound substitute authority for the delegator's obligation in
   * the current cycle
   */
  async delegate(
    documentId: string,
    delegatorId: string,
    substituteId: string,
    expiresAt: Date,
  ): Promise<Delegation> {
    return this.mutate(
      documentId,
      { actorId: delegatorId, event: WorkflowEventType.DELEGATION_GRANTED },
      (uow, now, audit) => {
        const document = uow.document;
        ApprovalStateMachine.assertStatus(
          documentId,
          document.status,
          DocumentStatus.REVIEW,
          WorkflowAction.DELEGATE,
        );
        const cycle = uow.currentCycle;
        if (!cycle) {
          throw new InvalidTransitionException(
            documentId,
            document.status,
            WorkflowAction.DELEGATE,
          );
        }

        const delegation = this.delegationManager.delegate(
          uow,
          cycle,
          { delegatorId, substituteId, expiresAt },
          now,
        );

        uow.emit(
          this.notification(
            uow,
            substituteId,
            NotificationType.DELEGATION_GRANTED,
            cycle.id,
            `Reviewer ${delegatorId} delegated their review of document ${documentId} to you until ${expiresAt.toISOString()}`,
            now,
          ),
        );

        audit.push({
          actorId: delegatorId,
          event: WorkflowEventType.DELEGATION_GRANTED,
          documentId,
          success: true,
          metadata: {
            delegationId: delegation.id,
            cycleId: cycle.id,
            substituteId,
            expiresAt: expiresAt.toISOString(),
          },
        });

        return delegation;
      },
    );
  }

  /**
   * Idempotent: returns the revoked delegation, or null when the delegator
   * had no active delegation
   */
  async revoke(
    documentId: string,
    delegatorId: string,
  ): Promise<Delegation | null> {
    return this.mutate(
      documentId,
      { actorId: delegatorId, event: WorkflowEventType.DELEGATION_REVOKED },
      (uow, now, audit) => {
        const revoked = this.delegationManager.revoke(
          uow,
          uow.currentCycle,
          delegatorId,
          now,
        );
        if (revoked) {
          audit.push({
            actorId: delegatorId,
            event: WorkflowEventType.DELEGATION_REVOKED,
            documentId,
            success: true,
            metadata: {
              delegationId: revoked.id,
              substituteId: revoked.substituteId,
            },
          });
        }
        return revoked;
      },
    );
  }

  /**
   * Run one escalation evaluation for the current cycle. Safe to repeat:
   * nothing fires until another full timeout has elapsed for an overdue
   * reviewer.
   */
  async checkEscalation(
    documentId: string,
    at?: Date,
  ): Promise<EscalationCheckResult> {
    return this.mutate(
      documentId,
      { actorId: 'system', event: WorkflowEventType.DOCUMENT_ESCALATED },
      (uow, now, audit): EscalationCheckResult => {
        const document = uow.document;
        ApprovalStateMachine.assertStatus(
          documentId,
          document.status,
          DocumentStatus.REVIEW,
          WorkflowAction.CHECK_ESCALATION,
        );
        const cycle = uow.currentCycle;
        if (!cycle) {
          throw new InvalidTransitionException(
            documentId,
            document.status,
            WorkflowAction.CHECK_ESCALATION,
          );
        }

        const evaluation = this.escalationTracker.evaluate(uow, cycle, now);
        if (!evaluation.escalated) {
          if (evaluation.reason === EscalationSkipReason.MAX_DEPTH_REACHED) {
            audit.push({
              actorId: 'system',
              event: WorkflowEventType.MAX_ESCALATION_DEPTH_REACHED,
              documentId,
              success: true,
              metadata: {
                cycleId: cycle.id,
                depth: document.escalationDepth,
                overdueReviewerIds: evaluation.overdueReviewerIds,
              },
            });
          }
          return { escalated: false, record: null, reason: evaluation.reason };
        }

        const { record } = evaluation;
        uow.emit(
          this.notification(
            uow,
            record.escalatedToId,
            NotificationType.DOCUMENT_ESCALATED,
            cycle.id,
            `Document ${documentId} was escalated to you after ${record.timeoutHours}h without a decision`,
            now,
          ),
        );

        audit.push({
          actorId: 'system',
          event: WorkflowEventType.DOCUMENT_ESCALATED,
          documentId,
          success: true,
          metadata: {
            cycleId: cycle.id,
            escalationId: record.id,
            depth: record.depth,
            escalatedToId: record.escalatedToId,
            escalatedFromIds: record.escalatedFromIds,
            newAssignment: evaluation.assignment !== null,
          },
        });

        return { escalated: true, record, reason: null };
      },
      at,
    );
  }

  async getDocument(documentId: string): Promise<DocumentView> {
    const uow = await this.load(documentId);
    const currentCycle = uow.currentCycle;
    return {
      document: uow.document,
      currentCycle,
      pendingReviewerIds: currentCycle
        ? this.ledger.pendingReviewers(uow, currentCycle)
        : [],
    };
  }

  /**
   * Every cycle, oldest first, with what happened in it
   */
  async getHistory(documentId: string): Promise<CycleHistory[]> {
    const uow = await this.load(documentId);
    return uow.allCycles.map((cycle) => ({
      cycle,
      assignments: uow.assignmentsFor(cycle.id),
      decisions: uow.decisionsFor(cycle.id),
      escalations: uow.escalationsFor(cycle.id),
      delegations: uow.delegationsFor(cycle.id),
    }));
  }

  async listDelegations(
    documentId: string,
    at?: Date,
  ): Promise<DelegationView[]> {
    const uow = await this.load(documentId);
    const now = at ?? this.clock.now();
    return uow.allDelegations.map((delegation) => ({
      delegation,
      state: this.delegationManager.describe(delegation, now),
    }));
  }

  async listNotifications(
    recipientId: string,
    documentId?: string,
  ): Promise<NotificationEvent[]> {
    return this.repository.findNotifications(recipientId, documentId);
  }

  private async load(documentId: string): Promise<ApprovalUnitOfWork> {
    const aggregate = await this.repository.loadAggregate(documentId);
    if (!aggregate) {
      throw new DocumentNotFoundException(documentId);
    }
    return new ApprovalUnitOfWork(aggregate);
  }

  private async mutate<T>(
    documentId: string,
    attempt: WorkflowAttempt,
    step: WorkflowStep<T>,
    at?: Date,
  ): Promise<T> {
    return this.lockService.runExclusive(documentId, async () => {
      const audit: WorkflowEventData[] = [];
      let uow: ApprovalUnitOfWork;
      let result: T;
      try {
        uow = await this.load(documentId);
        result = step(uow, at ?? this.clock.now(), audit);
      } catch (error) {
        this.auditRefusal(attempt, documentId, error);
        throw error;
      }

      if (uow.hasChanges()) {
        await this.repository.commit(uow.toChangeSet());
        this.logger.debug(
          `Committed ${uow.pendingNotifications.length} notification(s) for document ${documentId}`,
        );
      }
      this.auditService.logWorkflowEvents(audit);

      return result;
    });
  }

  /**
   * Workflow refusals are audited; anything else (a failed commit) is left
   * to the caller and the exception layer
   */
  private auditRefusal(
    attempt: WorkflowAttempt,
    documentId: string,
    error: unknown,
  ): void {
    if (!isApprovalWorkflowError(error)) {
      return;
    }
    this.auditService.logWorkflowEvent({
      actorId: attempt.actorId,
      event: attempt.event,
      documentId,
      success: false,
      errorMessage: error.message,
      metadata: { code: error.code },
    });
  }

  private openCycle(
    uow: ApprovalUnitOfWork,
    reviewerIds: string[],
    action: WorkflowAction,
    now: Date,
  ): ReviewCycle {
    const document = uow.document;
    ApprovalStateMachine.validateTransition(
      document.id,
      document.status,
      DocumentStatus.REVIEW,
      action,
    );

    const cycleNumber =
      uow.allCycles.reduce((max, cycle) => Math.max(max, cycle.cycleNumber), 0) +
      1;
    const cycle: ReviewCycle = {
      id: randomUUID(),
      documentId: document.id,
      cycleNumber,
      reviewerIds: [...reviewerIds],
      outcome: CycleOutcome.PENDING,
      createdAt: now,
      closedAt: null,
    };
    uow.addCycle(cycle);

    for (const reviewerId of reviewerIds) {
      uow.addAssignment({
        id: randomUUID(),
        cycleId: cycle.id,
        reviewerId,
        assignedAt: now,
        escalated: false,
        escalationDepth: 0,
      });
      uow.emit(
        this.notification(
          uow,
          reviewerId,
          NotificationType.REVIEWER_ASSIGNED,
          cycle.id,
          `You have been assigned to review document ${document.id} (cycle ${cycleNumber})`,
          now,
        ),
      );
    }

    uow.updateDocument(
      {
        status: DocumentStatus.REVIEW,
        currentCycleId: cycle.id,
        escalationDepth: 0,
      },
      now,
    );

    return cycle;
  }

  private closeCycle(
    uow: ApprovalUnitOfWork,
    cycle: ReviewCycle,
    outcome: CycleOutcome.APPROVED | CycleOutcome.REJECTED,
    actorId: string,
    now: Date,
    audit: WorkflowEventData[],
  ): void {
    const document = uow.document;
    const approved = outcome === CycleOutcome.APPROVED;
    const status = approved ? DocumentStatus.APPROVED : DocumentStatus.REJECTED;

    ApprovalStateMachine.validateTransition(
      document.id,
      document.status,
      status,
      WorkflowAction.DECIDE,
    );

    uow.updateCycle(cycle.id, { outcome, closedAt: now });
    uow.updateDocument({ status }, now);
    uow.emit(
      this.notification(
        uow,
        document.authorId,
        approved
          ? NotificationType.DOCUMENT_APPROVED
          : NotificationType.DOCUMENT_REJECTED,
        cycle.id,
        `Document ${document.id} was ${status} in review cycle ${cycle.cycleNumber}`,
        now,
      ),
    );

    audit.push({
      actorId,
      event: approved
        ? WorkflowEventType.DOCUMENT_APPROVED
        : WorkflowEventType.DOCUMENT_REJECTED,
      documentId: document.id,
      success: true,
      metadata: { cycleId: cycle.id, cycleNumber: cycle.cycleNumber },
    });
  }

  private notification(
    uow: ApprovalUnitOfWork,
    recipientId: string,
    type: NotificationType,
    cycleId: string | null,
    message: string,
    now: Date,
  ): NotificationEvent {
    return {
      id: randomUUID(),
      documentId: uow.document.id,
      recipientId,
      type,
      cycleId,
      message,
      createdAt: now,
    };
  }

  private assertAuthor(
    document: ApprovalDocument,
    actorId: string,
    action: WorkflowAction,
  ): void {
    if (document.authorId !== actorId) {
      throw new NotDocumentAuthorException(document.id, actorId, action);
    }
  }

  private assertEscalationSettings(
    documentId: string,
    authorId: string,
    escalationTimeoutHours: number | null,
    escalationLadder: string[],
  ): void {
    if (
      escalationTimeoutHours !== null &&
      (!Number.isFinite(escalationTimeoutHours) || escalationTimeoutHours < 0)
    ) {
      throw new InvalidEscalationTimeoutException(documentId);
    }
    if (escalationLadder.some((id) => id.trim().length === 0)) {
      throw new InvalidEscalationLadderException(
        documentId,
        'Escalation ladder entries must be non-empty user ids',
      );
    }
    if (escalationLadder.includes(authorId)) {
      throw new InvalidEscalationLadderException(
        documentId,
        'The document author cannot appear in the escalation ladder',
      );
    }
  }
}
