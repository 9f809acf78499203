import { Injectable } from '@nestjs/common';
import { ApprovalDocument } from '../../../domain/entities/approval-document.entity';
import { Decision } from '../../../domain/entities/decision.entity';
import { Delegation } from '../../../domain/entities/delegation.entity';
import { EscalationRecord } from '../../../domain/entities/escalation-record.entity';
import { NotificationEvent } from '../../../domain/entities/notification-event.entity';
import { ReviewCycle } from '../../../domain/entities/review-cycle.entity';
import { ReviewerAssignment } from '../../../domain/entities/reviewer-assignment.entity';
import { DocumentStatus } from '../../../domain/enums/document-status.enum';
import { ApprovalDocumentRepositoryPort } from '../../../domain/repositories/approval-document.repository.port';
import {
  ApprovalAggregate,
  ApprovalChangeSet,
} from '../../../domain/unit-of-work/approval-unit-of-work';
import { NullableType } from '../../../../utils/types/nullable.type';

/**
 * Process-local implementation of ApprovalDocumentRepositoryPort.
 *
 * Enforces the same uniqueness the relational schema does, and applies a
 * change set only after every check passes, so a rejected commit leaves
 * nothing behind.
 */
@Injectable()
export class InMemoryApprovalDocumentRepository
  implements ApprovalDocumentRepositoryPort
{
  private readonly documents = new Map<string, ApprovalDocument>();
  private readonly cycles = new Map<string, ReviewCycle>();
  private readonly assignments = new Map<string, ReviewerAssignment>();
  private readonly decisions = new Map<string, Decision>();
  private readonly delegations = new Map<string, Delegation>();
  private readonly escalations = new Map<string, EscalationRecord>();
  private readonly notifications: NotificationEvent[] = [];

  async create(document: ApprovalDocument): Promise<ApprovalDocument> {
    if (this.documents.has(document.id)) {
      throw new Error(`Duplicate document id ${document.id}`);
    }
    this.documents.set(document.id, this.copyDocument(document));
    return this.copyDocument(document);
  }

  async loadAggregate(
    documentId: string,
  ): Promise<NullableType<ApprovalAggregate>> {
    const document = this.documents.get(documentId);
    if (!document) {
      return null;
    }

    const cycles = [...this.cycles.values()]
      .filter((cycle) => cycle.documentId === documentId)
      .sort((a, b) => a.cycleNumber - b.cycleNumber);
    const cycleIds = new Set(cycles.map((cycle) => cycle.id));

    return {
      document: this.copyDocument(document),
      cycles: cycles.map((cycle) => ({
        ...cycle,
        reviewerIds: [...cycle.reviewerIds],
      })),
      assignments: [...this.assignments.values()]
        .filter((assignment) => cycleIds.has(assignment.cycleId))
        .map((assignment) => ({ ...assignment })),
      decisions: [...this.decisions.values()]
        .filter((decision) => cycleIds.has(decision.cycleId))
        .map((decision) => ({ ...decision })),
      delegations: [...this.delegations.values()]
        .filter((delegation) => delegation.documentId === documentId)
        .map((delegation) => ({ ...delegation })),
      escalations: [...this.escalations.values()]
        .filter((record) => record.documentId === documentId)
        .map((record) => ({
          ...record,
          escalatedFromIds: [...record.escalatedFromIds],
        })),
    };
  }

  async commit(changeSet: ApprovalChangeSet): Promise<void> {
    if (!this.documents.has(changeSet.documentId)) {
      throw new Error(`Document ${changeSet.documentId} does not exist`);
    }
    this.assertUnique(
      'reviewer assignment',
      this.assignments,
      changeSet.createdAssignments,
    );
    this.assertUnique('decision', this.decisions, changeSet.createdDecisions);

    if (changeSet.document) {
      this.documents.set(
        changeSet.document.id,
        this.copyDocument(changeSet.document),
      );
    }
    for (const cycle of [...changeSet.createdCycles, ...changeSet.updatedCycles]) {
      this.cycles.set(cycle.id, { ...cycle, reviewerIds: [...cycle.reviewerIds] });
    }
    for (const assignment of changeSet.createdAssignments) {
      this.assignments.set(assignment.id, { ...assignment });
    }
    for (const decision of changeSet.createdDecisions) {
      this.decisions.set(decision.id, { ...decision });
    }
    for (const delegation of [
      ...changeSet.createdDelegations,
      ...changeSet.updatedDelegations,
    ]) {
      this.delegations.set(delegation.id, { ...delegation });
    }
    for (const record of changeSet.createdEscalations) {
      this.escalations.set(record.id, {
        ...record,
        escalatedFromIds: [...record.escalatedFromIds],
      });
    }
    this.notifications.push(
      ...changeSet.notifications.map((notification) => ({ ...notification })),
    );
  }

  async findIdsByStatus(status: DocumentStatus): Promise<string[]> {
    return [...this.documents.values()]
      .filter((document) => document.status === status)
      .map((document) => document.id);
  }

  async findNotifications(
    recipientId: string,
    documentId?: string,
  ): Promise<NotificationEvent[]> {
    const matching = this.notifications
      .map((notification, index) => ({ notification, index }))
      .filter(
        ({ notification }) =>
          notification.recipientId === recipientId &&
          (documentId === undefined || notification.documentId === documentId),
      )
      .sort(
        (a, b) =>
          b.notification.createdAt.getTime() -
            a.notification.createdAt.getTime() || b.index - a.index,
      );
    return matching.map(({ notification }) => ({ ...notification }));
  }

  /**
   * Mirrors the (cycle_id, reviewer_id) unique constraints
   */
  private assertUnique<T extends { id: string; cycleId: string; reviewerId: string }>(
    label: string,
    existing: Map<string, T>,
    created: T[],
  ): void {
    const keys = new Set(
      [...existing.values()].map((row) => `${row.cycleId}:${row.reviewerId}`),
    );
    for (const row of created) {
      const key = `${row.cycleId}:${row.reviewerId}`;
      if (keys.has(key)) {
        throw new Error(
          `Duplicate ${label} for reviewer ${row.reviewerId} in cycle ${row.cycleId}`,
        );
      }
      keys.add(key);
    }
  }

  private copyDocument(document: ApprovalDocument): ApprovalDocument {
    return { ...document, escalationLadder: [...document.escalationLadder] };
  }
}
