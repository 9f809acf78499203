import { ApprovalDocument } from '../entities/approval-document.entity';
import { NotificationEvent } from '../entities/notification-event.entity';
import { DocumentStatus } from '../enums/document-status.enum';
import {
  ApprovalAggregate,
  ApprovalChangeSet,
} from '../unit-of-work/approval-unit-of-work';

/**
 * Repository Port for approval documents (Hexagonal Architecture)
 *
 * The document is stored together with its cycles, assignments, decisions,
 * delegations, escalation records and notification outbox. Workflow
 * operations load the whole aggregate and hand back one change set.
 */
export abstract class ApprovalDocumentRepositoryPort {
  abstract create(document: ApprovalDocument): Promise<ApprovalDocument>;

  /**
   * Load the document and everything recorded against it, or null when the
   * document does not exist.
   */
  abstract loadAggregate(documentId: string): Promise<ApprovalAggregate | null>;

  /**
   * Persist a change set atomically. Either every staged row is written or
   * none is.
   */
  abstract commit(changeSet: ApprovalChangeSet): Promise<void>;

  abstract findIdsByStatus(status: DocumentStatus): Promise<string[]>;

  /**
   * Notification outbox for one recipient, newest first.
   */
  abstract findNotifications(
    recipientId: string,
    documentId?: string,
  ): Promise<NotificationEvent[]>;
}
