import { NotificationType } from '../enums/notification-type.enum';

/**
 * Outbox record for an external delivery collaborator. The workflow only
 * writes these; it never delivers them.
 */
export interface NotificationEvent {
  id: string;
  documentId: string;
  recipientId: string;
  type: NotificationType;
  cycleId: string | null;
  message: string;
  createdAt: Date;
}
