export enum NotificationType {
  REVIEWER_ASSIGNED = 'reviewer_assigned',
  DOCUMENT_ESCALATED = 'document_escalated',
  DELEGATION_GRANTED = 'delegation_granted',
  DOCUMENT_APPROVED = 'document_approved',
  DOCUMENT_REJECTED = 'document_rejected',
}
