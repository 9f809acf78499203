import { DocumentStatus } from '../enums/document-status.enum';

/**
 * Domain entity for a document moving through the approval workflow.
 *
 * NOTE: status, currentCycleId and escalationDepth are owned by the
 * workflow domain service and only change through its transitions.
 */
export interface ApprovalDocument {
  id: string; // UUID
  authorId: string;
  title: string;
  body: string;
  status: DocumentStatus;
  currentCycleId: string | null; // Latest review cycle, null while never submitted
  escalationTimeoutHours: number | null; // null = configured default, 0 = escalate immediately
  escalationLadder: string[]; // Entry n is the approver added by escalation n + 1
  escalationDepth: number; // Escalations fired in the current cycle
  createdAt: Date;
  updatedAt: Date;
}
