import { CycleOutcome } from '../enums/cycle-outcome.enum';

/**
 * One submission of a document for review. Cycles are never deleted;
 * earlier cycles form the document's review history.
 */
export interface ReviewCycle {
  id: string;
  documentId: string;
  cycleNumber: number; // 1-based, in creation order
  reviewerIds: string[]; // Reviewers assigned when the cycle started
  outcome: CycleOutcome;
  createdAt: Date;
  closedAt: Date | null;
}
