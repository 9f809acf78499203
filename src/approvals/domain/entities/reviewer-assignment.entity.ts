export interface ReviewerAssignment {
  id: string;
  cycleId: string;
  reviewerId: string;
  assignedAt: Date;
  escalated: boolean; // true when added by escalation
  escalationDepth: number; // 0 for reviewers assigned at cycle start
}
