export interface EscalationRecord {
  id: string;
  documentId: string;
  cycleId: string;
  depth: number; // 1 for the first escalation of a cycle
  escalatedToId: string;
  escalatedFromIds: string[]; // Overdue reviewers whose timeout fired the escalation
  triggeredAt: Date;
  timeoutHours: number;
}
