import { DecisionVerdict } from '../enums/decision-verdict.enum';

/**
 * A reviewer's verdict within one cycle. Write-once: at most one per
 * (cycleId, reviewerId), never updated or deleted.
 */
export interface Decision {
  id: string;
  cycleId: string;
  reviewerId: string; // Whose obligation this decision satisfies
  actingActorId: string; // Differs from reviewerId when a substitute decided
  verdict: DecisionVerdict;
  reason: string | null; // Required for reject
  decidedAt: Date;
}
