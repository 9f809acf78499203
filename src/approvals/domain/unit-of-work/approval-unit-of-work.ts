import { ApprovalDocument } from '../entities/approval-document.entity';
import { ReviewCycle } from '../entities/review-cycle.entity';
import { ReviewerAssignment } from '../entities/reviewer-assignment.entity';
import { Decision } from '../entities/decision.entity';
import { Delegation } from '../entities/delegation.entity';
import { EscalationRecord } from '../entities/escalation-record.entity';
import { NotificationEvent } from '../entities/notification-event.entity';

/**
 * Everything the workflow knows about one document: the document itself and
 * every cycle, assignment, decision, delegation and escalation it has had.
 */
export interface ApprovalAggregate {
  document: ApprovalDocument;
  cycles: ReviewCycle[];
  assignments: ReviewerAssignment[];
  decisions: Decision[];
  delegations: Delegation[];
  escalations: EscalationRecord[];
}

/**
 * Writes staged by one workflow operation. The repository commits a change
 * set all-or-nothing.
 */
export interface ApprovalChangeSet {
  documentId: string;
  document: ApprovalDocument | null; // Set when the document row changed
  createdCycles: ReviewCycle[];
  updatedCycles: ReviewCycle[];
  createdAssignments: ReviewerAssignment[];
  createdDecisions: Decision[];
  createdDelegations: Delegation[];
  updatedDelegations: Delegation[];
  createdEscalations: EscalationRecord[];
  notifications: NotificationEvent[];
}

export type DocumentPatch = Partial<
  Omit<ApprovalDocument, 'id' | 'authorId' | 'createdAt' | 'updatedAt'>
>;

/**
 * ApprovalUnitOfWork
 *
 * Working copy of an ApprovalAggregate for a single operation. Staged writes
 * are visible to later reads through the same unit of work, so outcome and
 * escalation evaluation always see the decision or assignment just added.
 * Nothing reaches storage until the change set is committed.
 */
export class ApprovalUnitOfWork {
  private documentState: ApprovalDocument;
  private documentChanged = false;

  private readonly cycles: ReviewCycle[];
  private readonly assignments: ReviewerAssignment[];
  private readonly decisions: Decision[];
  private readonly delegations: Delegation[];
  private readonly escalations: EscalationRecord[];

  private readonly createdCycleIds = new Set<string>();
  private readonly updatedCycleIds = new Set<string>();
  private readonly createdAssignments: ReviewerAssignment[] = [];
  private readonly createdDecisions: Decision[] = [];
  private readonly createdDelegationIds = new Set<string>();
  private readonly updatedDelegationIds = new Set<string>();
  private readonly createdEscalations: EscalationRecord[] = [];
  private readonly notifications: NotificationEvent[] = [];

  constructor(aggregate: ApprovalAggregate) {
    this.documentState = {
      ...aggregate.document,
      escalationLadder: [...aggregate.document.escalationLadder],
    };
    this.cycles = aggregate.cycles.map((cycle) => ({
      ...cycle,
      reviewerIds: [...cycle.reviewerIds],
    }));
    this.assignments = aggregate.assignments.map((assignment) => ({
      ...assignment,
    }));
    this.decisions = aggregate.decisions.map((decision) => ({ ...decision }));
    this.delegations = aggregate.delegations.map((delegation) => ({
      ...delegation,
    }));
    this.escalations = aggregate.escalations.map((record) => ({
      ...record,
      escalatedFromIds: [...record.escalatedFromIds],
    }));
  }

  get document(): ApprovalDocument {
    return this.documentState;
  }

  get currentCycle(): ReviewCycle | null {
    const { currentCycleId } = this.documentState;
    if (!currentCycleId) {
      return null;
    }
    return this.cycles.find((cycle) => cycle.id === currentCycleId) ?? null;
  }

  get allCycles(): ReviewCycle[] {
    return [...this.cycles].sort((a, b) => a.cycleNumber - b.cycleNumber);
  }

  get allDelegations(): Delegation[] {
    return [...this.delegations];
  }

  assignmentsFor(cycleId: string): ReviewerAssignment[] {
    return this.assignments.filter((assignment) => assignment.cycleId === cycleId);
  }

  decisionsFor(cycleId: string): Decision[] {
    return this.decisions.filter((decision) => decision.cycleId === cycleId);
  }

  escalationsFor(cycleId: string): EscalationRecord[] {
    return this.escalations.filter((record) => record.cycleId === cycleId);
  }

  delegationsFor(cycleId: string): Delegation[] {
    return this.delegations.filter((delegation) => delegation.cycleId === cycleId);
  }

  updateDocument(patch: DocumentPatch, now: Date): ApprovalDocument {
    this.documentState = { ...this.documentState, ...patch, updatedAt: now };
    this.documentChanged = true;
    return this.documentState;
  }

  addCycle(cycle: ReviewCycle): void {
    this.cycles.push(cycle);
    this.createdCycleIds.add(cycle.id);
  }

  updateCycle(
    cycleId: string,
    patch: Partial<Pick<ReviewCycle, 'outcome' | 'closedAt'>>,
  ): ReviewCycle {
    const index = this.cycles.findIndex((cycle) => cycle.id === cycleId);
    if (index === -1) {
      throw new Error(`Review cycle ${cycleId} is not part of this aggregate`);
    }
    const updated = { ...this.cycles[index], ...patch };
    this.cycles[index] = updated;
    if (!this.createdCycleIds.has(cycleId)) {
      this.updatedCycleIds.add(cycleId);
    }
    return updated;
  }

  addAssignment(assignment: ReviewerAssignment): void {
    this.assignments.push(assignment);
    this.createdAssignments.push(assignment);
  }

  addDecision(decision: Decision): void {
    this.decisions.push(decision);
    this.createdDecisions.push(decision);
  }

  addDelegation(delegation: Delegation): void {
    this.delegations.push(delegation);
    this.createdDelegationIds.add(delegation.id);
  }

  updateDelegation(
    delegationId: string,
    patch: Partial<Pick<Delegation, 'revoked' | 'revokedAt'>>,
  ): Delegation {
    const index = this.delegations.findIndex(
      (delegation) => delegation.id === delegationId,
    );
    if (index === -1) {
      throw new Error(`Delegation ${delegationId} is not part of this aggregate`);
    }
    const updated = { ...this.delegations[index], ...patch };
    this.delegations[index] = updated;
    if (!this.createdDelegationIds.has(delegationId)) {
      this.updatedDelegationIds.add(delegationId);
    }
    return updated;
  }

  addEscalation(record: EscalationRecord): void {
    this.escalations.push(record);
    this.createdEscalations.push(record);
  }

  emit(notification: NotificationEvent): void {
    this.notifications.push(notification);
  }

  get pendingNotifications(): NotificationEvent[] {
    return [...this.notifications];
  }

  hasChanges(): boolean {
    const changeSet = this.toChangeSet();
    return (
      changeSet.document !== null ||
      changeSet.createdCycles.length > 0 ||
      changeSet.updatedCycles.length > 0 ||
      changeSet.createdAssignments.length > 0 ||
      changeSet.createdDecisions.length > 0 ||
      changeSet.createdDelegations.length > 0 ||
      changeSet.updatedDelegations.length > 0 ||
      changeSet.createdEscalations.length > 0 ||
      changeSet.notifications.length > 0
    );
  }

  toChangeSet(): ApprovalChangeSet {
    return {
      documentId: this.documentState.id,
      document: this.documentChanged ? { ...this.documentState } : null,
      createdCycles: this.cycles.filter((cycle) =>
        this.createdCycleIds.has(cycle.id),
      ),
      updatedCycles: this.cycles.filter((cycle) =>
        this.updatedCycleIds.has(cycle.id),
      ),
      createdAssignments: [...this.createdAssignments],
      createdDecisions: [...this.createdDecisions],
      createdDelegations: this.delegations.filter((delegation) =>
        this.createdDelegationIds.has(delegation.id),
      ),
      updatedDelegations: this.delegations.filter((delegation) =>
        this.updatedDelegationIds.has(delegation.id),
      ),
      createdEscalations: [...this.createdEscalations],
      notifications: [...this.notifications],
    };
  }
}
