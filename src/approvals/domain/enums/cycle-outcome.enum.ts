export enum CycleOutcome {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
}
