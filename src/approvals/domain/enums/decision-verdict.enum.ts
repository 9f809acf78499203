export enum DecisionVerdict {
  APPROVE = 'approve',
  REJECT = 'reject',
}
