export type ApprovalsConfig = {
  // Applied when a document has no escalation timeout of its own
  defaultEscalationTimeoutHours: number;
  maxEscalationDepth: number;
  escalationScanEnabled: boolean;
};
