/**
 * Time-bound substitute authority granted by a reviewer on one document.
 *
 * Active while revoked = false and expiresAt is in the future. Expiry is
 * evaluated lazily whenever the delegation is consulted.
 */
export interface Delegation {
  id: string;
  documentId: string;
  cycleId: string; // Cycle in which the delegation was granted
  delegatorId: string;
  substituteId: string;
  expiresAt: Date;
  revoked: boolean;
  revokedAt: Date | null;
  createdAt: Date;
}

export type DelegationState = 'active' | 'expired' | 'revoked';
