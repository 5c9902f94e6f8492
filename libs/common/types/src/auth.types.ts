/**
 * Tollgate Auth Types
 * Common types for authentication
 */

/**
 * Account as stored by the principal directory. Only the credential
 * validator ever sees passwordHash.
 */
export interface Principal {
  id: string;
  email: string | null;
  taxId: string | null;
  displayName: string | null;
  passwordHash: string;
}

export type PrincipalSummary = Omit<Principal, 'passwordHash'>;

export interface RefreshTokenRecord {
  id: string;
  principalId: string;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
}

export function toPrincipalSummary(principal: Principal): PrincipalSummary {
  return {
    id: principal.id,
    email: principal.email,
    taxId: principal.taxId,
    displayName: principal.displayName,
  };
}
