export enum ClaimStatus {
  Submitted = 0,
  Approved = 1,
  Rejected = 2
}

export type ClaimStatusName = 'Submitted' | 'Approved' | 'Rejected';

export interface Claim {
  claimId: number;
  customerIdHash: string;
  amount: bigint;
  claimDate: number;
  status: ClaimStatus;
}

export const MAX_UINT256 = (1n << 256n) - 1n;

const STATUS_NAMES: Record<ClaimStatus, ClaimStatusName> = {
  [ClaimStatus.Submitted]: 'Submitted',
  [ClaimStatus.Approved]: 'Approved',
  [ClaimStatus.Rejected]: 'Rejected'
};

const ALL_STATUSES: readonly ClaimStatus[] = [ClaimStatus.Submitted, ClaimStatus.Approved, ClaimStatus.Rejected];

export function statusName(status: number): ClaimStatusName | 'Unknown' {
  return isClaimStatus(status) ? STATUS_NAMES[status] : 'Unknown';
}

export function isClaimStatus(value: number): value is ClaimStatus {
  return value === ClaimStatus.Submitted || value === ClaimStatus.Approved || value === ClaimStatus.Rejected;
}

/**
 * Accepts a symbolic name ("Approved") or a numeric code (1 or "1").
 * Returns null for anything outside the three defined statuses.
 */
export function parseClaimStatus(value: unknown): ClaimStatus | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && isClaimStatus(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  if (/^(0|[1-9]\d*)$/.test(value)) {
    return parseClaimStatus(Number(value));
  }
  return ALL_STATUSES.find((status) => STATUS_NAMES[status] === value) ?? null;
}

// Approved and Rejected accept no further transition.
export function isTerminal(status: ClaimStatus): boolean {
  return status === ClaimStatus.Approved || status === ClaimStatus.Rejected;
}
