import { ClaimStatus } from '../domain/claim';

export const CLAIM_SUBMITTED = 'claim.submitted';
export const CLAIM_STATUS_UPDATED = 'claim.status-updated';
export const CLAIM_PROCESSED = 'claim.processed';
export const OWNERSHIP_TRANSFERRED = 'registry.ownership-transferred';

export interface ClaimSubmittedEvent {
  name: typeof CLAIM_SUBMITTED;
  claimId: number;
  customerIdHash: string;
  amount: bigint;
  timestamp: number;
  submitter: string;
}

export interface ClaimStatusUpdatedEvent {
  name: typeof CLAIM_STATUS_UPDATED;
  claimId: number;
  oldStatus: ClaimStatus;
  newStatus: ClaimStatus;
  timestamp: number;
  updater: string;
}

/** Emitted only when a claim enters a terminal status. */
export interface ClaimProcessedEvent {
  name: typeof CLAIM_PROCESSED;
  claimId: number;
  customerIdHash: string;
  amount: bigint;
  status: ClaimStatus;
  timestamp: number;
}

export interface OwnershipTransferredEvent {
  name: typeof OWNERSHIP_TRANSFERRED;
  previousOwner: string | null;
  newOwner: string | null;
}

export type ClaimRegistryEvent =
  | ClaimSubmittedEvent
  | ClaimStatusUpdatedEvent
  | ClaimProcessedEvent
  | OwnershipTransferredEvent;
