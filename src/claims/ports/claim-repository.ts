import { Claim, ClaimStatus } from '../domain/claim';

export interface RegistryState {
  nextClaimId: number;
  owner: string | null;
}

export type ClaimDraft = Omit<Claim, 'claimId'>;

export interface ClaimRepository {
  /** Creates the registry state if absent; returns false when it already existed. */
  initialize(owner: string): Promise<boolean>;
  getRegistryState(): Promise<RegistryState>;
  setOwner(owner: string | null): Promise<void>;
  /**
   * Stores the draft under the next identifier and advances the counter in one write.
   * On failure neither the counter nor the claim table changes.
   */
  createNext(draft: ClaimDraft): Promise<Claim>;
  getById(claimId: number): Promise<Claim | null>;
  /** Returns false when the stored status no longer equals `expected`. */
  updateStatus(claimId: number, expected: ClaimStatus, status: ClaimStatus): Promise<boolean>;
  /** Claims with the given customer hash, ascending by claimId. */
  findByCustomerHash(customerIdHash: string): Promise<Claim[]>;
}
