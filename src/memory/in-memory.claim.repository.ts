import { Injectable } from '@nestjs/common';
import { Claim, ClaimStatus } from '../claims/domain/claim';
import { ClaimDraft, ClaimRepository, RegistryState } from '../claims/ports/claim-repository';

@Injectable()
export class InMemoryClaimRepository implements ClaimRepository {
  private readonly claims = new Map<number, Claim>();
  private readonly byCustomerHash = new Map<string, number[]>();
  private state: RegistryState | null = null;

  async initialize(owner: string): Promise<boolean> {
    if (this.state) {
      return false;
    }
    this.state = { nextClaimId: 1, owner };
    return true;
  }

  async getRegistryState(): Promise<RegistryState> {
    return { ...this.requireState() };
  }

  async setOwner(owner: string | null): Promise<void> {
    this.requireState().owner = owner;
  }

  async createNext(draft: ClaimDraft): Promise<Claim> {
    const state = this.requireState();
    const claim: Claim = { ...draft, claimId: state.nextClaimId };
    this.claims.set(claim.claimId, { ...claim });
    const ids = this.byCustomerHash.get(claim.customerIdHash) ?? [];
    ids.push(claim.claimId);
    this.byCustomerHash.set(claim.customerIdHash, ids);
    state.nextClaimId = claim.claimId + 1;
    return { ...claim };
  }

  async getById(claimId: number): Promise<Claim | null> {
    const claim = this.claims.get(claimId);
    return claim ? { ...claim } : null;
  }

  async updateStatus(claimId: number, expected: ClaimStatus, status: ClaimStatus): Promise<boolean> {
    const claim = this.claims.get(claimId);
    if (!claim) {
      throw new Error(`Claim ${claimId} is not stored`);
    }
    if (claim.status !== expected) {
      return false;
    }
    claim.status = status;
    return true;
  }

  async findByCustomerHash(customerIdHash: string): Promise<Claim[]> {
    const ids = this.byCustomerHash.get(customerIdHash) ?? [];
    return ids.flatMap((id) => {
      const claim = this.claims.get(id);
      return claim ? [{ ...claim }] : [];
    });
  }

  private requireState(): RegistryState {
    if (!this.state) {
      throw new Error('Claim registry has not been initialized');
    }
    return this.state;
  }
}
