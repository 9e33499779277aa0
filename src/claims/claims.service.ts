import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import pLimit from 'p-limit';
import { ClaimRepository } from './ports/claim-repository';
import { ClaimEventPublisher } from './ports/claim-event-publisher';
import { Clock } from './ports/clock';
import { Claim, ClaimStatus, MAX_UINT256, isTerminal, parseClaimStatus, statusName } from './domain/claim';
import {
  ClaimNotFoundError,
  InvalidAmountError,
  InvalidOwnerError,
  InvalidStatusError,
  StatusAlreadySetError,
  UnauthorizedCallerError
} from './domain/claim-errors';
import { hashCustomerId } from './domain/customer-hash';
import { serializeClaim, serializeClaims } from './domain/claim-serializer';
import {
  CLAIM_PROCESSED,
  CLAIM_STATUS_UPDATED,
  CLAIM_SUBMITTED,
  OWNERSHIP_TRANSFERRED
} from './events/claim.events';
import { ConfigService } from '../config/config.service';

const IDENTITY_PATTERN = /^\S+$/;

export interface StatusChange {
  claimId: number;
  oldStatus: ClaimStatus;
  newStatus: ClaimStatus;
}

@Injectable()
export class ClaimsService implements OnModuleInit {
  private readonly logger = new Logger(ClaimsService.name);
  private readonly writes = pLimit(1);

  constructor(
    @Inject('ClaimRepository') private readonly claims: ClaimRepository,
    @Inject('ClaimEventPublisher') private readonly events: ClaimEventPublisher,
    @Inject('Clock') private readonly clock: Clock,
    private readonly config: ConfigService
  ) {}

  async onModuleInit(): Promise<void> {
    const owner = this.config.getRegistry().initialOwner;
    const created = await this.claims.initialize(owner);
    if (created) {
      this.logger.log(`Initialized claim registry owned by ${owner}`);
      this.events.publish({ name: OWNERSHIP_TRANSFERRED, previousOwner: null, newOwner: owner });
    }
  }

  async submitClaim(customerId: string, amount: bigint, submitter: string): Promise<number> {
    if (amount <= 0n || amount > MAX_UINT256) {
      throw new InvalidAmountError(amount.toString());
    }

    return this.writes(async () => {
      const customerIdHash = hashCustomerId(customerId);
      const claim = await this.claims.createNext({
        customerIdHash,
        amount,
        claimDate: this.clock.now(),
        status: ClaimStatus.Submitted
      });
      const { claimId } = claim;

      this.logger.log(`Claim ${claimId} submitted by ${submitter}`);
      this.events.publish({
        name: CLAIM_SUBMITTED,
        claimId,
        customerIdHash,
        amount,
        timestamp: claim.claimDate,
        submitter
      });
      return claimId;
    });
  }

  async updateClaimStatus(claimId: number, newStatus: unknown, updater: string): Promise<StatusChange> {
    return this.writes(async () => {
      await this.requireOwner(updater);
      const claim = await this.requireClaim(claimId);

      const status = parseClaimStatus(newStatus);
      if (status === null) {
        throw new InvalidStatusError(newStatus);
      }
      // terminal claims reject every transition under the same code as a repeated one
      if (status === claim.status || isTerminal(claim.status)) {
        throw new StatusAlreadySetError(claimId, statusName(claim.status));
      }

      const updated = await this.claims.updateStatus(claimId, claim.status, status);
      if (!updated) {
        throw new StatusAlreadySetError(claimId, statusName(claim.status));
      }
      const timestamp = this.clock.now();

      this.logger.log(`Claim ${claimId} moved ${statusName(claim.status)} -> ${statusName(status)} by ${updater}`);
      this.events.publish({
        name: CLAIM_STATUS_UPDATED,
        claimId,
        oldStatus: claim.status,
        newStatus: status,
        timestamp,
        updater
      });
      if (isTerminal(status)) {
        this.events.publish({
          name: CLAIM_PROCESSED,
          claimId,
          customerIdHash: claim.customerIdHash,
          amount: claim.amount,
          status,
          timestamp
        });
      }
      return { claimId, oldStatus: claim.status, newStatus: status };
    });
  }

  async getClaim(claimId: number): Promise<Claim> {
    return this.requireClaim(claimId);
  }

  async verifyClaimOwnership(claimId: number, customerId: string): Promise<boolean> {
    const claim = await this.requireClaim(claimId);
    return hashCustomerId(customerId) === claim.customerIdHash;
  }

  async serializeClaim(claimId: number): Promise<string> {
    return serializeClaim(await this.requireClaim(claimId));
  }

  async listCustomerClaimsAsText(customerId: string): Promise<string> {
    const claims = await this.claims.findByCustomerHash(hashCustomerId(customerId));
    return serializeClaims(claims);
  }

  async owner(): Promise<string | null> {
    const state = await this.claims.getRegistryState();
    return state.owner;
  }

  async transferOwnership(newOwner: string, caller: string): Promise<void> {
    return this.writes(async () => {
      const previousOwner = await this.requireOwner(caller);
      if (!IDENTITY_PATTERN.test(newOwner)) {
        throw new InvalidOwnerError();
      }
      await this.claims.setOwner(newOwner);

      this.logger.log(`Registry ownership transferred ${previousOwner} -> ${newOwner}`);
      this.events.publish({ name: OWNERSHIP_TRANSFERRED, previousOwner, newOwner });
    });
  }

  async renounceOwnership(caller: string): Promise<void> {
    return this.writes(async () => {
      const previousOwner = await this.requireOwner(caller);
      await this.claims.setOwner(null);

      this.logger.log(`Registry ownership renounced by ${previousOwner}`);
      this.events.publish({ name: OWNERSHIP_TRANSFERRED, previousOwner, newOwner: null });
    });
  }

  private async requireOwner(caller: string): Promise<string> {
    const { owner } = await this.claims.getRegistryState();
    if (owner === null || owner !== caller) {
      this.logger.warn(`Rejected owner-only call from ${caller}`);
      throw new UnauthorizedCallerError(caller);
    }
    return owner;
  }

  private async requireClaim(claimId: number): Promise<Claim> {
    const claim = await this.claims.getById(claimId);
    if (!claim) {
      throw new ClaimNotFoundError(claimId);
    }
    return claim;
  }
}
