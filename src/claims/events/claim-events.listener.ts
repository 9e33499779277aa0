import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { statusName } from '../domain/claim';
import {
  CLAIM_PROCESSED,
  CLAIM_STATUS_UPDATED,
  CLAIM_SUBMITTED,
  ClaimProcessedEvent,
  ClaimRegistryEvent,
  ClaimStatusUpdatedEvent,
  ClaimSubmittedEvent,
  OWNERSHIP_TRANSFERRED,
  OwnershipTransferredEvent
} from './claim.events';

@Injectable()
export class ClaimEventsListener {
  private readonly logger = new Logger(ClaimEventsListener.name);

  @OnEvent(CLAIM_SUBMITTED)
  onSubmitted(event: ClaimSubmittedEvent): void {
    this.logger.log(this.describe(event));
  }

  @OnEvent(CLAIM_STATUS_UPDATED)
  onStatusUpdated(event: ClaimStatusUpdatedEvent): void {
    this.logger.log(this.describe(event));
  }

  @OnEvent(CLAIM_PROCESSED)
  onProcessed(event: ClaimProcessedEvent): void {
    this.logger.log(this.describe(event));
  }

  @OnEvent(OWNERSHIP_TRANSFERRED)
  onOwnershipTransferred(event: OwnershipTransferredEvent): void {
    this.logger.log(this.describe(event));
  }

  describe(event: ClaimRegistryEvent): string {
    switch (event.name) {
      case CLAIM_SUBMITTED:
        return `ClaimSubmitted claimId=${event.claimId} customerIdHash=${event.customerIdHash} amount=${event.amount} timestamp=${event.timestamp} submitter=${event.submitter}`;
      case CLAIM_STATUS_UPDATED:
        return `ClaimStatusUpdated claimId=${event.claimId} ${statusName(event.oldStatus)} -> ${statusName(event.newStatus)} timestamp=${event.timestamp} updater=${event.updater}`;
      case CLAIM_PROCESSED:
        return `ClaimProcessed claimId=${event.claimId} customerIdHash=${event.customerIdHash} amount=${event.amount} status=${statusName(event.status)} timestamp=${event.timestamp}`;
      case OWNERSHIP_TRANSFERRED:
        return `OwnershipTransferred ${event.previousOwner ?? 'none'} -> ${event.newOwner ?? 'none'}`;
    }
  }
}
