import { Test } from '@nestjs/testing';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Logger } from '@nestjs/common';
import { ClaimEventsListener } from './claim-events.listener';
import { EventEmitterClaimEventPublisher } from './event-emitter.claim-event-publisher';
import { CLAIM_PROCESSED, CLAIM_STATUS_UPDATED, CLAIM_SUBMITTED, OWNERSHIP_TRANSFERRED } from './claim.events';
import { ClaimStatus } from '../domain/claim';

describe('claim events', () => {
  const listener = new ClaimEventsListener();

  it('describes every event kind on one line', () => {
    expect(
      listener.describe({
        name: CLAIM_SUBMITTED,
        claimId: 1,
        customerIdHash: '0xaa',
        amount: 5n,
        timestamp: 1700000000,
        submitter: 'user-a'
      })
    ).toBe('ClaimSubmitted claimId=1 customerIdHash=0xaa amount=5 timestamp=1700000000 submitter=user-a');
    expect(
      listener.describe({
        name: CLAIM_STATUS_UPDATED,
        claimId: 1,
        oldStatus: ClaimStatus.Submitted,
        newStatus: ClaimStatus.Rejected,
        timestamp: 1700000001,
        updater: 'owner-1'
      })
    ).toBe('ClaimStatusUpdated claimId=1 Submitted -> Rejected timestamp=1700000001 updater=owner-1');
    expect(
      listener.describe({
        name: CLAIM_PROCESSED,
        claimId: 1,
        customerIdHash: '0xaa',
        amount: 5n,
        status: ClaimStatus.Rejected,
        timestamp: 1700000001
      })
    ).toBe('ClaimProcessed claimId=1 customerIdHash=0xaa amount=5 status=Rejected timestamp=1700000001');
    expect(listener.describe({ name: OWNERSHIP_TRANSFERRED, previousOwner: null, newOwner: 'owner-1' })).toBe(
      'OwnershipTransferred none -> owner-1'
    );
  });

  it('delivers published events to the listener', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [ClaimEventsListener, EventEmitterClaimEventPublisher]
    }).compile();
    await moduleRef.init();

    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    moduleRef
      .get(EventEmitterClaimEventPublisher)
      .publish({ name: OWNERSHIP_TRANSFERRED, previousOwner: 'owner-1', newOwner: null });

    expect(log).toHaveBeenCalledWith('OwnershipTransferred owner-1 -> none');
    log.mockRestore();
    await moduleRef.close();
  });
});
