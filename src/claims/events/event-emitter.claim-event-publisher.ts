import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ClaimEventPublisher } from '../ports/claim-event-publisher';
import { ClaimRegistryEvent } from './claim.events';

@Injectable()
export class EventEmitterClaimEventPublisher implements ClaimEventPublisher {
  constructor(private readonly emitter: EventEmitter2) {}

  publish(event: ClaimRegistryEvent): void {
    this.emitter.emit(event.name, event);
  }
}
