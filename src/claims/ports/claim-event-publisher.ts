import { ClaimRegistryEvent } from '../events/claim.events';

export interface ClaimEventPublisher {
  publish(event: ClaimRegistryEvent): void;
}
