import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { ConfigService } from '../config/config.service';
import { DynamoModule } from '../dynamodb/dynamo.module';
import { MemoryModule } from '../memory/memory.module';
import { DynamoClaimRepository } from '../dynamodb/dynamo.claim.repository';
import { InMemoryClaimRepository } from '../memory/in-memory.claim.repository';
import { ClaimRepository } from './ports/claim-repository';
import { systemClock } from './ports/clock';
import { EventEmitterClaimEventPublisher } from './events/event-emitter.claim-event-publisher';
import { ClaimEventsListener } from './events/claim-events.listener';
import { ClaimsController } from './claims.controller';
import { RegistryController } from './registry.controller';
import { ClaimsService } from './claims.service';

@Module({
  imports: [ConfigModule, DynamoModule, MemoryModule],
  controllers: [ClaimsController, RegistryController],
  providers: [
    ClaimsService,
    ClaimEventsListener,
    EventEmitterClaimEventPublisher,
    {
      provide: 'ClaimRepository',
      inject: [ConfigService, InMemoryClaimRepository, DynamoClaimRepository],
      useFactory: (
        config: ConfigService,
        memory: InMemoryClaimRepository,
        dynamo: DynamoClaimRepository
      ): ClaimRepository => (config.getRegistry().storageDriver === 'dynamodb' ? dynamo : memory)
    },
    { provide: 'ClaimEventPublisher', useExisting: EventEmitterClaimEventPublisher },
    { provide: 'Clock', useValue: systemClock }
  ]
})
export class ClaimsModule {}
