import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DynamoService } from './dynamo.service';
import { DynamoClaimRepository } from './dynamo.claim.repository';

@Module({
  imports: [ConfigModule],
  providers: [DynamoService, DynamoClaimRepository],
  exports: [DynamoService, DynamoClaimRepository]
})
export class DynamoModule {}
