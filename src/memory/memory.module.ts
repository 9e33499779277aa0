import { Module } from '@nestjs/common';
import { InMemoryClaimRepository } from './in-memory.claim.repository';

@Module({
  providers: [InMemoryClaimRepository],
  exports: [InMemoryClaimRepository]
})
export class MemoryModule {}
