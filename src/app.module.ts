import { Module, ValidationPipe } from '@nestjs/common';
import { APP_PIPE } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ConfigModule } from './config/config.module';
import { ClaimsModule } from './claims/claims.module';

@Module({
  imports: [EventEmitterModule.forRoot(), ConfigModule, ClaimsModule],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true })
    }
  ]
})
export class AppModule {}
