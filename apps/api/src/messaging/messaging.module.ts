import { Global, Module } from '@nestjs/common';
import { DomainEventsBus } from './domain-events.bus';

@Global()
@Module({
  providers: [DomainEventsBus],
  exports: [DomainEventsBus],
})
export class MessagingModule {}
