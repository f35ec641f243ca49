// apps/api/src/cart/cart-session.listener.ts
import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import {
  DomainEventsBus,
  type SessionEndedPayload,
} from '../messaging/domain-events.bus';
import { CartService } from './cart.service';

/** Drops the in-memory carts of sessions that have ended. */
@Injectable()
export class CartSessionListener implements OnModuleInit, OnModuleDestroy {
  constructor(
    private readonly bus: DomainEventsBus,
    private readonly carts: CartService,
  ) {}

  onModuleInit(): void {
    this.bus.on('session.ended', this.onSessionEnded);
  }

  onModuleDestroy(): void {
    this.bus.off('session.ended', this.onSessionEnded);
  }

  readonly onSessionEnded = (event: SessionEndedPayload) => {
    for (const sessionId of event.sessionIds) {
      this.carts.dropSession(sessionId);
    }
  };
}
