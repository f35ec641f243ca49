// apps/api/src/messaging/domain-events.bus.ts
import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { EventEmitter } from 'events';
import type { CreditEvent, CreditTier } from '@shared/credit';
import type { OrderStatus } from '@shared/order';
import { AppLogger } from '../common/app-logger';

export type OrderPlacedPayload = {
  orderId: string;
  orderNumber: string;
  studentId: string;
  restaurantId: string;
  restaurantOwnerId: string;
  totalCents: number;
};

export type OrderStatusChangedPayload = {
  orderId: string;
  orderNumber: string;
  studentId: string;
  restaurantId: string;
  restaurantOwnerId: string;
  from: OrderStatus;
  to: OrderStatus;
  actorId: string;
  reason?: string;
};

export type CreditScoreChangedPayload = {
  userId: string;
  event: CreditEvent;
  delta: number;
  previousScore: number;
  newScore: number;
  tier: CreditTier;
  reason: string;
  orderId?: string;
};

/** Sessions that ended by logout, expiry or account deactivation. */
export type SessionEndedPayload = {
  userId: string;
  sessionIds: string[];
};

export type DomainEventMap = {
  'order.placed': OrderPlacedPayload;
  'order.status.changed': OrderStatusChangedPayload;
  'credit.score.changed': CreditScoreChangedPayload;
  'session.ended': SessionEndedPayload;
};

export type DomainEventName = keyof DomainEventMap;

type Listener<K extends DomainEventName> = (
  payload: DomainEventMap[K],
) => Promise<void> | void;

/**
 * In-process observer for domain events. Delivery is best-effort: a failing
 * listener is logged and never reaches the publisher.
 */
@Injectable()
export class DomainEventsBus implements OnApplicationShutdown {
  private readonly logger = new AppLogger(DomainEventsBus.name);
  private readonly emitter = new EventEmitter();
  private readonly wrappers = new Map<
    DomainEventName,
    Map<unknown, (payload: unknown) => void>
  >();
  private readonly inflight = new Set<Promise<void>>();

  emit<K extends DomainEventName>(event: K, payload: DomainEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  on<K extends DomainEventName>(event: K, listener: Listener<K>): void {
    const wrapped = (payload: unknown) => {
      const delivery = Promise.resolve()
        .then(() => listener(payload as DomainEventMap[K]))
        .catch((error: unknown) => {
          this.logger.error(
            `Listener for ${event} failed: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        })
        .finally(() => {
          this.inflight.delete(delivery);
        });
      this.inflight.add(delivery);
    };
    const forEvent = this.wrappers.get(event) ?? new Map();
    forEvent.set(listener, wrapped);
    this.wrappers.set(event, forEvent);
    this.emitter.on(event, wrapped);
  }

  off<K extends DomainEventName>(event: K, listener: Listener<K>): void {
    const wrapped = this.wrappers.get(event)?.get(listener);
    if (!wrapped) return;
    this.emitter.off(event, wrapped);
    this.wrappers.get(event)?.delete(listener);
  }

  listenerCount(event: DomainEventName): number {
    return this.emitter.listenerCount(event);
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.drain();
  }
}
