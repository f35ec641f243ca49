// apps/api/src/notifications/notification.listener.ts
import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { STATUS_CHANGE_MESSAGES } from '@shared/order';
import {
  DomainEventsBus,
  type CreditScoreChangedPayload,
  type OrderPlacedPayload,
  type OrderStatusChangedPayload,
} from '../messaging/domain-events.bus';
import { NotificationService } from './notification.service';

const formatAmount = (cents: number) => (cents / 100).toFixed(2);

/** Turns domain events into stored notifications for the affected users. */
@Injectable()
export class NotificationListener implements OnModuleInit, OnModuleDestroy {
  constructor(
    private readonly bus: DomainEventsBus,
    private readonly notifications: NotificationService,
  ) {}

  onModuleInit(): void {
    this.bus.on('order.placed', this.onOrderPlaced);
    this.bus.on('order.status.changed', this.onStatusChanged);
    this.bus.on('credit.score.changed', this.onCreditChanged);
  }

  onModuleDestroy(): void {
    this.bus.off('order.placed', this.onOrderPlaced);
    this.bus.off('order.status.changed', this.onStatusChanged);
    this.bus.off('credit.score.changed', this.onCreditChanged);
  }

  readonly onOrderPlaced = async (event: OrderPlacedPayload) => {
    const total = formatAmount(event.totalCents);
    await this.notifications.notify({
      userId: event.restaurantOwnerId,
      title: 'New Order',
      message: `You have a new order #${event.orderNumber} (Total: ${total})`,
    });
    await this.notifications.notify({
      userId: event.studentId,
      title: 'Order Confirmed',
      message: `Your order #${event.orderNumber} has been placed successfully. Total: ${total}`,
      type: 'success',
    });
  };

  readonly onStatusChanged = async (event: OrderStatusChangedPayload) => {
    if (event.actorId !== event.studentId) {
      const reason =
        event.to === 'cancelled' && event.reason ? ` Reason: ${event.reason}` : '';
      await this.notifications.notify({
        userId: event.studentId,
        title: 'Order Update',
        message: `${STATUS_CHANGE_MESSAGES[event.to]}${reason}`,
        type: event.to === 'delivered' ? 'success' : 'info',
      });
    }
    if (event.to === 'cancelled' && event.actorId !== event.restaurantOwnerId) {
      await this.notifications.notify({
        userId: event.restaurantOwnerId,
        title: 'Order Cancelled',
        message: `Order #${event.orderNumber} has been cancelled.`,
        type: 'warning',
      });
    }
  };

  readonly onCreditChanged = async (event: CreditScoreChangedPayload) => {
    if (event.delta === 0) return;
    if (event.delta < 0) {
      await this.notifications.notify({
        userId: event.userId,
        title: 'Credit Score Impact',
        message: `Your credit score dropped from ${event.previousScore} to ${event.newScore}. Reason: ${event.reason}`,
        type: 'warning',
      });
      return;
    }
    await this.notifications.notify({
      userId: event.userId,
      title: 'Credit Score Updated',
      message: `Your credit score rose from ${event.previousScore} to ${event.newScore}.`,
      type: 'success',
    });
  };
}
