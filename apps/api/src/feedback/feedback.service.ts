// apps/api/src/feedback/feedback.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DateTime } from 'luxon';
import { DataSource, In, MoreThanOrEqual, Repository } from 'typeorm';
import { User } from '../auth/entities/user.entity';
import { AppLogger } from '../common/app-logger';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import type { AppEnv } from '../config/env.schema';
import { feedbackCreditEvent } from '../credit/credit-policy';
import { CreditService } from '../credit/credit.service';
import { Order } from '../orders/entities/order.entity';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import type { SubmitFeedbackDto } from './dto/submit-feedback.dto';
import { CustomerFeedback } from './entities/customer-feedback.entity';

export type PendingFeedback = {
  orderId: string;
  orderNumber: string;
  studentId: string;
  studentName: string | null;
  totalCents: number;
  deliveredAt: Date | null;
};

@Injectable()
export class FeedbackService {
  private readonly logger = new AppLogger(FeedbackService.name);

  constructor(
    @InjectRepository(CustomerFeedback)
    private readonly feedback: Repository<CustomerFeedback>,
    @InjectRepository(Order)
    private readonly orders: Repository<Order>,
    @InjectRepository(Restaurant)
    private readonly restaurants: Repository<Restaurant>,
    @InjectRepository(User)
    private readonly users: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly creditService: CreditService,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  /**
   * Rates the student behind a delivered order. One submission per order; the
   * resulting credit event is written in the same transaction.
   */
  async submit(ownerId: string, dto: SubmitFeedbackDto) {
    const restaurant = await this.ownedRestaurant(ownerId);
    const order = await this.orders.findOne({ where: { id: dto.orderId } });
    if (!order || order.restaurantId !== restaurant.id) {
      throw new ResourceNotFoundException('Order', dto.orderId);
    }
    if (order.status !== 'delivered') {
      throw new DomainValidationException(
        'Feedback can only be given for delivered orders',
        { status: order.status },
      );
    }

    const { event, overallRating } = feedbackCreditEvent(
      dto,
      this.config.get('FEEDBACK_POSITIVE_THRESHOLD', { infer: true }),
    );

    const applied = await this.creditService.runExclusive(order.studentId, () =>
      this.dataSource.transaction(async (manager) => {
        const rows = manager.getRepository(CustomerFeedback);
        if ((await rows.count({ where: { orderId: order.id } })) > 0) {
          throw new DomainValidationException(
            'Feedback already submitted for this order',
          );
        }

        const credit = await this.creditService.applyEvent(
          manager,
          order.studentId,
          {
            type: event,
            reason: `Feedback for order ${order.orderNumber}`,
            actorId: ownerId,
            actorRole: 'shop_owner',
            orderId: order.id,
          },
        );
        const saved = await rows.save(
          rows.create({
            orderId: order.id,
            restaurantId: restaurant.id,
            studentId: order.studentId,
            politeness: dto.politeness,
            punctuality: dto.punctuality,
            authenticity: dto.authenticity,
            overallRating,
            comments: dto.comments ?? '',
            creditEvent: event,
            creditDelta: credit.entry.delta,
          }),
        );
        return { saved, credit };
      }),
    );

    this.creditService.publish(applied.credit);
    this.logger.log(
      `Feedback on ${order.orderNumber}: ${overallRating} (${event})`,
    );

    return {
      success: true,
      feedbackId: applied.saved.id,
      overallRating,
      creditEvent: event,
      creditDelta: applied.credit.entry.delta,
      newScore: applied.credit.score,
    };
  }

  /** Delivered orders of the owner's shop still waiting for feedback. */
  async pending(ownerId: string): Promise<PendingFeedback[]> {
    const restaurant = await this.ownedRestaurant(ownerId);
    const delivered = await this.orders.find({
      where: { restaurantId: restaurant.id, status: 'delivered' },
      order: { deliveredAt: 'DESC' },
    });
    if (delivered.length === 0) return [];

    const rated = await this.feedback.find({
      where: { orderId: In(delivered.map((order) => order.id)) },
    });
    const ratedIds = new Set(rated.map((row) => row.orderId));
    const waiting = delivered.filter((order) => !ratedIds.has(order.id));

    const students = await this.users.find({
      where: { id: In([...new Set(waiting.map((order) => order.studentId))]) },
    });
    const names = new Map(students.map((user) => [user.id, user.name]));

    return waiting.map((order) => ({
      orderId: order.id,
      orderNumber: order.orderNumber,
      studentId: order.studentId,
      studentName: names.get(order.studentId) ?? null,
      totalCents: order.totalCents,
      deliveredAt: order.deliveredAt,
    }));
  }

  async history(ownerId: string, limit = 50): Promise<CustomerFeedback[]> {
    const restaurant = await this.ownedRestaurant(ownerId);
    return this.feedback.find({
      where: { restaurantId: restaurant.id },
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }

  async stats(ownerId: string, now: Date = new Date()) {
    const restaurant = await this.ownedRestaurant(ownerId);
    const rows = await this.feedback.find({
      where: { restaurantId: restaurant.id },
    });
    const since = DateTime.fromJSDate(now).minus({ days: 30 }).toJSDate();
    const lastThirtyDays = await this.feedback.count({
      where: { restaurantId: restaurant.id, createdAt: MoreThanOrEqual(since) },
    });
    const deliveredOrders = await this.orders.count({
      where: { restaurantId: restaurant.id, status: 'delivered' },
    });

    const averageRating =
      rows.length === 0
        ? null
        : Math.round(
            (rows.reduce((sum, row) => sum + row.overallRating, 0) / rows.length) *
              100,
          ) / 100;

    return {
      totalFeedback: rows.length,
      averageRating,
      positive: rows.filter((row) => row.creditEvent === 'positive_feedback')
        .length,
      negative: rows.filter((row) => row.creditEvent === 'negative_feedback')
        .length,
      lastThirtyDays,
      deliveredOrders,
      responseRate:
        deliveredOrders === 0
          ? 0
          : Math.round((rows.length * 100) / deliveredOrders),
    };
  }

  private async ownedRestaurant(ownerId: string): Promise<Restaurant> {
    const restaurant = await this.restaurants.findOne({ where: { ownerId } });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant for owner', ownerId);
    }
    return restaurant;
  }
}
