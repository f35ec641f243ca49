// apps/api/src/credit/credit.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  CREDIT_TIER_LABELS,
  CreditTiers,
  creditBadgeClass,
  creditMeterPosition,
  creditWarnings,
  discountPercentForTier,
  type CreditTier,
} from '@shared/credit';
import { OrderStatuses, type OrderStatus } from '@shared/order';
import { AppLogger } from '../common/app-logger';
import {
  ConcurrentUpdateException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { CustomerFeedback } from '../feedback/entities/customer-feedback.entity';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { Order } from '../orders/entities/order.entity';
import {
  adjust,
  type CreditAdjustment,
  type CreditEventInput,
} from './credit-policy';
import { CreditHistory } from './entities/credit-history.entity';
import { CreditProfile } from './entities/credit-profile.entity';

export const MAX_HISTORY_LIMIT = 50;

export type AppliedCreditEvent = CreditAdjustment & {
  history: CreditHistory;
};

@Injectable()
export class CreditService {
  private readonly logger = new AppLogger(CreditService.name);
  private readonly studentLocks = new KeyedMutex();

  constructor(
    @InjectRepository(CreditProfile)
    private readonly profiles: Repository<CreditProfile>,
    @InjectRepository(CreditHistory)
    private readonly history: Repository<CreditHistory>,
    @InjectRepository(Order)
    private readonly orders: Repository<Order>,
    @InjectRepository(CustomerFeedback)
    private readonly feedback: Repository<CustomerFeedback>,
    private readonly dataSource: DataSource,
    private readonly events: DomainEventsBus,
  ) {}

  /** Serialises every score change for one student. */
  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.studentLocks.runExclusive(userId, task);
  }

  async getProfileEntity(userId: string): Promise<CreditProfile> {
    const profile = await this.profiles.findOne({ where: { userId } });
    if (!profile) {
      throw new ResourceNotFoundException('Credit profile', userId);
    }
    return profile;
  }

  /**
   * Applies one event inside the caller's transaction. The profile row is
   * guarded by its revision; a concurrent writer makes this throw instead of
   * overwriting.
   */
  async applyEvent(
    manager: EntityManager,
    userId: string,
    input: CreditEventInput,
  ): Promise<AppliedCreditEvent> {
    const profiles = manager.getRepository(CreditProfile);
    const history = manager.getRepository(CreditHistory);

    const profile = await profiles.findOne({ where: { userId } });
    if (!profile) {
      throw new ResourceNotFoundException('Credit profile', userId);
    }

    const result = adjust(profile, input);
    const update = await profiles.update(
      { id: profile.id, revision: profile.revision },
      { score: result.score, tier: result.tier, revision: profile.revision + 1 },
    );
    if (!update.affected) {
      throw new ConcurrentUpdateException('Credit profile', userId);
    }

    const saved = await history.save(history.create(result.entry));
    this.logger.log(
      `Credit ${input.type} for ${userId}: ${result.entry.previousScore} -> ${result.score}`,
    );
    return { ...result, history: saved };
  }

  /** Locks, applies and publishes a standalone event (not tied to an order write). */
  async adjustScore(
    userId: string,
    input: CreditEventInput,
  ): Promise<AppliedCreditEvent> {
    const applied = await this.runExclusive(userId, () =>
      this.dataSource.transaction((manager) =>
        this.applyEvent(manager, userId, input),
      ),
    );
    this.publish(applied);
    return applied;
  }

  /** Notifies observers; call only after the surrounding transaction commits. */
  publish(applied: AppliedCreditEvent): void {
    const { entry } = applied;
    this.events.emit('credit.score.changed', {
      userId: entry.userId,
      event: entry.event,
      delta: entry.delta,
      previousScore: entry.previousScore,
      newScore: entry.newScore,
      tier: applied.tier,
      reason: entry.reason,
      orderId: entry.orderId ?? undefined,
    });
  }

  async getProfile(userId: string) {
    const profile = await this.getProfileEntity(userId);
    return {
      userId: profile.userId,
      score: profile.score,
      tier: profile.tier,
      tierLabel: CREDIT_TIER_LABELS[profile.tier],
      discountPercent: discountPercentForTier(profile.tier),
      badgeClass: creditBadgeClass(profile.score),
      meterPosition: creditMeterPosition(profile.score),
      warnings: creditWarnings(profile.score),
      updatedAt: profile.updatedAt,
    };
  }

  async getHistory(userId: string, limit = 10): Promise<CreditHistory[]> {
    await this.getProfileEntity(userId);
    const take = Math.min(Math.max(1, Math.trunc(limit)), MAX_HISTORY_LIMIT);
    return this.history.find({
      where: { userId },
      order: { createdAt: 'DESC' },
      take,
    });
  }

  /** Order counts by status and the mean rating shops have given the student. */
  async getStats(userId: string) {
    const profile = await this.getProfileEntity(userId);

    const ordersByStatus: Record<OrderStatus, number> = {
      placed: 0,
      preparing: 0,
      ready: 0,
      delivered: 0,
      cancelled: 0,
    };
    for (const status of OrderStatuses) {
      ordersByStatus[status] = await this.orders.count({
        where: { studentId: userId, status },
      });
    }
    const totalOrders = Object.values(ordersByStatus).reduce(
      (sum, count) => sum + count,
      0,
    );

    const ratings = await this.feedback.find({ where: { studentId: userId } });
    const averageRating =
      ratings.length === 0
        ? null
        : Math.round(
            (ratings.reduce((sum, row) => sum + row.overallRating, 0) /
              ratings.length) *
              100,
          ) / 100;

    return {
      score: profile.score,
      tier: profile.tier,
      totalOrders,
      ordersByStatus,
      feedbackCount: ratings.length,
      averageRating,
    };
  }

  async countByTier(): Promise<Record<CreditTier, number>> {
    const counts: Record<CreditTier, number> = {
      trusted: 0,
      good: 0,
      average: 0,
      risky: 0,
      blocked: 0,
    };
    for (const tier of CreditTiers) {
      counts[tier] = await this.profiles.count({ where: { tier } });
    }
    return counts;
  }
}
