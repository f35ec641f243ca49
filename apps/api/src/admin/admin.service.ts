// apps/api/src/admin/admin.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DateTime } from 'luxon';
import {
  DataSource,
  FindOptionsWhere,
  ILike,
  In,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import type { AdminOverrideInput } from '@shared/credit';
import { OrderStatuses, type OrderStatus } from '@shared/order';
import { AuthService } from '../auth/auth.service';
import type { Actor } from '../auth/auth.types';
import { User } from '../auth/entities/user.entity';
import { AppLogger } from '../common/app-logger';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import { CreditService } from '../credit/credit.service';
import { CreditProfile } from '../credit/entities/credit-profile.entity';
import { Order } from '../orders/entities/order.entity';
import { OrdersService } from '../orders/orders.service';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import type {
  AdminRestaurantListQuery,
  AdminUserListQuery,
} from './dto/admin-query.dto';
import {
  AdminAction,
  type AdminActionTarget,
} from './entities/admin-action.entity';

type ActionContext = { admin: Actor; ipAddress?: string | null };

export type DailyOrderStats = {
  date: string;
  orders: number;
  revenueCents: number;
  avgCreditScore: number;
};

@Injectable()
export class AdminService {
  private readonly logger = new AppLogger(AdminService.name);

  constructor(
    @InjectRepository(User)
    private readonly users: Repository<User>,
    @InjectRepository(Restaurant)
    private readonly restaurants: Repository<Restaurant>,
    @InjectRepository(Order)
    private readonly orders: Repository<Order>,
    @InjectRepository(CreditProfile)
    private readonly profiles: Repository<CreditProfile>,
    @InjectRepository(AdminAction)
    private readonly actions: Repository<AdminAction>,
    private readonly dataSource: DataSource,
    private readonly authService: AuthService,
    private readonly creditService: CreditService,
    private readonly ordersService: OrdersService,
  ) {}

  async dashboard(now: Date = new Date()) {
    const startOfDay = DateTime.fromJSDate(now, { zone: 'utc' })
      .startOf('day')
      .toJSDate();
    const todays = await this.orders.find({
      where: { createdAt: MoreThanOrEqual(startOfDay) },
    });
    const delivered = todays.filter((order) => order.status === 'delivered');

    const [totalStudents, totalShopOwners, totalRestaurants, tierCounts] =
      await Promise.all([
        this.users.count({ where: { role: 'student' } }),
        this.users.count({ where: { role: 'shop_owner' } }),
        this.restaurants.count(),
        this.creditService.countByTier(),
      ]);

    return {
      totalStudents,
      totalShopOwners,
      totalRestaurants,
      todayOrders: todays.length,
      todayRevenueCents: delivered.reduce((sum, o) => sum + o.totalCents, 0),
      todayDiscountCents: todays.reduce((sum, o) => sum + o.discountCents, 0),
      tierCounts,
      recentOrders: await this.recentOrders(20),
    };
  }

  /** Orders per UTC day over the last 30 days, newest first, plus the tier spread. */
  async analytics(now: Date = new Date()) {
    const since = DateTime.fromJSDate(now, { zone: 'utc' })
      .minus({ days: 30 })
      .toJSDate();
    const recent = await this.orders.find({
      where: { createdAt: MoreThanOrEqual(since) },
    });

    const byDay = new Map<string, Order[]>();
    for (const order of recent) {
      const day =
        DateTime.fromJSDate(order.createdAt, { zone: 'utc' }).toISODate() ?? '';
      byDay.set(day, [...(byDay.get(day) ?? []), order]);
    }
    const dailyStats: DailyOrderStats[] = [...byDay.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .map(([date, orders]) => ({
        date,
        orders: orders.length,
        revenueCents: orders.reduce((sum, o) => sum + o.totalCents, 0),
        avgCreditScore:
          Math.round(
            (orders.reduce((sum, o) => sum + o.creditScoreAtOrder, 0) /
              orders.length) *
              100,
          ) / 100,
      }));

    const ordersByStatus: Record<OrderStatus, number> = {
      placed: 0,
      preparing: 0,
      ready: 0,
      delivered: 0,
      cancelled: 0,
    };
    for (const status of OrderStatuses) {
      ordersByStatus[status] = await this.orders.count({ where: { status } });
    }

    return {
      dailyStats,
      ordersByStatus,
      creditDistribution: await this.creditService.countByTier(),
    };
  }

  async recentOrders(limit = 20) {
    const orders = await this.ordersService.recent(limit);
    const [students, restaurants] = await Promise.all([
      this.users.find({
        where: { id: In([...new Set(orders.map((o) => o.studentId))]) },
      }),
      this.restaurants.find({
        where: { id: In([...new Set(orders.map((o) => o.restaurantId))]) },
      }),
    ]);
    const studentNames = new Map(students.map((u) => [u.id, u.name]));
    const restaurantNames = new Map(restaurants.map((r) => [r.id, r.name]));

    return orders.map((order) => ({
      id: order.id,
      orderNumber: order.orderNumber,
      status: order.status,
      totalCents: order.totalCents,
      discountCents: order.discountCents,
      creditScoreAtOrder: order.creditScoreAtOrder,
      studentId: order.studentId,
      studentName: studentNames.get(order.studentId) ?? null,
      restaurantId: order.restaurantId,
      restaurantName: restaurantNames.get(order.restaurantId) ?? null,
      createdAt: order.createdAt,
    }));
  }

  // ---- users ----

  async listUsers(query: AdminUserListQuery) {
    const base: FindOptionsWhere<User> = query.role ? { role: query.role } : {};
    const where: FindOptionsWhere<User>[] = query.search
      ? [
          { ...base, name: ILike(`%${query.search}%`) },
          { ...base, email: ILike(`%${query.search}%`) },
        ]
      : [base];

    const [total, users] = await Promise.all([
      this.users.count({ where }),
      this.users.find({
        where,
        order: { createdAt: 'DESC' },
        skip: (query.page - 1) * query.pageSize,
        take: query.pageSize,
      }),
    ]);
    const profiles = await this.profiles.find({
      where: { userId: In(users.map((user) => user.id)) },
    });
    const profileMap = new Map(profiles.map((p) => [p.userId, p]));

    return {
      page: query.page,
      pageSize: query.pageSize,
      total,
      items: users.map((user) => {
        const profile = profileMap.get(user.id);
        return {
          id: user.id,
          name: user.name,
          email: user.email,
          phone: user.phone,
          role: user.role,
          isActive: user.isActive,
          createdAt: user.createdAt,
          creditScore: profile?.score ?? null,
          creditTier: profile?.tier ?? null,
        };
      }),
    };
  }

  /** Flips `isActive`; deactivation also ends the user's sessions. */
  async toggleUserActive(userId: string, context: ActionContext) {
    if (userId === context.admin.id) {
      throw new DomainValidationException('You cannot deactivate your own account');
    }
    const user = await this.users.findOne({ where: { id: userId } });
    if (!user) {
      throw new ResourceNotFoundException('User', userId);
    }

    const isActive = !user.isActive;
    await this.dataSource.transaction(async (manager) => {
      await manager.getRepository(User).update({ id: user.id }, { isActive });
      await this.recordAction(manager.getRepository(AdminAction), context, {
        actionType: isActive ? 'activate_user' : 'deactivate_user',
        targetType: 'user',
        targetId: user.id,
        details: `${user.email} is now ${isActive ? 'active' : 'inactive'}`,
      });
    });
    if (!isActive) {
      await this.authService.revokeUserSessions(user.id);
    }

    this.logger.log(`User ${user.id} isActive=${isActive} by ${context.admin.id}`);
    return { success: true, userId: user.id, isActive };
  }

  /** Sets a student's score directly; the audit entry shares the transaction. */
  async overrideCreditScore(
    userId: string,
    input: AdminOverrideInput,
    context: ActionContext,
  ) {
    const user = await this.users.findOne({ where: { id: userId } });
    if (!user) {
      throw new ResourceNotFoundException('User', userId);
    }

    const applied = await this.creditService.runExclusive(userId, () =>
      this.dataSource.transaction(async (manager) => {
        const result = await this.creditService.applyEvent(manager, userId, {
          type: 'admin_override',
          value: input.score,
          reason: input.reason,
          actorId: context.admin.id,
          actorRole: 'admin',
        });
        await this.recordAction(manager.getRepository(AdminAction), context, {
          actionType: 'override_credit_score',
          targetType: 'user',
          targetId: userId,
          details: `${result.entry.previousScore} -> ${result.score}: ${result.entry.reason}`,
        });
        return result;
      }),
    );
    this.creditService.publish(applied);

    return {
      success: true,
      userId,
      previousScore: applied.entry.previousScore,
      newScore: applied.score,
      tier: applied.tier,
    };
  }

  // ---- restaurants ----

  async listRestaurants(query: AdminRestaurantListQuery) {
    const where: FindOptionsWhere<Restaurant>[] = query.search
      ? [{ name: ILike(`%${query.search}%`) }]
      : [{}];
    const [total, restaurants] = await Promise.all([
      this.restaurants.count({ where }),
      this.restaurants.find({
        where,
        order: { name: 'ASC' },
        skip: (query.page - 1) * query.pageSize,
        take: query.pageSize,
      }),
    ]);
    const owners = await this.users.find({
      where: { id: In(restaurants.map((r) => r.ownerId)) },
    });
    const ownerNames = new Map(owners.map((u) => [u.id, u.name]));

    const items = await Promise.all(
      restaurants.map(async (restaurant) => ({
        id: restaurant.id,
        name: restaurant.name,
        cuisineType: restaurant.cuisineType,
        isOpen: restaurant.isOpen,
        rating: restaurant.rating,
        trustBadge: restaurant.trustBadge,
        ownerId: restaurant.ownerId,
        ownerName: ownerNames.get(restaurant.ownerId) ?? null,
        totalOrders: await this.orders.count({
          where: { restaurantId: restaurant.id },
        }),
      })),
    );

    return { page: query.page, pageSize: query.pageSize, total, items };
  }

  async toggleTrustBadge(restaurantId: string, context: ActionContext) {
    const restaurant = await this.restaurants.findOne({
      where: { id: restaurantId },
    });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant', restaurantId);
    }

    const trustBadge = !restaurant.trustBadge;
    await this.dataSource.transaction(async (manager) => {
      await manager
        .getRepository(Restaurant)
        .update({ id: restaurant.id }, { trustBadge });
      await this.recordAction(manager.getRepository(AdminAction), context, {
        actionType: trustBadge ? 'grant_trust_badge' : 'revoke_trust_badge',
        targetType: 'restaurant',
        targetId: restaurant.id,
        details: restaurant.name,
      });
    });

    return { success: true, restaurantId: restaurant.id, trustBadge };
  }

  async listActions(limit = 50): Promise<AdminAction[]> {
    return this.actions.find({ order: { createdAt: 'DESC' }, take: limit });
  }

  private recordAction(
    repo: Repository<AdminAction>,
    context: ActionContext,
    action: {
      actionType: string;
      targetType: AdminActionTarget;
      targetId: string;
      details: string;
    },
  ): Promise<AdminAction> {
    return repo.save(
      repo.create({
        adminId: context.admin.id,
        ...action,
        ipAddress: context.ipAddress ?? null,
      }),
    );
  }
}
