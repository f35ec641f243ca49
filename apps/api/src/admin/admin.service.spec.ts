import type { ConfigService } from '@nestjs/config';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { AuthService } from '../auth/auth.service';
import type { Actor } from '../auth/auth.types';
import { User, type UserRole } from '../auth/entities/user.entity';
import { UserSession } from '../auth/entities/user-session.entity';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import type { AppEnv } from '../config/env.schema';
import { CreditService } from '../credit/credit.service';
import { CreditHistory } from '../credit/entities/credit-history.entity';
import { CreditProfile } from '../credit/entities/credit-profile.entity';
import { CustomerFeedback } from '../feedback/entities/customer-feedback.entity';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { Order } from '../orders/entities/order.entity';
import type { OrdersService } from '../orders/orders.service';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { AdminService } from './admin.service';
import { AdminAction } from './entities/admin-action.entity';

describe('AdminService', () => {
  let memory: InMemoryDataSource;
  let events: { emit: jest.Mock };
  let service: AdminService;
  let admin: User;
  let ann: User;
  let bob: User;
  let owner: User;
  let context: { admin: Actor; ipAddress: string };

  const seedUser = (name: string, email: string, role: UserRole) => {
    const users = memory.getRepository(User);
    return users.save(users.create({ name, email, role }));
  };

  const profileOf = (userId: string) =>
    memory.store(CreditProfile).rows.find((row) => row.userId === userId);

  beforeEach(async () => {
    memory = new InMemoryDataSource();
    events = { emit: jest.fn() };

    admin = await seedUser('Root', 'admin@campus.test', 'admin');
    ann = await seedUser('Ann Lee', 'ann@campus.test', 'student');
    bob = await seedUser('Bob Stone', 'bob@campus.test', 'student');
    owner = await seedUser('Anand Rao', 'shop@campus.test', 'shop_owner');
    context = { admin: { id: admin.id, role: 'admin' }, ipAddress: '127.0.0.1' };

    const profiles = memory.getRepository(CreditProfile);
    await profiles.save([
      profiles.create({ userId: ann.id, score: 70, tier: 'average' }),
      profiles.create({ userId: bob.id, score: 92, tier: 'trusted' }),
    ]);

    const config = {
      get: jest.fn().mockReturnValue(604800),
    } as unknown as ConfigService<AppEnv, true>;
    const auth = new AuthService(
      memory.getRepository(User),
      memory.getRepository(UserSession),
      memory.asDataSource(),
      config,
      events as unknown as DomainEventsBus,
    );
    const credit = new CreditService(
      profiles,
      memory.getRepository(CreditHistory),
      memory.getRepository(Order),
      memory.getRepository(CustomerFeedback),
      memory.asDataSource(),
      events as unknown as DomainEventsBus,
    );
    const orders = {
      recent: (limit: number) =>
        memory
          .getRepository(Order)
          .find({ order: { createdAt: 'DESC' }, take: limit }),
    } as unknown as OrdersService;

    service = new AdminService(
      memory.getRepository(User),
      memory.getRepository(Restaurant),
      memory.getRepository(Order),
      profiles,
      memory.getRepository(AdminAction),
      memory.asDataSource(),
      auth,
      credit,
      orders,
    );
  });

  describe('overrideCreditScore', () => {
    it('sets the score directly and audits it', async () => {
      const result = await service.overrideCreditScore(
        ann.id,
        { score: 95, reason: 'Appeal upheld' },
        context,
      );

      expect(result).toEqual({
        success: true,
        userId: ann.id,
        previousScore: 70,
        newScore: 95,
        tier: 'trusted',
      });
      expect(profileOf(ann.id)).toMatchObject({ score: 95, tier: 'trusted' });
      expect(memory.store(CreditHistory).rows[0]).toMatchObject({
        event: 'admin_override',
        delta: 25,
        actorId: admin.id,
        actorRole: 'admin',
        reason: 'Appeal upheld',
      });
      expect(memory.store(AdminAction).rows[0]).toMatchObject({
        adminId: admin.id,
        actionType: 'override_credit_score',
        targetType: 'user',
        targetId: ann.id,
        details: '70 -> 95: Appeal upheld',
        ipAddress: '127.0.0.1',
      });
      expect(events.emit).toHaveBeenCalledWith(
        'credit.score.changed',
        expect.objectContaining({ event: 'admin_override', newScore: 95 }),
      );
    });

    it('rejects an out-of-range score and leaves no trace', async () => {
      await expect(
        service.overrideCreditScore(ann.id, { score: 150, reason: 'test' }, context),
      ).rejects.toBeInstanceOf(DomainValidationException);
      expect(profileOf(ann.id)?.score).toBe(70);
      expect(memory.store(CreditHistory).rows).toHaveLength(0);
      expect(memory.store(AdminAction).rows).toHaveLength(0);
      expect(events.emit).not.toHaveBeenCalled();
    });

    it('throws NotFound for an unknown user', async () => {
      await expect(
        service.overrideCreditScore('missing', { score: 50, reason: 'x' }, context),
      ).rejects.toBeInstanceOf(ResourceNotFoundException);
    });
  });

  describe('toggleUserActive', () => {
    it('deactivates a user and ends their sessions, then reactivates', async () => {
      const sessions = memory.getRepository(UserSession);
      await sessions.save(
        sessions.create({
          sessionId: 'sess-ann',
          userId: ann.id,
          expiresAt: new Date('2099-01-01T00:00:00Z'),
        }),
      );

      await expect(service.toggleUserActive(ann.id, context)).resolves.toEqual({
        success: true,
        userId: ann.id,
        isActive: false,
      });
      expect(memory.store(UserSession).rows).toHaveLength(0);
      expect(memory.store(AdminAction).rows[0]).toMatchObject({
        actionType: 'deactivate_user',
        details: 'ann@campus.test is now inactive',
      });

      const again = await service.toggleUserActive(ann.id, context);
      expect(again.isActive).toBe(true);
    });

    it('does not let an admin deactivate themselves', async () => {
      await expect(service.toggleUserActive(admin.id, context)).rejects.toThrow(
        'You cannot deactivate your own account',
      );
    });
  });

  it('toggles the trust badge of a restaurant', async () => {
    const restaurants = memory.getRepository(Restaurant);
    const shop = await restaurants.save(
      restaurants.create({ ownerId: owner.id, name: 'Tiffin Box', address: 'Block C' }),
    );

    await expect(service.toggleTrustBadge(shop.id, context)).resolves.toEqual({
      success: true,
      restaurantId: shop.id,
      trustBadge: true,
    });
    expect(memory.store(AdminAction).rows[0]).toMatchObject({
      actionType: 'grant_trust_badge',
      targetType: 'restaurant',
      details: 'Tiffin Box',
    });

    const listed = await service.listRestaurants({ page: 1, pageSize: 20 });
    expect(listed.items).toEqual([
      expect.objectContaining({
        name: 'Tiffin Box',
        trustBadge: true,
        ownerName: 'Anand Rao',
        totalOrders: 0,
      }),
    ]);
  });

  it('searches users by name or email and joins their credit', async () => {
    const found = await service.listUsers({ search: 'an', page: 1, pageSize: 20 });
    expect(found.total).toBe(2);
    expect(found.items.map((user) => user.name).sort()).toEqual([
      'Anand Rao',
      'Ann Lee',
    ]);

    const students = await service.listUsers({
      search: 'an',
      role: 'student',
      page: 1,
      pageSize: 20,
    });
    expect(students.items).toEqual([
      expect.objectContaining({
        id: ann.id,
        creditScore: 70,
        creditTier: 'average',
      }),
    ]);
  });

  describe('reporting', () => {
    const now = new Date('2030-05-10T15:00:00Z');

    beforeEach(async () => {
      const orders = memory.getRepository(Order);
      await orders.save([
        orders.create({
          orderNumber: 'TODAY001',
          studentId: ann.id,
          restaurantId: 'shop-1',
          status: 'delivered',
          totalCents: 5000,
          discountCents: 500,
          creditScoreAtOrder: 80,
          createdAt: new Date('2030-05-10T09:00:00Z'),
        }),
        orders.create({
          orderNumber: 'TODAY002',
          studentId: bob.id,
          restaurantId: 'shop-1',
          status: 'placed',
          totalCents: 3000,
          discountCents: 0,
          creditScoreAtOrder: 70,
          createdAt: new Date('2030-05-10T10:00:00Z'),
        }),
        orders.create({
          orderNumber: 'YSTRDY01',
          studentId: ann.id,
          restaurantId: 'shop-1',
          status: 'delivered',
          totalCents: 4000,
          discountCents: 0,
          creditScoreAtOrder: 90,
          createdAt: new Date('2030-05-09T10:00:00Z'),
        }),
      ]);
    });

    it('summarises today on the dashboard', async () => {
      const dashboard = await service.dashboard(now);

      expect(dashboard).toMatchObject({
        totalStudents: 2,
        totalShopOwners: 1,
        totalRestaurants: 0,
        todayOrders: 2,
        todayRevenueCents: 5000,
        todayDiscountCents: 500,
        tierCounts: { trusted: 1, good: 0, average: 1, risky: 0, blocked: 0 },
      });
      expect(dashboard.recentOrders.map((order) => order.orderNumber)).toEqual([
        'TODAY002',
        'TODAY001',
        'YSTRDY01',
      ]);
      expect(dashboard.recentOrders[0]).toMatchObject({
        studentName: 'Bob Stone',
        restaurantName: null,
      });
    });

    it('groups analytics by day, newest first', async () => {
      const analytics = await service.analytics(now);

      expect(analytics.dailyStats).toEqual([
        { date: '2030-05-10', orders: 2, revenueCents: 8000, avgCreditScore: 75 },
        { date: '2030-05-09', orders: 1, revenueCents: 4000, avgCreditScore: 90 },
      ]);
      expect(analytics.ordersByStatus).toEqual({
        placed: 1,
        preparing: 0,
        ready: 0,
        delivered: 2,
        cancelled: 0,
      });
      expect(analytics.creditDistribution.trusted).toBe(1);
    });
  });
});
