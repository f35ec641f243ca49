import type { ConfigService } from '@nestjs/config';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { User } from '../auth/entities/user.entity';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import type { AppEnv } from '../config/env.schema';
import { CreditService } from '../credit/credit.service';
import { CreditHistory } from '../credit/entities/credit-history.entity';
import { CreditProfile } from '../credit/entities/credit-profile.entity';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { Order } from '../orders/entities/order.entity';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { CustomerFeedback } from './entities/customer-feedback.entity';
import { FeedbackService } from './feedback.service';

const OWNER = 'owner-1';

describe('FeedbackService', () => {
  let memory: InMemoryDataSource;
  let events: { emit: jest.Mock };
  let service: FeedbackService;
  let shop: Restaurant;
  let student: User;

  const seedOrder = async (
    orderNumber: string,
    status: Order['status'] = 'delivered',
    restaurantId = shop.id,
  ) => {
    const orders = memory.getRepository(Order);
    return orders.save(
      orders.create({
        orderNumber,
        studentId: student.id,
        restaurantId,
        status,
        totalCents: 6000,
        deliveredAt: status === 'delivered' ? new Date('2030-03-01T10:00:00Z') : null,
      }),
    );
  };

  const scoreOf = () => memory.store(CreditProfile).rows[0].score;

  beforeEach(async () => {
    memory = new InMemoryDataSource();
    events = { emit: jest.fn() };

    const users = memory.getRepository(User);
    student = await users.save(
      users.create({ email: 'ravi@example.test', name: 'Ravi', role: 'student' }),
    );
    const profiles = memory.getRepository(CreditProfile);
    await profiles.save(profiles.create({ userId: student.id, score: 70 }));

    const restaurants = memory.getRepository(Restaurant);
    shop = await restaurants.save(
      restaurants.create({ ownerId: OWNER, name: 'Chai Point', address: 'Gate 2' }),
    );

    const credit = new CreditService(
      profiles,
      memory.getRepository(CreditHistory),
      memory.getRepository(Order),
      memory.getRepository(CustomerFeedback),
      memory.asDataSource(),
      events as unknown as DomainEventsBus,
    );
    const config = {
      get: jest.fn().mockReturnValue(4),
    } as unknown as ConfigService<AppEnv, true>;

    service = new FeedbackService(
      memory.getRepository(CustomerFeedback),
      memory.getRepository(Order),
      restaurants,
      users,
      memory.asDataSource(),
      credit,
      config,
    );
  });

  it('rewards good feedback with +3', async () => {
    const order = await seedOrder('A1B2C3D4');

    const result = await service.submit(OWNER, {
      orderId: order.id,
      politeness: 5,
      punctuality: 4,
      authenticity: 4,
      comments: 'Picked up on time',
    });

    expect(result).toMatchObject({
      success: true,
      overallRating: 4.33,
      creditEvent: 'positive_feedback',
      creditDelta: 3,
      newScore: 73,
    });
    expect(scoreOf()).toBe(73);
    expect(memory.store(CustomerFeedback).rows[0]).toMatchObject({
      orderId: order.id,
      studentId: student.id,
      restaurantId: shop.id,
      comments: 'Picked up on time',
    });
    expect(memory.store(CreditHistory).rows[0]).toMatchObject({
      event: 'positive_feedback',
      actorId: OWNER,
      actorRole: 'shop_owner',
      orderId: order.id,
    });
    expect(events.emit).toHaveBeenCalledWith(
      'credit.score.changed',
      expect.objectContaining({ userId: student.id, delta: 3 }),
    );
  });

  it('penalises poor feedback with -3', async () => {
    const order = await seedOrder('A1B2C3D4');
    const result = await service.submit(OWNER, {
      orderId: order.id,
      politeness: 3,
      punctuality: 3,
      authenticity: 4,
    });
    expect(result.overallRating).toBe(3.33);
    expect(result.creditEvent).toBe('negative_feedback');
    expect(scoreOf()).toBe(67);
  });

  it('accepts one submission per order', async () => {
    const order = await seedOrder('A1B2C3D4');
    const dto = { orderId: order.id, politeness: 5, punctuality: 5, authenticity: 5 };
    await service.submit(OWNER, dto);

    await expect(service.submit(OWNER, dto)).rejects.toThrow(
      'Feedback already submitted for this order',
    );
    expect(scoreOf()).toBe(73);
    expect(memory.store(CustomerFeedback).rows).toHaveLength(1);
  });

  it('only rates delivered orders of the owner shop', async () => {
    const preparing = await seedOrder('PREP0001', 'preparing');
    await expect(
      service.submit(OWNER, {
        orderId: preparing.id,
        politeness: 5,
        punctuality: 5,
        authenticity: 5,
      }),
    ).rejects.toBeInstanceOf(DomainValidationException);

    const foreign = await seedOrder('OTHR0001', 'delivered', 'another-shop');
    await expect(
      service.submit(OWNER, {
        orderId: foreign.id,
        politeness: 5,
        punctuality: 5,
        authenticity: 5,
      }),
    ).rejects.toBeInstanceOf(ResourceNotFoundException);
    expect(scoreOf()).toBe(70);
  });

  it('lists delivered orders still awaiting feedback', async () => {
    const rated = await seedOrder('RATED001');
    const waiting = await seedOrder('WAIT0001');
    await seedOrder('PREP0001', 'preparing');
    await service.submit(OWNER, {
      orderId: rated.id,
      politeness: 4,
      punctuality: 4,
      authenticity: 4,
    });

    expect(await service.pending(OWNER)).toEqual([
      {
        orderId: waiting.id,
        orderNumber: 'WAIT0001',
        studentId: student.id,
        studentName: 'Ravi',
        totalCents: 6000,
        deliveredAt: new Date('2030-03-01T10:00:00Z'),
      },
    ]);
  });

  it('summarises feedback for the shop', async () => {
    const first = await seedOrder('ORDR0001');
    const second = await seedOrder('ORDR0002');
    await seedOrder('ORDR0003');
    await service.submit(OWNER, {
      orderId: first.id,
      politeness: 5,
      punctuality: 5,
      authenticity: 5,
    });
    await service.submit(OWNER, {
      orderId: second.id,
      politeness: 3,
      punctuality: 3,
      authenticity: 3,
    });

    expect(await service.stats(OWNER)).toEqual({
      totalFeedback: 2,
      averageRating: 4,
      positive: 1,
      negative: 1,
      lastThirtyDays: 2,
      deliveredOrders: 3,
      responseRate: 67,
    });
    const history = await service.history(OWNER);
    expect(history.map((row) => row.orderId).sort()).toEqual(
      [first.id, second.id].sort(),
    );
  });
});
