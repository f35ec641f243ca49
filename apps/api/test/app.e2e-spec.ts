import request from 'supertest';
import { Global, INestApplication, Module } from '@nestjs/common';
import { Test as NestTest, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { AppModule } from '../src/app.module';
import { AuthService } from '../src/auth/auth.service';
import { CartService } from '../src/cart/cart.service';
import { configureApp, getApiPrefix } from '../src/app.bootstrap';
import { DatabaseModule } from '../src/database/database.module';
import { DomainEventsBus } from '../src/messaging/domain-events.bus';
import { InMemoryDataSource } from './support/in-memory-data-source';

const memory = new InMemoryDataSource();

@Global()
@Module({
  providers: [{ provide: DataSource, useValue: memory.asDataSource() }],
  exports: [DataSource],
})
class InMemoryDatabaseModule {}

type Envelope<T = Record<string, unknown>> = {
  code: string;
  message: string;
  details: T;
};

const SLOT = {
  start: '2099-06-01T12:00:00Z',
  end: '2099-06-01T12:30:00Z',
};

describe('Campus pre-order API (e2e)', () => {
  let app: INestApplication;
  let bus: DomainEventsBus;
  const apiPrefix = `/${getApiPrefix()}`;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await NestTest.createTestingModule({
      imports: [AppModule],
    })
      .overrideModule(DatabaseModule)
      .useModule(InMemoryDatabaseModule)
      .compile();

    app = moduleFixture.createNestApplication();
    configureApp(app);
    await app.init();
    bus = app.get(DomainEventsBus);
  });

  afterAll(async () => {
    await app.close();
  });

  const agent = () => request.agent(app.getHttpServer());

  const register = async (body: Record<string, unknown>) => {
    const res = await request(app.getHttpServer())
      .post(`${apiPrefix}/auth/register`)
      .send(body)
      .expect(201);
    return (res.body as Envelope<{ id: string }>).details.id;
  };

  const login = async (email: string, password: string) => {
    const session = agent();
    await session
      .post(`${apiPrefix}/auth/login`)
      .send({ email, password })
      .expect(200);
    return session;
  };

  it('GET /api/v1/health returns the envelope', async () => {
    const res = await request(app.getHttpServer())
      .get(`${apiPrefix}/health`)
      .expect(200);
    const envelope = res.body as Envelope;
    expect(envelope.code).toBe('OK');
    expect(envelope.message).toBe('success');
    expect(envelope.details).toMatchObject({ status: 'ok' });
  });

  it('rejects unauthenticated access with an error envelope', async () => {
    const res = await request(app.getHttpServer())
      .get(`${apiPrefix}/orders`)
      .expect(401);
    expect(res.body).toEqual({
      code: 'HTTP_401',
      message: 'Missing session',
      details: null,
    });
  });

  it('runs an order from cart to delivery, feedback and an admin override', async () => {
    const studentId = await register({
      email: 'meera@campus.test',
      password: 'test-secret',
      name: 'Meera',
      role: 'student',
    });
    await register({
      email: 'canteen@campus.test',
      password: 'test-secret',
      name: 'Canteen Owner',
      role: 'shop_owner',
      restaurantName: 'Night Canteen',
      address: 'Hostel Road',
    });
    const student = await login('meera@campus.test', 'test-secret');
    const owner = await login('canteen@campus.test', 'test-secret');

    const shop = (
      (await owner.get(`${apiPrefix}/shop`).expect(200)).body as Envelope<{
        id: string;
        name: string;
      }>
    ).details;
    expect(shop.name).toBe('Night Canteen');

    const item = (
      (
        await owner
          .post(`${apiPrefix}/shop/menu`)
          .send({ name: 'Veg Thali', priceCents: 8000 })
          .expect(201)
      ).body as Envelope<{ id: string }>
    ).details;

    const listing = (
      await student.get(`${apiPrefix}/restaurants`).expect(200)
    ).body as Envelope<Array<{ id: string }>>;
    expect(listing.details.map((r) => r.id)).toEqual([shop.id]);

    const cart = (
      await student
        .post(`${apiPrefix}/cart/items`)
        .send({ restaurantId: shop.id, menuItemId: item.id, quantity: 2 })
        .expect(201)
    ).body as Envelope<{ totalCents: number }>;
    expect(cart.details.totalCents).toBe(16000);

    const placed = (
      await student
        .post(`${apiPrefix}/orders`)
        .send({
          restaurantId: shop.id,
          timeSlot: SLOT,
          deliveryAddress: 'Hostel A, Room 4',
          paymentMethod: 'cod',
        })
        .expect(201)
    ).body as Envelope<{
      orderId: string;
      totalCents: number;
      discountCents: number;
      creditTier: string;
    }>;
    expect(placed.details).toMatchObject({
      totalCents: 16000,
      discountCents: 0,
      creditTier: 'average',
    });
    const orderId = placed.details.orderId;

    const skipped = await owner
      .patch(`${apiPrefix}/orders/${orderId}/status`)
      .send({ status: 'ready' })
      .expect(422);
    expect(skipped.body).toEqual({
      code: 'ILLEGAL_TRANSITION',
      message: 'Illegal status transition: placed -> ready',
      details: { from: 'placed', to: 'ready' },
    });

    for (const status of ['preparing', 'ready', 'delivered']) {
      await owner
        .patch(`${apiPrefix}/orders/${orderId}/status`)
        .send({ status })
        .expect(200);
    }

    const credit = (await student.get(`${apiPrefix}/credit/me`).expect(200))
      .body as Envelope<{ score: number; tier: string }>;
    expect(credit.details).toMatchObject({ score: 72, tier: 'average' });

    await bus.drain();
    const notes = (await student.get(`${apiPrefix}/notifications`).expect(200))
      .body as Envelope<Array<{ title: string }>>;
    expect(notes.details.map((n) => n.title)).toContain('Credit Score Updated');

    const feedback = (
      await owner
        .post(`${apiPrefix}/feedback`)
        .send({ orderId, politeness: 5, punctuality: 5, authenticity: 5 })
        .expect(201)
    ).body as Envelope<{ creditDelta: number; newScore: number }>;
    expect(feedback.details).toMatchObject({ creditDelta: 3, newScore: 75 });

    await app.get(AuthService).createUser({
      email: 'root@campus.test',
      password: 'test-secret',
      name: 'Root',
      role: 'admin',
    });
    const admin = await login('root@campus.test', 'test-secret');

    const invalid = await admin
      .post(`${apiPrefix}/admin/users/${studentId}/credit-score`)
      .send({ score: 150, reason: 'test' })
      .expect(400);
    expect((invalid.body as Envelope).code).toBe('VALIDATION_ERROR');

    const override = (
      await admin
        .post(`${apiPrefix}/admin/users/${studentId}/credit-score`)
        .send({ score: 25, reason: 'Repeated no-shows' })
        .expect(200)
    ).body as Envelope<{ newScore: number; tier: string }>;
    expect(override.details).toMatchObject({ newScore: 25, tier: 'blocked' });

    const blocked = await student
      .post(`${apiPrefix}/orders`)
      .send({
        restaurantId: shop.id,
        items: [{ menuItemId: item.id, quantity: 1 }],
        timeSlot: SLOT,
        deliveryAddress: 'Hostel A, Room 4',
        paymentMethod: 'cod',
      })
      .expect(403);
    expect(blocked.body).toEqual({
      code: 'ACCOUNT_BLOCKED',
      message: 'Your credit score is too low to place orders',
      details: { score: 25 },
    });

    await student
      .patch(`${apiPrefix}/orders/${orderId}/status`)
      .send({ status: 'delivered' })
      .expect(403);

    const carts = app.get(CartService);
    await student
      .post(`${apiPrefix}/cart/items`)
      .send({ restaurantId: shop.id, menuItemId: item.id, quantity: 1 })
      .expect(201);
    expect(carts.sessionCount).toBe(1);

    await student.post(`${apiPrefix}/auth/logout`).expect(200);
    await bus.drain();
    expect(carts.sessionCount).toBe(0);
    await student.get(`${apiPrefix}/cart/${shop.id}`).expect(401);
  });
});
