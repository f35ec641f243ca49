// apps/api/src/orders/orders.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import {
  computeDiscountCents,
  creditWarnings,
  discountPercentForTier,
  tierForScore,
} from '@shared/credit';
import {
  MAX_ORDER_CENTS,
  type CancelOrderInput,
  type CreateOrderInput,
  type CreateOrderItemInput,
  type OrderStatus,
  type TimeSlotInput,
} from '@shared/order';
import type { Actor, AuthUser } from '../auth/auth.types';
import { CartService } from '../cart/cart.service';
import { AppLogger } from '../common/app-logger';
import {
  AccountBlockedException,
  ConcurrentUpdateException,
  DomainValidationException,
  IllegalTransitionException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { cancellationCreditEvent } from '../credit/credit-policy';
import { CreditService, type AppliedCreditEvent } from '../credit/credit.service';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { MenuItem } from '../restaurants/entities/menu-item.entity';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { OrderItem } from './entities/order-item.entity';
import { Order } from './entities/order.entity';
import { assertAdvanceAllowed, assertCancellable } from './order-status';

const ORDER_NUMBER_ATTEMPTS = 5;

export type OrderView = Order & { items: OrderItem[] };

export type CreateOrderResult = {
  orderId: string;
  orderNumber: string;
  status: OrderStatus;
  subtotalCents: number;
  discountPercent: number;
  discountCents: number;
  totalCents: number;
  creditScore: number;
  creditTier: string;
  timeSlot: { start: string; end: string };
  warnings: string[];
};

type ParsedTimeSlot = { start: Date; end: Date };

type TransitionOutcome = {
  order: Order;
  from: OrderStatus;
  ownerId: string;
  credit: AppliedCreditEvent | null;
};

export function generateOrderNumber(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase();
}

/** Parses an ISO-8601 slot; the slot must end after it starts and not lie in the past. */
export function parseTimeSlot(
  slot: TimeSlotInput,
  now: Date = new Date(),
): ParsedTimeSlot {
  const start = DateTime.fromISO(slot.start, { setZone: true });
  const end = DateTime.fromISO(slot.end, { setZone: true });
  if (!start.isValid || !end.isValid) {
    throw new DomainValidationException('Time slot must be ISO-8601 timestamps', {
      timeSlot: slot,
    });
  }
  if (end.toMillis() <= start.toMillis()) {
    throw new DomainValidationException('Time slot must end after it starts');
  }
  if (end.toMillis() <= now.getTime()) {
    throw new DomainValidationException('Time slot has already passed');
  }
  return { start: start.toJSDate(), end: end.toJSDate() };
}

/** Sums quantities of repeated items, keeping first-seen order. */
export function mergeOrderLines(
  lines: readonly CreateOrderItemInput[],
): CreateOrderItemInput[] {
  const merged = new Map<string, number>();
  for (const line of lines) {
    merged.set(line.menuItemId, (merged.get(line.menuItemId) ?? 0) + line.quantity);
  }
  return [...merged.entries()].map(([menuItemId, quantity]) => ({
    menuItemId,
    quantity,
  }));
}

@Injectable()
export class OrdersService {
  private readonly logger = new AppLogger(OrdersService.name);
  private readonly orderLocks = new KeyedMutex();

  constructor(
    @InjectRepository(Order)
    private readonly orders: Repository<Order>,
    @InjectRepository(OrderItem)
    private readonly orderItems: Repository<OrderItem>,
    @InjectRepository(Restaurant)
    private readonly restaurants: Repository<Restaurant>,
    @InjectRepository(MenuItem)
    private readonly menuItems: Repository<MenuItem>,
    private readonly dataSource: DataSource,
    private readonly creditService: CreditService,
    private readonly cartService: CartService,
    private readonly events: DomainEventsBus,
  ) {}

  /**
   * Places an order in `placed`. Prices come from the menu, the discount from
   * the student's current credit tier, and both are frozen on the order.
   */
  async create(
    student: AuthUser,
    input: CreateOrderInput,
    sessionId?: string,
  ): Promise<CreateOrderResult> {
    const deliveryAddress = input.deliveryAddress?.trim() ?? '';
    if (!deliveryAddress) {
      throw new DomainValidationException('Delivery address is required');
    }
    if (!input.paymentMethod) {
      throw new DomainValidationException('Select a payment method');
    }
    const slot = parseTimeSlot(input.timeSlot);

    const requested =
      input.items ??
      (sessionId
        ? Object.entries(this.cartService.getLines(sessionId, input.restaurantId)).map(
            ([menuItemId, quantity]) => ({ menuItemId, quantity }),
          )
        : []);
    const lines = mergeOrderLines(requested);
    if (lines.length === 0) {
      throw new DomainValidationException('Cart is empty');
    }

    const restaurant = await this.restaurants.findOne({
      where: { id: input.restaurantId },
    });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant', input.restaurantId);
    }
    if (!restaurant.isOpen) {
      throw new DomainValidationException(`${restaurant.name} is currently closed`);
    }

    const menu = await this.menuItems.find({
      where: {
        id: In(lines.map((line) => line.menuItemId)),
        restaurantId: restaurant.id,
      },
    });
    const menuById = new Map(menu.map((item) => [item.id, item]));
    const priced = lines.map((line) => {
      const item = menuById.get(line.menuItemId);
      if (!item) {
        throw new DomainValidationException(
          `Menu item ${line.menuItemId} does not belong to ${restaurant.name}`,
        );
      }
      if (!item.isAvailable) {
        throw new DomainValidationException(`${item.name} is not available`);
      }
      return { item, quantity: line.quantity };
    });

    if (!student.isActive) {
      throw new AccountBlockedException('Your account has been deactivated');
    }
    const profile = await this.creditService.getProfileEntity(student.id);
    const tier = tierForScore(profile.score);
    if (tier === 'blocked') {
      this.logger.warn(
        `Blocked student ${student.id} (score ${profile.score}) tried to order`,
      );
      throw new AccountBlockedException(
        'Your credit score is too low to place orders',
        { score: profile.score },
      );
    }

    const subtotalCents = priced.reduce(
      (sum, line) => sum + line.item.priceCents * line.quantity,
      0,
    );
    if (subtotalCents > MAX_ORDER_CENTS) {
      throw new DomainValidationException('Order total is too large', {
        subtotalCents,
      });
    }
    const discountPercent = discountPercentForTier(tier);
    const discountCents = computeDiscountCents(subtotalCents, discountPercent);
    const totalCents = subtotalCents - discountCents;

    const order = await this.dataSource.transaction(async (manager) => {
      const orders = manager.getRepository(Order);
      const items = manager.getRepository(OrderItem);
      const orderNumber = await this.allocateOrderNumber(orders);

      const saved = await orders.save(
        orders.create({
          orderNumber,
          studentId: student.id,
          restaurantId: restaurant.id,
          status: 'placed',
          timeSlotStart: slot.start,
          timeSlotEnd: slot.end,
          subtotalCents,
          discountCents,
          totalCents,
          discountPercent,
          creditScoreAtOrder: profile.score,
          creditTierAtOrder: tier,
          deliveryAddress,
          paymentMethod: input.paymentMethod,
          paymentStatus: 'pending',
          cancelledBy: null,
          cancellationReason: null,
          revision: 0,
          deliveredAt: null,
        }),
      );
      await items.save(
        priced.map((line, position) =>
          items.create({
            orderId: saved.id,
            menuItemId: line.item.id,
            name: line.item.name,
            quantity: line.quantity,
            unitPriceCents: line.item.priceCents,
            position,
          }),
        ),
      );
      return saved;
    });

    if (sessionId) {
      this.cartService.clear(sessionId, restaurant.id);
    }

    this.logger.log(
      `Order ${order.orderNumber} placed by ${student.id} at ${restaurant.id} (${totalCents})`,
    );
    this.events.emit('order.placed', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      studentId: student.id,
      restaurantId: restaurant.id,
      restaurantOwnerId: restaurant.ownerId,
      totalCents,
    });

    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      status: order.status,
      subtotalCents,
      discountPercent,
      discountCents,
      totalCents,
      creditScore: profile.score,
      creditTier: tier,
      timeSlot: {
        start: slot.start.toISOString(),
        end: slot.end.toISOString(),
      },
      warnings: tier === 'risky' ? creditWarnings(profile.score) : [],
    };
  }

  private async allocateOrderNumber(orders: Repository<Order>): Promise<string> {
    for (let attempt = 0; attempt < ORDER_NUMBER_ATTEMPTS; attempt += 1) {
      const candidate = generateOrderNumber();
      const taken = await orders.count({ where: { orderNumber: candidate } });
      if (taken === 0) return candidate;
    }
    throw new Error('Could not allocate a unique order number');
  }

  /** Moves an order exactly one step forward. Only the shop's owner may do so. */
  async advance(orderId: string, newStatus: OrderStatus, actor: Actor) {
    const outcome = await this.mutate(orderId, async (manager, order) => {
      const ownerId = await this.ownerOf(manager, order.restaurantId);
      if (actor.id !== ownerId) {
        throw new IllegalTransitionException(
          'Only the restaurant owner can update this order',
        );
      }
      assertAdvanceAllowed(order.status, newStatus);

      const delivered = newStatus === 'delivered';
      await this.writeStatus(manager, order, {
        status: newStatus,
        ...(delivered
          ? { deliveredAt: new Date(), paymentStatus: 'completed' as const }
          : {}),
      });

      const credit = delivered
        ? await this.creditService.applyEvent(manager, order.studentId, {
            type: 'on_time_delivery',
            reason: `Order ${order.orderNumber} delivered`,
            actorId: actor.id,
            actorRole: 'shop_owner',
            orderId: order.id,
          })
        : null;

      return { order, from: order.status, ownerId, credit };
    });

    this.publishTransition(outcome, newStatus, actor);
    return { success: true, orderId, previousStatus: outcome.from, newStatus };
  }

  /**
   * Cancels a non-terminal order. The student, the shop's owner or an admin may
   * cancel; a no-show can only be recorded by the shop or an admin once ready.
   */
  async cancel(orderId: string, actor: Actor, input: CancelOrderInput) {
    const reason = input.reason?.trim() ?? '';
    if (!reason) {
      throw new DomainValidationException('A cancellation reason is required');
    }
    const noShow = input.noShow === true;
    if (noShow && actor.role === 'student') {
      throw new DomainValidationException(
        'Only the shop or an admin can record a no-show',
      );
    }

    const outcome = await this.mutate(orderId, async (manager, order) => {
      const ownerId = await this.ownerOf(manager, order.restaurantId);
      const allowed =
        actor.role === 'admin' ||
        (actor.role === 'student' && order.studentId === actor.id) ||
        (actor.role === 'shop_owner' && ownerId === actor.id);
      if (!allowed) {
        throw new IllegalTransitionException('Not allowed to cancel this order');
      }
      assertCancellable(order.status);
      if (noShow && order.status !== 'ready') {
        throw new IllegalTransitionException(
          `A no-show can only be recorded for a ready order (is ${order.status})`,
        );
      }

      await this.writeStatus(manager, order, {
        status: 'cancelled',
        cancelledBy: actor.role,
        cancellationReason: reason,
      });

      const event = cancellationCreditEvent({
        from: order.status,
        cancelledBy: actor.role,
        noShow,
      });
      const credit = await this.creditService.applyEvent(manager, order.studentId, {
        type: event,
        reason: `Order ${order.orderNumber} cancelled: ${reason}`,
        actorId: actor.id,
        actorRole: actor.role,
        orderId: order.id,
      });

      return { order, from: order.status, ownerId, credit };
    });

    this.publishTransition(outcome, 'cancelled', actor, reason);
    return {
      success: true,
      orderId,
      previousStatus: outcome.from,
      newStatus: 'cancelled' as const,
      creditEvent: outcome.credit?.entry.event ?? null,
      creditDelta: outcome.credit?.entry.delta ?? 0,
    };
  }

  /**
   * Runs one status change under the order lock and the student's credit lock,
   * in a single transaction over a freshly read order.
   */
  private async mutate(
    orderId: string,
    work: (manager: EntityManager, order: Order) => Promise<TransitionOutcome>,
  ): Promise<TransitionOutcome> {
    const snapshot = await this.orders.findOne({ where: { id: orderId } });
    if (!snapshot) {
      throw new ResourceNotFoundException('Order', orderId);
    }

    return this.orderLocks.runExclusive(orderId, () =>
      this.creditService.runExclusive(snapshot.studentId, () =>
        this.dataSource.transaction(async (manager) => {
          const order = await manager
            .getRepository(Order)
            .findOne({ where: { id: orderId } });
          if (!order) {
            throw new ResourceNotFoundException('Order', orderId);
          }
          return work(manager, order);
        }),
      ),
    );
  }

  private async writeStatus(
    manager: EntityManager,
    order: Order,
    patch: Partial<Order>,
  ): Promise<void> {
    const result = await manager
      .getRepository(Order)
      .update(
        { id: order.id, revision: order.revision },
        { ...patch, revision: order.revision + 1 },
      );
    if (!result.affected) {
      throw new ConcurrentUpdateException('Order', order.id);
    }
  }

  private async ownerOf(manager: EntityManager, restaurantId: string) {
    const restaurant = await manager
      .getRepository(Restaurant)
      .findOne({ where: { id: restaurantId } });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant', restaurantId);
    }
    return restaurant.ownerId;
  }

  private publishTransition(
    outcome: TransitionOutcome,
    to: OrderStatus,
    actor: Actor,
    reason?: string,
  ) {
    const { order, from } = outcome;
    this.logger.log(`Order ${order.orderNumber} ${from} -> ${to} by ${actor.id}`);
    this.events.emit('order.status.changed', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      studentId: order.studentId,
      restaurantId: order.restaurantId,
      restaurantOwnerId: outcome.ownerId,
      from,
      to,
      actorId: actor.id,
      reason,
    });
    if (outcome.credit) {
      this.creditService.publish(outcome.credit);
    }
  }

  // ---- read models ----

  async getOrder(orderId: string, viewer: Actor): Promise<OrderView> {
    const order = await this.orders.findOne({ where: { id: orderId } });
    if (!order) {
      throw new ResourceNotFoundException('Order', orderId);
    }
    const visible =
      viewer.role === 'admin' ||
      (viewer.role === 'student' && order.studentId === viewer.id) ||
      (viewer.role === 'shop_owner' &&
        (await this.restaurants.count({
          where: { id: order.restaurantId, ownerId: viewer.id },
        })) > 0);
    if (!visible) {
      throw new ResourceNotFoundException('Order', orderId);
    }
    return this.withItems(order);
  }

  async listForStudent(studentId: string, status?: OrderStatus): Promise<OrderView[]> {
    const orders = await this.orders.find({
      where: status ? { studentId, status } : { studentId },
      order: { createdAt: 'DESC' },
    });
    return Promise.all(orders.map((order) => this.withItems(order)));
  }

  async listForOwner(ownerId: string, status?: OrderStatus): Promise<OrderView[]> {
    const restaurant = await this.restaurants.findOne({ where: { ownerId } });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant for owner', ownerId);
    }
    const orders = await this.orders.find({
      where: status
        ? { restaurantId: restaurant.id, status }
        : { restaurantId: restaurant.id },
      order: { createdAt: 'DESC' },
    });
    return Promise.all(orders.map((order) => this.withItems(order)));
  }

  async recent(limit = 10): Promise<Order[]> {
    return this.orders.find({ order: { createdAt: 'DESC' }, take: limit });
  }

  private async withItems(order: Order): Promise<OrderView> {
    const items = await this.orderItems.find({
      where: { orderId: order.id },
      order: { position: 'ASC' },
    });
    return { ...order, items };
  }
}
