import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { MenuItem } from '../restaurants/entities/menu-item.entity';
import { CartSessionListener } from './cart-session.listener';
import { CartService } from './cart.service';

const SHOP = '0b6c2f5e-6f0a-4d43-9a8e-3c1f2d4e5a61';
const OTHER_SHOP = '7d1e9a40-2b3c-4e5f-8a6b-9c0d1e2f3a4b';

describe('CartService', () => {
  let memory: InMemoryDataSource;
  let service: CartService;
  let dosa: MenuItem;
  let coffee: MenuItem;

  beforeEach(async () => {
    memory = new InMemoryDataSource();
    const items = memory.getRepository(MenuItem);
    dosa = await items.save(
      items.create({ restaurantId: SHOP, name: 'Masala Dosa', priceCents: 6000 }),
    );
    coffee = await items.save(
      items.create({ restaurantId: SHOP, name: 'Filter Coffee', priceCents: 2000 }),
    );
    service = new CartService(items);
  });

  it('adds items and totals the cart', async () => {
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 1 });
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 1 });
    const cart = await service.addItem('sess-1', {
      restaurantId: SHOP,
      menuItemId: coffee.id,
      quantity: 3,
    });

    expect(cart.items).toEqual([
      {
        menuItemId: dosa.id,
        name: 'Masala Dosa',
        unitPriceCents: 6000,
        quantity: 2,
        subtotalCents: 12000,
      },
      {
        menuItemId: coffee.id,
        name: 'Filter Coffee',
        unitPriceCents: 2000,
        quantity: 3,
        subtotalCents: 6000,
      },
    ]);
    expect(cart.itemCount).toBe(5);
    expect(cart.totalCents).toBe(18000);
  });

  it('keeps carts separate per session', async () => {
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 1 });

    const other = await service.getCart('sess-2', SHOP);

    expect(other).toEqual({ restaurantId: SHOP, items: [], itemCount: 0, totalCents: 0 });
  });

  it('removes an item when its quantity is set to zero', async () => {
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 2 });
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: coffee.id, quantity: 1 });

    const cart = await service.updateItem('sess-1', {
      restaurantId: SHOP,
      menuItemId: dosa.id,
      quantity: 0,
    });

    expect(cart.items.map((line) => line.name)).toEqual(['Filter Coffee']);
    expect(service.getLines('sess-1', SHOP)).toEqual({ [coffee.id]: 1 });
  });

  it('rejects items from another shop or not on offer', async () => {
    await expect(
      service.addItem('sess-1', { restaurantId: OTHER_SHOP, menuItemId: dosa.id, quantity: 1 }),
    ).rejects.toBeInstanceOf(ResourceNotFoundException);

    await memory.getRepository(MenuItem).update({ id: coffee.id }, { isAvailable: false });
    await expect(
      service.addItem('sess-1', { restaurantId: SHOP, menuItemId: coffee.id, quantity: 1 }),
    ).rejects.toBeInstanceOf(DomainValidationException);
  });

  it('clears a cart', async () => {
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 1 });
    service.clear('sess-1', SHOP);
    expect(service.getLines('sess-1', SHOP)).toEqual({});
  });

  it('caps the running quantity of a line', async () => {
    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 60 });

    await expect(
      service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 40 }),
    ).rejects.toThrow('At most 99 of Masala Dosa per order');
    expect(service.getLines('sess-1', SHOP)).toEqual({ [dosa.id]: 60 });
  });

  it('forgets the carts of an ended session', async () => {
    const bus = new DomainEventsBus();
    const listener = new CartSessionListener(bus, service);
    listener.onModuleInit();

    await service.addItem('sess-1', { restaurantId: SHOP, menuItemId: dosa.id, quantity: 1 });
    await service.addItem('sess-2', { restaurantId: SHOP, menuItemId: coffee.id, quantity: 1 });
    expect(service.sessionCount).toBe(2);

    bus.emit('session.ended', { userId: 'student-1', sessionIds: ['sess-1'] });
    await bus.drain();

    expect(service.sessionCount).toBe(1);
    expect(service.getLines('sess-1', SHOP)).toEqual({});
    expect(service.getLines('sess-2', SHOP)).toEqual({ [coffee.id]: 1 });

    listener.onModuleDestroy();
    expect(bus.listenerCount('session.ended')).toBe(0);
  });
});
