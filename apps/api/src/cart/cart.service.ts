// apps/api/src/cart/cart.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  addCartLine,
  cartItemCount,
  cartTotalCents,
  setCartLine,
  type AddCartItemInput,
  type CartLineView,
  type CartLines,
  type UpdateCartItemInput,
} from '@shared/cart';
import { MAX_ITEM_QUANTITY } from '@shared/order';
import {
  DomainValidationException,
  ResourceNotFoundException,
} from '../common/errors/domain-errors';
import { MenuItem } from '../restaurants/entities/menu-item.entity';

export type CartView = {
  restaurantId: string;
  items: CartLineView[];
  itemCount: number;
  totalCents: number;
};

/**
 * Session-scoped carts held in process memory: session -> restaurant -> lines.
 * Carts are transient and are not persisted.
 */
@Injectable()
export class CartService {
  private readonly carts = new Map<string, Map<string, CartLines>>();

  constructor(
    @InjectRepository(MenuItem)
    private readonly menuItems: Repository<MenuItem>,
  ) {}

  getLines(sessionId: string, restaurantId: string): CartLines {
    return this.carts.get(sessionId)?.get(restaurantId) ?? {};
  }

  private setLines(sessionId: string, restaurantId: string, lines: CartLines) {
    const byRestaurant = this.carts.get(sessionId) ?? new Map<string, CartLines>();
    if (Object.keys(lines).length === 0) {
      byRestaurant.delete(restaurantId);
    } else {
      byRestaurant.set(restaurantId, lines);
    }
    if (byRestaurant.size === 0) {
      this.carts.delete(sessionId);
    } else {
      this.carts.set(sessionId, byRestaurant);
    }
  }

  async addItem(sessionId: string, input: AddCartItemInput): Promise<CartView> {
    const item = await this.menuItems.findOne({
      where: { id: input.menuItemId, restaurantId: input.restaurantId },
    });
    if (!item) {
      throw new ResourceNotFoundException('Menu item', input.menuItemId);
    }
    if (!item.isAvailable) {
      throw new DomainValidationException(`${item.name} is not available`);
    }

    const lines = addCartLine(
      this.getLines(sessionId, input.restaurantId),
      item.id,
      input.quantity,
    );
    if (lines[item.id] > MAX_ITEM_QUANTITY) {
      throw new DomainValidationException(
        `At most ${MAX_ITEM_QUANTITY} of ${item.name} per order`,
      );
    }
    this.setLines(sessionId, input.restaurantId, lines);
    return this.getCart(sessionId, input.restaurantId);
  }

  async updateItem(
    sessionId: string,
    input: UpdateCartItemInput,
  ): Promise<CartView> {
    const lines = setCartLine(
      this.getLines(sessionId, input.restaurantId),
      input.menuItemId,
      input.quantity,
    );
    this.setLines(sessionId, input.restaurantId, lines);
    return this.getCart(sessionId, input.restaurantId);
  }

  /** Resolves lines against the live menu; items no longer offered are left out. */
  async getCart(sessionId: string, restaurantId: string): Promise<CartView> {
    const lines = this.getLines(sessionId, restaurantId);
    const ids = Object.keys(lines);
    const items =
      ids.length === 0
        ? []
        : await this.menuItems.find({
            where: { id: In(ids), restaurantId, isAvailable: true },
          });
    const byId = new Map(items.map((item) => [item.id, item]));

    const views: CartLineView[] = [];
    for (const id of ids) {
      const item = byId.get(id);
      if (!item) continue;
      const quantity = lines[id];
      views.push({
        menuItemId: item.id,
        name: item.name,
        unitPriceCents: item.priceCents,
        quantity,
        subtotalCents: item.priceCents * quantity,
      });
    }

    return {
      restaurantId,
      items: views,
      itemCount: cartItemCount(lines),
      totalCents: cartTotalCents(views),
    };
  }

  clear(sessionId: string, restaurantId: string): void {
    this.setLines(sessionId, restaurantId, {});
  }

  /** Forgets every cart of a session. */
  dropSession(sessionId: string): void {
    this.carts.delete(sessionId);
  }

  get sessionCount(): number {
    return this.carts.size;
  }
}
