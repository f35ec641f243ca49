// apps/api/src/restaurants/restaurants.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { formatDistanceKm } from '@shared/geo';
import {
  renderRatingStars,
  type RestaurantSearchQuery,
} from '@shared/restaurant';
import { AppLogger } from '../common/app-logger';
import { ResourceNotFoundException } from '../common/errors/domain-errors';
import type { CreateMenuItemDto, UpdateMenuItemDto } from './dto/menu-item.dto';
import { MenuItem } from './entities/menu-item.entity';
import { Restaurant } from './entities/restaurant.entity';
import { buildRestaurantSearchWhere } from './restaurant-search';

export type RestaurantSummary = {
  id: string;
  name: string;
  description: string | null;
  address: string;
  cuisineType: string;
  isOpen: boolean;
  avgPrepMinutes: number;
  rating: number;
  ratingStars: string;
  totalRatings: number;
  trustBadge: boolean;
  distanceKm: string;
};

export type MenuCategory = {
  category: string;
  items: MenuItem[];
};

@Injectable()
export class RestaurantsService {
  private readonly logger = new AppLogger(RestaurantsService.name);

  constructor(
    @InjectRepository(Restaurant)
    private readonly restaurants: Repository<Restaurant>,
    @InjectRepository(MenuItem)
    private readonly menuItems: Repository<MenuItem>,
  ) {}

  async search(query: RestaurantSearchQuery): Promise<RestaurantSummary[]> {
    const rows = await this.restaurants.find({
      where: buildRestaurantSearchWhere(query),
      order: { trustBadge: 'DESC', rating: 'DESC', name: 'ASC' },
    });
    const origin =
      typeof query.lat === 'number' && typeof query.lng === 'number'
        ? { latitude: query.lat, longitude: query.lng }
        : null;
    return rows.map((restaurant) => this.toSummary(restaurant, origin));
  }

  toSummary(
    restaurant: Restaurant,
    origin: { latitude: number; longitude: number } | null = null,
  ): RestaurantSummary {
    return {
      id: restaurant.id,
      name: restaurant.name,
      description: restaurant.description,
      address: restaurant.address,
      cuisineType: restaurant.cuisineType,
      isOpen: restaurant.isOpen,
      avgPrepMinutes: restaurant.avgPrepMinutes,
      rating: restaurant.rating,
      ratingStars: renderRatingStars(restaurant.rating),
      totalRatings: restaurant.totalRatings,
      trustBadge: restaurant.trustBadge,
      distanceKm: formatDistanceKm(origin, restaurant),
    };
  }

  async getRestaurant(id: string): Promise<Restaurant> {
    const restaurant = await this.restaurants.findOne({ where: { id } });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant', id);
    }
    return restaurant;
  }

  /** Available items of a shop grouped by category, categories A-Z. */
  async getMenu(restaurantId: string) {
    const restaurant = await this.getRestaurant(restaurantId);
    const items = await this.menuItems.find({
      where: { restaurantId, isAvailable: true },
      order: { category: 'ASC', name: 'ASC' },
    });
    return {
      restaurant: this.toSummary(restaurant),
      categories: groupByCategory(items),
    };
  }

  // ---- shop owner ----

  async getOwnedRestaurant(ownerId: string): Promise<Restaurant> {
    const restaurant = await this.restaurants.findOne({ where: { ownerId } });
    if (!restaurant) {
      throw new ResourceNotFoundException('Restaurant for owner', ownerId);
    }
    return restaurant;
  }

  /** Sets the open flag, or flips it when no value is given. */
  async setOpen(ownerId: string, isOpen?: boolean): Promise<Restaurant> {
    const restaurant = await this.getOwnedRestaurant(ownerId);
    const next = typeof isOpen === 'boolean' ? isOpen : !restaurant.isOpen;
    await this.restaurants.update({ id: restaurant.id }, { isOpen: next });
    this.logger.log(
      `Restaurant ${restaurant.id} is now ${next ? 'open' : 'closed'}`,
    );
    return { ...restaurant, isOpen: next };
  }

  async listOwnerMenu(ownerId: string): Promise<MenuItem[]> {
    const restaurant = await this.getOwnedRestaurant(ownerId);
    return this.menuItems.find({
      where: { restaurantId: restaurant.id },
      order: { category: 'ASC', name: 'ASC' },
    });
  }

  async addMenuItem(ownerId: string, dto: CreateMenuItemDto): Promise<MenuItem> {
    const restaurant = await this.getOwnedRestaurant(ownerId);
    return this.menuItems.save(
      this.menuItems.create({
        restaurantId: restaurant.id,
        name: dto.name,
        description: dto.description ?? null,
        priceCents: dto.priceCents,
        category: dto.category ?? 'Main Course',
        imageUrl: dto.imageUrl ?? null,
        prepMinutes: dto.prepMinutes ?? 15,
        isAvailable: dto.isAvailable ?? true,
      }),
    );
  }

  async updateMenuItem(
    ownerId: string,
    itemId: string,
    dto: UpdateMenuItemDto,
  ): Promise<MenuItem> {
    const item = await this.getOwnedMenuItem(ownerId, itemId);
    const patch: Partial<MenuItem> = {};
    if (dto.name !== undefined) patch.name = dto.name;
    if (dto.description !== undefined) patch.description = dto.description;
    if (dto.priceCents !== undefined) patch.priceCents = dto.priceCents;
    if (dto.category !== undefined) patch.category = dto.category;
    if (dto.imageUrl !== undefined) patch.imageUrl = dto.imageUrl;
    if (dto.prepMinutes !== undefined) patch.prepMinutes = dto.prepMinutes;
    if (dto.isAvailable !== undefined) patch.isAvailable = dto.isAvailable;

    if (Object.keys(patch).length > 0) {
      await this.menuItems.update({ id: item.id }, patch);
    }
    return { ...item, ...patch };
  }

  async toggleMenuItem(ownerId: string, itemId: string): Promise<MenuItem> {
    const item = await this.getOwnedMenuItem(ownerId, itemId);
    const isAvailable = !item.isAvailable;
    await this.menuItems.update({ id: item.id }, { isAvailable });
    return { ...item, isAvailable };
  }

  private async getOwnedMenuItem(
    ownerId: string,
    itemId: string,
  ): Promise<MenuItem> {
    const restaurant = await this.getOwnedRestaurant(ownerId);
    const item = await this.menuItems.findOne({
      where: { id: itemId, restaurantId: restaurant.id },
    });
    if (!item) {
      throw new ResourceNotFoundException('Menu item', itemId);
    }
    return item;
  }
}

export function groupByCategory(items: MenuItem[]): MenuCategory[] {
  const groups = new Map<string, MenuItem[]>();
  for (const item of items) {
    const list = groups.get(item.category) ?? [];
    list.push(item);
    groups.set(item.category, list);
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, grouped]) => ({ category, items: grouped }));
}
