// apps/api/src/restaurants/restaurant-search.ts
import { FindOptionsWhere, ILike, MoreThanOrEqual } from 'typeorm';
import type { RestaurantSearchQuery } from '@shared/restaurant';
import type { Restaurant } from './entities/restaurant.entity';

const SEARCHABLE_FIELDS = ['name', 'description', 'cuisineType'] as const;

/**
 * Builds the OR-list of where clauses for the public shop search. Only open
 * shops are returned; free text matches any of the searchable fields.
 */
export function buildRestaurantSearchWhere(
  query: RestaurantSearchQuery,
): FindOptionsWhere<Restaurant>[] {
  const base: FindOptionsWhere<Restaurant> = { isOpen: true };
  if (query.cuisine) {
    base.cuisineType = query.cuisine;
  }
  if (typeof query.minRating === 'number') {
    base.rating = MoreThanOrEqual(query.minRating);
  }

  const text = query.q?.trim();
  if (!text) return [base];

  const pattern = `%${text}%`;
  return SEARCHABLE_FIELDS.map((field) => ({
    ...base,
    [field]: ILike(pattern),
  }));
}
