import { z } from 'zod';

export const RestaurantSearchSchema = z.object({
  q: z.string().trim().optional(),
  cuisine: z.string().trim().optional(),
  minRating: z.coerce.number().min(0).max(5).optional(),
  lat: z.coerce.number().min(-90).max(90).optional(),
  lng: z.coerce.number().min(-180).max(180).optional(),
});
export type RestaurantSearchQuery = z.infer<typeof RestaurantSearchSchema>;

export const MAX_RATING = 5;

/** e.g. 3.5 -> "★★★½☆", 3.2 -> "★★★☆☆" */
export function renderRatingStars(rating: number): string {
  const value = Math.min(MAX_RATING, Math.max(0, rating));
  const full = Math.floor(value);
  const half = value - full >= 0.5;
  const empty = MAX_RATING - full - (half ? 1 : 0);
  return '★'.repeat(full) + (half ? '½' : '') + '☆'.repeat(empty);
}
