import { ILike, MoreThanOrEqual } from 'typeorm';
import { buildRestaurantSearchWhere } from './restaurant-search';

describe('buildRestaurantSearchWhere', () => {
  it('limits an empty search to open shops', () => {
    expect(buildRestaurantSearchWhere({})).toEqual([{ isOpen: true }]);
  });

  it('adds cuisine and rating filters to the single clause', () => {
    expect(
      buildRestaurantSearchWhere({ cuisine: 'South Indian', minRating: 4 }),
    ).toEqual([
      {
        isOpen: true,
        cuisineType: 'South Indian',
        rating: MoreThanOrEqual(4),
      },
    ]);
  });

  it('fans free text out over name, description and cuisine', () => {
    expect(buildRestaurantSearchWhere({ q: ' dosa ', minRating: 3 })).toEqual([
      { isOpen: true, rating: MoreThanOrEqual(3), name: ILike('%dosa%') },
      {
        isOpen: true,
        rating: MoreThanOrEqual(3),
        description: ILike('%dosa%'),
      },
      {
        isOpen: true,
        rating: MoreThanOrEqual(3),
        cuisineType: ILike('%dosa%'),
      },
    ]);
  });
});
