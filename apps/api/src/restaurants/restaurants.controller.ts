// apps/api/src/restaurants/restaurants.controller.ts
import { Controller, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import {
  RestaurantSearchSchema,
  type RestaurantSearchQuery,
} from '@shared/restaurant';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { RestaurantsService } from './restaurants.service';

@Controller('restaurants')
export class RestaurantsController {
  constructor(private readonly restaurantsService: RestaurantsService) {}

  /** GET /api/v1/restaurants?q=&cuisine=&minRating=&lat=&lng= */
  @Get()
  search(
    @Query(new ZodValidationPipe(RestaurantSearchSchema))
    query: RestaurantSearchQuery,
  ) {
    return this.restaurantsService.search(query);
  }

  @Get(':id')
  async getOne(@Param('id', new ParseUUIDPipe()) id: string) {
    const restaurant = await this.restaurantsService.getRestaurant(id);
    return this.restaurantsService.toSummary(restaurant);
  }

  @Get(':id/menu')
  getMenu(@Param('id', new ParseUUIDPipe()) id: string) {
    return this.restaurantsService.getMenu(id);
  }
}
