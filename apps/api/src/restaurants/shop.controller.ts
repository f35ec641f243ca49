// apps/api/src/restaurants/shop.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import {
  CreateMenuItemDto,
  ToggleShopStatusDto,
  UpdateMenuItemDto,
} from './dto/menu-item.dto';
import { RestaurantsService } from './restaurants.service';

@Controller('shop')
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('shop_owner')
export class ShopController {
  constructor(private readonly restaurantsService: RestaurantsService) {}

  @Get()
  getShop(@Req() req: AuthenticatedRequest) {
    return this.restaurantsService.getOwnedRestaurant(requireUser(req).id);
  }

  @Patch('status')
  setStatus(
    @Req() req: AuthenticatedRequest,
    @Body() dto: ToggleShopStatusDto,
  ) {
    return this.restaurantsService.setOpen(requireUser(req).id, dto.isOpen);
  }

  @Get('menu')
  listMenu(@Req() req: AuthenticatedRequest) {
    return this.restaurantsService.listOwnerMenu(requireUser(req).id);
  }

  @Post('menu')
  addMenuItem(
    @Req() req: AuthenticatedRequest,
    @Body() dto: CreateMenuItemDto,
  ) {
    return this.restaurantsService.addMenuItem(requireUser(req).id, dto);
  }

  @Patch('menu/:itemId')
  updateMenuItem(
    @Req() req: AuthenticatedRequest,
    @Param('itemId', new ParseUUIDPipe()) itemId: string,
    @Body() dto: UpdateMenuItemDto,
  ) {
    return this.restaurantsService.updateMenuItem(
      requireUser(req).id,
      itemId,
      dto,
    );
  }

  @Post('menu/:itemId/toggle')
  @HttpCode(200)
  toggleMenuItem(
    @Req() req: AuthenticatedRequest,
    @Param('itemId', new ParseUUIDPipe()) itemId: string,
  ) {
    return this.restaurantsService.toggleMenuItem(requireUser(req).id, itemId);
  }
}
