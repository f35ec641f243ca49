// apps/api/src/cart/cart.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Req,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import {
  AddCartItemSchema,
  UpdateCartItemSchema,
  type AddCartItemInput,
  type UpdateCartItemInput,
} from '@shared/cart';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { CartService } from './cart.service';

function sessionOf(req: AuthenticatedRequest): string {
  if (!req.sessionId) throw new UnauthorizedException('Missing session');
  return req.sessionId;
}

@Controller('cart')
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('student')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get(':restaurantId')
  getCart(
    @Req() req: AuthenticatedRequest,
    @Param('restaurantId', new ParseUUIDPipe()) restaurantId: string,
  ) {
    return this.cartService.getCart(sessionOf(req), restaurantId);
  }

  @Post('items')
  addItem(
    @Req() req: AuthenticatedRequest,
    @Body(new ZodValidationPipe(AddCartItemSchema)) body: AddCartItemInput,
  ) {
    return this.cartService.addItem(sessionOf(req), body);
  }

  @Patch('items')
  updateItem(
    @Req() req: AuthenticatedRequest,
    @Body(new ZodValidationPipe(UpdateCartItemSchema)) body: UpdateCartItemInput,
  ) {
    return this.cartService.updateItem(sessionOf(req), body);
  }

  @Delete(':restaurantId')
  clear(
    @Req() req: AuthenticatedRequest,
    @Param('restaurantId', new ParseUUIDPipe()) restaurantId: string,
  ) {
    this.cartService.clear(sessionOf(req), restaurantId);
    return { success: true };
  }
}
