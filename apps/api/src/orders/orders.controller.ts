// apps/api/src/orders/orders.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  CancelOrderSchema,
  CreateOrderSchema,
  OrderListQuerySchema,
  UpdateOrderStatusSchema,
  type CancelOrderInput,
  type CreateOrderInput,
  type OrderListQuery,
  type UpdateOrderStatusInput,
} from '@shared/order';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { OrdersService } from './orders.service';

@Controller('orders')
@UseGuards(SessionAuthGuard, RolesGuard)
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @Roles('student')
  create(
    @Req() req: AuthenticatedRequest,
    @Body(new ZodValidationPipe(CreateOrderSchema)) body: CreateOrderInput,
  ) {
    return this.ordersService.create(requireUser(req), body, req.sessionId);
  }

  @Get()
  @Roles('student')
  list(
    @Req() req: AuthenticatedRequest,
    @Query(new ZodValidationPipe(OrderListQuerySchema)) query: OrderListQuery,
  ) {
    return this.ordersService.listForStudent(requireUser(req).id, query.status);
  }

  @Get(':id')
  get(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseUUIDPipe()) id: string,
  ) {
    return this.ordersService.getOrder(id, requireUser(req));
  }

  @Patch(':id/status')
  @Roles('shop_owner')
  updateStatus(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(UpdateOrderStatusSchema))
    body: UpdateOrderStatusInput,
  ) {
    return this.ordersService.advance(id, body.status, requireUser(req));
  }

  @Post(':id/cancel')
  @HttpCode(200)
  cancel(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(CancelOrderSchema)) body: CancelOrderInput,
  ) {
    return this.ordersService.cancel(id, requireUser(req), body);
  }
}

@Controller('shop/orders')
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('shop_owner')
export class ShopOrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  list(
    @Req() req: AuthenticatedRequest,
    @Query(new ZodValidationPipe(OrderListQuerySchema)) query: OrderListQuery,
  ) {
    return this.ordersService.listForOwner(requireUser(req).id, query.status);
  }
}
