// apps/api/src/admin/admin.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AdminOverrideSchema, type AdminOverrideInput } from '@shared/credit';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  AdminRestaurantListQuerySchema,
  AdminUserListQuerySchema,
  RecentOrdersQuerySchema,
  type AdminRestaurantListQuery,
  type AdminUserListQuery,
  type RecentOrdersQuery,
} from './dto/admin-query.dto';
import { AdminService } from './admin.service';

const actionContext = (req: AuthenticatedRequest) => ({
  admin: requireUser(req),
  ipAddress: req.ip ?? null,
});

@Controller('admin')
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('admin')
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get('dashboard')
  dashboard() {
    return this.adminService.dashboard();
  }

  @Get('analytics')
  analytics() {
    return this.adminService.analytics();
  }

  @Get('orders/recent')
  recentOrders(
    @Query(new ZodValidationPipe(RecentOrdersQuerySchema))
    query: RecentOrdersQuery,
  ) {
    return this.adminService.recentOrders(query.limit);
  }

  @Get('users')
  listUsers(
    @Query(new ZodValidationPipe(AdminUserListQuerySchema))
    query: AdminUserListQuery,
  ) {
    return this.adminService.listUsers(query);
  }

  @Post('users/:userId/toggle-active')
  @HttpCode(200)
  toggleUserActive(
    @Req() req: AuthenticatedRequest,
    @Param('userId', new ParseUUIDPipe()) userId: string,
  ) {
    return this.adminService.toggleUserActive(userId, actionContext(req));
  }

  @Post('users/:userId/credit-score')
  @HttpCode(200)
  overrideCreditScore(
    @Req() req: AuthenticatedRequest,
    @Param('userId', new ParseUUIDPipe()) userId: string,
    @Body(new ZodValidationPipe(AdminOverrideSchema)) body: AdminOverrideInput,
  ) {
    return this.adminService.overrideCreditScore(
      userId,
      body,
      actionContext(req),
    );
  }

  @Get('restaurants')
  listRestaurants(
    @Query(new ZodValidationPipe(AdminRestaurantListQuerySchema))
    query: AdminRestaurantListQuery,
  ) {
    return this.adminService.listRestaurants(query);
  }

  @Post('restaurants/:id/toggle-trust-badge')
  @HttpCode(200)
  toggleTrustBadge(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseUUIDPipe()) id: string,
  ) {
    return this.adminService.toggleTrustBadge(id, actionContext(req));
  }

  @Get('actions')
  listActions() {
    return this.adminService.listActions();
  }
}
