// apps/api/src/notifications/notifications.controller.ts
import {
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
import { z } from 'zod';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { NotificationService } from './notification.service';

const ListNotificationsQuerySchema = z.object({
  unread: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});
type ListNotificationsQuery = z.infer<typeof ListNotificationsQuerySchema>;

@Controller('notifications')
@UseGuards(SessionAuthGuard)
export class NotificationsController {
  constructor(private readonly notificationService: NotificationService) {}

  @Get()
  list(
    @Req() req: AuthenticatedRequest,
    @Query(new ZodValidationPipe(ListNotificationsQuerySchema))
    query: ListNotificationsQuery,
  ) {
    return this.notificationService.list(requireUser(req).id, {
      unreadOnly: query.unread,
      limit: query.limit,
    });
  }

  @Post(':id/read')
  @HttpCode(200)
  markRead(
    @Req() req: AuthenticatedRequest,
    @Param('id', new ParseUUIDPipe()) id: string,
  ) {
    return this.notificationService.markRead(requireUser(req).id, id);
  }
}
