// apps/api/src/notifications/notification.service.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ResourceNotFoundException } from '../common/errors/domain-errors';
import {
  Notification,
  type NotificationType,
} from './entities/notification.entity';

export const MAX_NOTIFICATIONS = 50;

@Injectable()
export class NotificationService {
  constructor(
    @InjectRepository(Notification)
    private readonly notifications: Repository<Notification>,
  ) {}

  notify(params: {
    userId: string;
    title: string;
    message: string;
    type?: NotificationType;
  }): Promise<Notification> {
    return this.notifications.save(
      this.notifications.create({
        userId: params.userId,
        title: params.title,
        message: params.message,
        type: params.type ?? 'info',
        isRead: false,
      }),
    );
  }

  list(
    userId: string,
    options: { unreadOnly?: boolean; limit?: number } = {},
  ): Promise<Notification[]> {
    const take = Math.min(
      Math.max(1, options.limit ?? 10),
      MAX_NOTIFICATIONS,
    );
    return this.notifications.find({
      where: options.unreadOnly ? { userId, isRead: false } : { userId },
      order: { createdAt: 'DESC' },
      take,
    });
  }

  async markRead(userId: string, id: string): Promise<{ success: true }> {
    const result = await this.notifications.update(
      { id, userId },
      { isRead: true },
    );
    if (!result.affected) {
      throw new ResourceNotFoundException('Notification', id);
    }
    return { success: true };
  }
}
