// apps/api/src/auth/admin-seed.service.ts
import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AppLogger } from '../common/app-logger';
import { normalizeEmail } from '../common/utils/email';
import type { AppEnv } from '../config/env.schema';
import { AuthService } from './auth.service';
import { User } from './entities/user.entity';

/** Creates the first admin from ADMIN_EMAIL / ADMIN_PASSWORD when missing. */
@Injectable()
export class AdminSeedService implements OnApplicationBootstrap {
  private readonly logger = new AppLogger(AdminSeedService.name);

  constructor(
    private readonly authService: AuthService,
    @InjectRepository(User)
    private readonly users: Repository<User>,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const email = normalizeEmail(this.config.get('ADMIN_EMAIL', { infer: true }));
    const password = this.config.get('ADMIN_PASSWORD', { infer: true });
    if (!email || !password) return;

    const existing = await this.users.findOne({ where: { email } });
    if (existing) return;

    const admin = await this.authService.createUser({
      email,
      password,
      name: 'Administrator',
      role: 'admin',
    });
    this.logger.log(`Seeded admin account ${admin.id}`);
  }
}
