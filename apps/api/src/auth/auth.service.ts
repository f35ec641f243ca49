// apps/api/src/auth/auth.service.ts
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import { DataSource, Repository } from 'typeorm';
import { DEFAULT_CREDIT_SCORE, tierForScore } from '@shared/credit';
import { AppLogger } from '../common/app-logger';
import {
  AccountBlockedException,
  DomainValidationException,
} from '../common/errors/domain-errors';
import { normalizeEmail } from '../common/utils/email';
import type { AppEnv } from '../config/env.schema';
import { CreditProfile } from '../credit/entities/credit-profile.entity';
import { DomainEventsBus } from '../messaging/domain-events.bus';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { toAuthUser, type AuthUser } from './auth.types';
import type { RegisterDto } from './dto/register.dto';
import { User, type UserRole } from './entities/user.entity';
import { UserSession } from './entities/user-session.entity';

export type CreateUserParams = {
  email: string;
  password: string;
  name: string;
  role: UserRole;
  phone?: string;
};

@Injectable()
export class AuthService {
  private readonly logger = new AppLogger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private readonly users: Repository<User>,
    @InjectRepository(UserSession)
    private readonly sessions: Repository<UserSession>,
    private readonly dataSource: DataSource,
    private readonly config: ConfigService<AppEnv, true>,
    private readonly events: DomainEventsBus,
  ) {}

  private getSessionTtlMs(): number {
    return this.config.get('SESSION_TTL_SECONDS', { infer: true }) * 1000;
  }

  hashPassword(password: string, salt: string): string {
    return scryptSync(password, salt, 64).toString('hex');
  }

  verifyPassword(password: string, salt: string, hash: string): boolean {
    const computed = this.hashPassword(password, salt);
    if (computed.length !== hash.length) return false;
    return timingSafeEqual(
      Buffer.from(hash, 'hex'),
      Buffer.from(computed, 'hex'),
    );
  }

  /**
   * Registers a student or shop owner. Students start with a credit profile at
   * the default score; shop owners get their restaurant in the same transaction.
   */
  async register(dto: RegisterDto): Promise<AuthUser> {
    if (dto.role === 'shop_owner' && (!dto.restaurantName || !dto.address)) {
      throw new DomainValidationException(
        'restaurantName and address are required for shop owners',
      );
    }

    const user = await this.dataSource.transaction(async (manager) => {
      const created = await this.insertUser(manager.getRepository(User), {
        email: dto.email,
        password: dto.password,
        name: dto.name,
        role: dto.role,
        phone: dto.phone,
      });

      if (created.role === 'student') {
        const profiles = manager.getRepository(CreditProfile);
        await profiles.save(
          profiles.create({
            userId: created.id,
            score: DEFAULT_CREDIT_SCORE,
            tier: tierForScore(DEFAULT_CREDIT_SCORE),
            revision: 0,
          }),
        );
      }

      if (created.role === 'shop_owner') {
        const restaurants = manager.getRepository(Restaurant);
        await restaurants.save(
          restaurants.create({
            ownerId: created.id,
            name: dto.restaurantName,
            address: dto.address,
            phone: dto.phone ?? null,
            cuisineType: dto.cuisineType ?? 'General',
            description: dto.description ?? null,
            latitude: dto.latitude ?? null,
            longitude: dto.longitude ?? null,
          }),
        );
      }

      return created;
    });

    this.logger.log(`Registered ${user.role} ${user.id}`);
    return toAuthUser(user);
  }

  /** Creates an account without the self-service role restriction. */
  async createUser(params: CreateUserParams): Promise<AuthUser> {
    const user = await this.insertUser(this.users, params);
    return toAuthUser(user);
  }

  private async insertUser(
    repo: Repository<User>,
    params: CreateUserParams,
  ): Promise<User> {
    const email = normalizeEmail(params.email);
    if (!email) {
      throw new DomainValidationException('A valid email is required');
    }
    if (params.password.length < 6) {
      throw new DomainValidationException(
        'Password must be at least 6 characters',
      );
    }

    const existing = await repo.findOne({ where: { email } });
    if (existing) {
      throw new DomainValidationException('Email already registered');
    }

    const salt = randomBytes(16).toString('hex');
    return repo.save(
      repo.create({
        email,
        passwordSalt: salt,
        passwordHash: this.hashPassword(params.password, salt),
        name: params.name.trim(),
        phone: params.phone ?? null,
        role: params.role,
        isActive: true,
      }),
    );
  }

  async loginWithPassword(params: {
    email: string;
    password: string;
    deviceInfo?: string;
  }) {
    const email = normalizeEmail(params.email);
    if (!email || !params.password) {
      throw new DomainValidationException('email and password are required');
    }

    const user = await this.users.findOne({ where: { email } });
    if (
      !user ||
      !this.verifyPassword(params.password, user.passwordSalt, user.passwordHash)
    ) {
      this.logger.warn(`Failed login for ${email}`);
      throw new UnauthorizedException('Invalid email or password');
    }

    if (!user.isActive) {
      throw new AccountBlockedException(
        'Your account has been deactivated. Please contact support.',
      );
    }

    const session = await this.createSession({
      userId: user.id,
      deviceInfo: params.deviceInfo,
    });

    return { user: toAuthUser(user), session };
  }

  async createSession(params: { userId: string; deviceInfo?: string }) {
    const sessionId = randomBytes(32).toString('hex');
    const expiresAt = new Date(Date.now() + this.getSessionTtlMs());

    await this.sessions.save(
      this.sessions.create({
        sessionId,
        userId: params.userId,
        expiresAt,
        deviceInfo: params.deviceInfo ?? null,
      }),
    );

    return { sessionId, expiresAt };
  }

  async revokeSession(sessionId: string): Promise<void> {
    const session = await this.sessions.findOne({ where: { sessionId } });
    if (!session) return;
    await this.sessions.delete({ id: session.id });
    this.events.emit('session.ended', {
      userId: session.userId,
      sessionIds: [session.sessionId],
    });
  }

  async revokeUserSessions(userId: string): Promise<number> {
    const sessions = await this.sessions.find({ where: { userId } });
    const result = await this.sessions.delete({ userId });
    if (sessions.length > 0) {
      this.events.emit('session.ended', {
        userId,
        sessionIds: sessions.map((session) => session.sessionId),
      });
    }
    return result.affected ?? 0;
  }

  async getSessionUser(sessionId: string): Promise<AuthUser | null> {
    const session = await this.sessions.findOne({ where: { sessionId } });
    if (!session) return null;

    if (session.expiresAt <= new Date()) {
      await this.sessions.delete({ id: session.id });
      this.events.emit('session.ended', {
        userId: session.userId,
        sessionIds: [session.sessionId],
      });
      return null;
    }

    const user = await this.users.findOne({ where: { id: session.userId } });
    if (!user) return null;
    if (!user.isActive) {
      throw new AccountBlockedException('User disabled');
    }

    return toAuthUser(user);
  }

  async findUser(userId: string): Promise<AuthUser | null> {
    const user = await this.users.findOne({ where: { id: userId } });
    return user ? toAuthUser(user) : null;
  }
}
