// apps/api/src/auth/auth.types.ts
import { UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { User, UserRole } from './entities/user.entity';

export type AuthUser = Pick<
  User,
  'id' | 'email' | 'name' | 'phone' | 'role' | 'isActive'
>;

export type AuthenticatedRequest = Request & {
  user?: AuthUser;
  sessionId?: string;
};

export type Actor = {
  id: string;
  role: UserRole;
};

export function toAuthUser(user: User): AuthUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    phone: user.phone,
    role: user.role,
    isActive: user.isActive,
  };
}

export function requireUser(req: AuthenticatedRequest): AuthUser {
  if (!req.user?.id) {
    throw new UnauthorizedException('Missing session');
  }
  return req.user;
}
