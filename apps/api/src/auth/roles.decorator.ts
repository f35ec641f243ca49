// apps/api/src/auth/roles.decorator.ts
import { SetMetadata } from '@nestjs/common';
import type { UserRole } from './entities/user.entity';

export const ROLES_KEY = 'roles';

export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);
