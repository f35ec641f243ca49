// apps/api/src/auth/session-auth.guard.ts
import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { parseCookies } from '../common/middleware/cookie-parser';
import { setLogContextUser } from '../common/log-context';
import { AuthService } from './auth.service';
import type { AuthenticatedRequest } from './auth.types';

export const SESSION_COOKIE_NAME = 'session_id';

export function readSessionId(request: AuthenticatedRequest): string | undefined {
  const cookies: unknown = request.cookies;
  if (cookies && typeof cookies === 'object') {
    const value: unknown = Reflect.get(cookies, SESSION_COOKIE_NAME);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  // cookie middleware is not mounted in every context (e.g. unit tests)
  const fromHeader = parseCookies(request.headers.cookie)[SESSION_COOKIE_NAME];
  return fromHeader && fromHeader.length > 0 ? fromHeader : undefined;
}

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const sessionId = readSessionId(request);
    if (!sessionId) {
      throw new UnauthorizedException('Missing session');
    }

    const user = await this.authService.getSessionUser(sessionId);
    if (!user) {
      throw new UnauthorizedException('Invalid session');
    }

    request.user = user;
    request.sessionId = sessionId;
    setLogContextUser(user.id);
    return true;
  }
}
