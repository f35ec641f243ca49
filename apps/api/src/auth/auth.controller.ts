// apps/api/src/auth/auth.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { AuthService } from './auth.service';
import {
  SessionAuthGuard,
  SESSION_COOKIE_NAME,
  readSessionId,
} from './session-auth.guard';
import { requireUser, type AuthenticatedRequest } from './auth.types';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  register(@Body() dto: RegisterDto) {
    return this.authService.register(dto);
  }

  @Post('login')
  @HttpCode(200)
  async login(
    @Body() dto: LoginDto,
    @Req() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
  ) {
    const deviceInfo = req.headers['user-agent'];
    const result = await this.authService.loginWithPassword({
      email: dto.email,
      password: dto.password,
      deviceInfo: typeof deviceInfo === 'string' ? deviceInfo : undefined,
    });

    res.cookie(SESSION_COOKIE_NAME, result.session.sessionId, {
      httpOnly: true,
      secure: process.env.NODE_ENV === 'production',
      sameSite: 'lax',
      maxAge: result.session.expiresAt.getTime() - Date.now(),
      path: '/',
    });

    return {
      id: result.user.id,
      email: result.user.email,
      name: result.user.name,
      role: result.user.role,
      expiresAt: result.session.expiresAt,
    };
  }

  @UseGuards(SessionAuthGuard)
  @Get('me')
  me(@Req() req: AuthenticatedRequest) {
    return requireUser(req);
  }

  @Post('logout')
  @HttpCode(200)
  async logout(
    @Req() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
  ) {
    const sessionId = readSessionId(req);
    if (sessionId) {
      await this.authService.revokeSession(sessionId);
    }

    res.clearCookie(SESSION_COOKIE_NAME, { path: '/' });
    return { success: true };
  }
}
