// apps/api/src/credit/credit.controller.ts
import {
  Controller,
  DefaultValuePipe,
  Get,
  ParseIntPipe,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import { CreditService } from './credit.service';

@Controller('credit')
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('student')
export class CreditController {
  constructor(private readonly creditService: CreditService) {}

  /** Score, tier, discount and any warnings for the signed-in student. */
  @Get('me')
  async me(@Req() req: AuthenticatedRequest) {
    const userId = requireUser(req).id;
    const [profile, stats] = await Promise.all([
      this.creditService.getProfile(userId),
      this.creditService.getStats(userId),
    ]);
    return { ...profile, stats };
  }

  @Get('me/history')
  history(
    @Req() req: AuthenticatedRequest,
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ) {
    return this.creditService.getHistory(requireUser(req).id, limit);
  }
}
