// apps/api/src/feedback/feedback.controller.ts
import { Body, Controller, Get, Post, Req, UseGuards } from '@nestjs/common';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { requireUser, type AuthenticatedRequest } from '../auth/auth.types';
import { SubmitFeedbackDto } from './dto/submit-feedback.dto';
import { FeedbackService } from './feedback.service';

@Controller()
@UseGuards(SessionAuthGuard, RolesGuard)
@Roles('shop_owner')
export class FeedbackController {
  constructor(private readonly feedbackService: FeedbackService) {}

  @Post('feedback')
  submit(@Req() req: AuthenticatedRequest, @Body() dto: SubmitFeedbackDto) {
    return this.feedbackService.submit(requireUser(req).id, dto);
  }

  @Get('shop/feedback/pending')
  pending(@Req() req: AuthenticatedRequest) {
    return this.feedbackService.pending(requireUser(req).id);
  }

  @Get('shop/feedback/history')
  history(@Req() req: AuthenticatedRequest) {
    return this.feedbackService.history(requireUser(req).id);
  }

  @Get('shop/feedback/stats')
  stats(@Req() req: AuthenticatedRequest) {
    return this.feedbackService.stats(requireUser(req).id);
  }
}
