// apps/api/src/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { SessionAuthGuard } from './session-auth.guard';
import { RolesGuard } from './roles.guard';
import { AdminSeedService } from './admin-seed.service';
import { User } from './entities/user.entity';
import { UserSession } from './entities/user-session.entity';

@Module({
  imports: [TypeOrmModule.forFeature([User, UserSession])],
  providers: [AuthService, SessionAuthGuard, RolesGuard, AdminSeedService],
  controllers: [AuthController],
  exports: [AuthService, SessionAuthGuard, RolesGuard],
})
export class AuthModule {}
