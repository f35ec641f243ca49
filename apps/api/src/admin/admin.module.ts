// apps/api/src/admin/admin.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { User } from '../auth/entities/user.entity';
import { CreditModule } from '../credit/credit.module';
import { CreditProfile } from '../credit/entities/credit-profile.entity';
import { Order } from '../orders/entities/order.entity';
import { OrdersModule } from '../orders/orders.module';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';
import { AdminAction } from './entities/admin-action.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      User,
      Restaurant,
      Order,
      CreditProfile,
      AdminAction,
    ]),
    AuthModule,
    CreditModule,
    OrdersModule,
  ],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
