import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { CartModule } from '../cart/cart.module';
import { CreditModule } from '../credit/credit.module';
import { MenuItem } from '../restaurants/entities/menu-item.entity';
import { Restaurant } from '../restaurants/entities/restaurant.entity';
import { OrderItem } from './entities/order-item.entity';
import { Order } from './entities/order.entity';
import { OrdersController, ShopOrdersController } from './orders.controller';
import { OrdersService } from './orders.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Order, OrderItem, Restaurant, MenuItem]),
    AuthModule,
    CartModule,
    CreditModule,
  ],
  controllers: [OrdersController, ShopOrdersController],
  providers: [OrdersService],
  exports: [OrdersService],
})
export class OrdersModule {}
