// apps/api/src/cart/cart.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { MenuItem } from '../restaurants/entities/menu-item.entity';
import { CartSessionListener } from './cart-session.listener';
import { CartController } from './cart.controller';
import { CartService } from './cart.service';

@Module({
  imports: [TypeOrmModule.forFeature([MenuItem]), AuthModule],
  controllers: [CartController],
  providers: [CartService, CartSessionListener],
  exports: [CartService],
})
export class CartModule {}
