// apps/api/src/credit/credit.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { CustomerFeedback } from '../feedback/entities/customer-feedback.entity';
import { Order } from '../orders/entities/order.entity';
import { CreditController } from './credit.controller';
import { CreditService } from './credit.service';
import { CreditHistory } from './entities/credit-history.entity';
import { CreditProfile } from './entities/credit-profile.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      CreditProfile,
      CreditHistory,
      Order,
      CustomerFeedback,
    ]),
    AuthModule,
  ],
  controllers: [CreditController],
  providers: [CreditService],
  exports: [CreditService],
})
export class CreditModule {}
