import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { CreditTier } from '@shared/credit';
import type {
  CancelledBy,
  OrderStatus,
  PaymentMethod,
  PaymentStatus,
} from '@shared/order';

@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 16 })
  orderNumber!: string;

  @Index()
  @Column({ type: 'uuid' })
  studentId!: string;

  @Index()
  @Column({ type: 'uuid' })
  restaurantId!: string;

  @Column({ type: 'varchar', length: 16, default: 'placed' })
  status!: OrderStatus;

  @Column({ type: 'timestamptz' })
  timeSlotStart!: Date;

  @Column({ type: 'timestamptz' })
  timeSlotEnd!: Date;

  @Column({ type: 'int' })
  subtotalCents!: number;

  @Column({ type: 'int', default: 0 })
  discountCents!: number;

  @Column({ type: 'int' })
  totalCents!: number;

  @Column({ type: 'int', default: 0 })
  discountPercent!: number;

  @Column({ type: 'int' })
  creditScoreAtOrder!: number;

  @Column({ type: 'varchar', length: 16 })
  creditTierAtOrder!: CreditTier;

  @Column({ type: 'varchar', length: 500 })
  deliveryAddress!: string;

  @Column({ type: 'varchar', length: 16, default: 'cod' })
  paymentMethod!: PaymentMethod;

  @Column({ type: 'varchar', length: 16, default: 'pending' })
  paymentStatus!: PaymentStatus;

  @Column({ type: 'varchar', length: 16, nullable: true })
  cancelledBy!: CancelledBy | null;

  @Column({ type: 'text', nullable: true })
  cancellationReason!: string | null;

  @Column({ type: 'int', default: 0 })
  revision!: number;

  @Column({ type: 'timestamptz', nullable: true })
  deliveredAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
