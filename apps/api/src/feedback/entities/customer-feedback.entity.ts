import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { CreditEvent } from '@shared/credit';

@Entity('customer_feedback')
export class CustomerFeedback {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'uuid' })
  orderId!: string;

  @Index()
  @Column({ type: 'uuid' })
  restaurantId!: string;

  @Index()
  @Column({ type: 'uuid' })
  studentId!: string;

  @Column({ type: 'smallint' })
  politeness!: number;

  @Column({ type: 'smallint' })
  punctuality!: number;

  @Column({ type: 'smallint' })
  authenticity!: number;

  @Column({ type: 'double precision' })
  overallRating!: number;

  @Column({ type: 'text', default: '' })
  comments!: string;

  @Column({ type: 'varchar', length: 32 })
  creditEvent!: Extract<CreditEvent, 'positive_feedback' | 'negative_feedback'>;

  @Column({ type: 'int' })
  creditDelta!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
