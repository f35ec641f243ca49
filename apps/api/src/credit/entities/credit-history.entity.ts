import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { CreditEvent } from '@shared/credit';

export const CreditActorRoles = [
  'system',
  'student',
  'shop_owner',
  'admin',
] as const;
export type CreditActorRole = (typeof CreditActorRoles)[number];

/** Append-only; rows are never updated or deleted. */
@Entity('credit_history')
export class CreditHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  userId!: string;

  @Column({ type: 'varchar', length: 32 })
  event!: CreditEvent;

  @Column({ type: 'int' })
  delta!: number;

  @Column({ type: 'int' })
  previousScore!: number;

  @Column({ type: 'int' })
  newScore!: number;

  @Column({ type: 'text' })
  reason!: string;

  @Column({ type: 'uuid', nullable: true })
  actorId!: string | null;

  @Column({ type: 'varchar', length: 16, default: 'system' })
  actorRole!: CreditActorRole;

  @Index()
  @Column({ type: 'uuid', nullable: true })
  orderId!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
