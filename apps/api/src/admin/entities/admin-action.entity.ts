import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

export const AdminActionTargets = ['user', 'restaurant', 'order'] as const;
export type AdminActionTarget = (typeof AdminActionTargets)[number];

@Entity('admin_actions')
export class AdminAction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  adminId!: string;

  @Column({ type: 'varchar', length: 50 })
  actionType!: string;

  @Column({ type: 'varchar', length: 20 })
  targetType!: AdminActionTarget;

  @Column({ type: 'uuid' })
  targetId!: string;

  @Column({ type: 'text', default: '' })
  details!: string;

  @Column({ type: 'varchar', length: 64, nullable: true })
  ipAddress!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
