import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('order_items')
export class OrderItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  orderId!: string;

  @Column({ type: 'uuid' })
  menuItemId!: string;

  // snapshot at order time; later menu edits do not change past orders
  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'int' })
  quantity!: number;

  @Column({ type: 'int' })
  unitPriceCents!: number;

  @Column({ type: 'int', default: 0 })
  position!: number;
}
