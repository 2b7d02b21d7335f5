import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  DeleteDateColumn,
} from 'typeorm';

@Entity('subscribers')
export class SubscriberEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20, name: 'phone_number', unique: true })
  phoneNumber!: string;

  @Column({ type: 'varchar', length: 50 })
  timezone!: string;

  // Local delivery window; null falls back to the configured default
  @Column({ type: 'smallint', name: 'window_start_hour', nullable: true })
  windowStartHour!: number | null;

  @Column({ type: 'smallint', name: 'window_end_hour', nullable: true })
  windowEndHour!: number | null;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamp with time zone', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp with time zone', name: 'updated_at' })
  updatedAt!: Date;

  @DeleteDateColumn({ type: 'timestamp with time zone', name: 'deleted_at' })
  deletedAt?: Date;
}
