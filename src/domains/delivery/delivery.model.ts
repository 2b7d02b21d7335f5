import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

export enum DeliveryStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  SENT = 'sent',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

@Entity('scheduled_deliveries')
export class ScheduledDelivery {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'subscriber_id' })
  subscriberId!: string;

  // Subscriber-local calendar day, yyyy-MM-dd
  @Column({ type: 'varchar', length: 10, name: 'delivery_date' })
  deliveryDate!: string;

  @Column({ type: 'varchar', length: 255, name: 'idempotency_key', unique: true })
  idempotencyKey!: string;

  @Column({ type: 'timestamp with time zone', name: 'scheduled_at' })
  scheduledAt!: Date;

  @Column({ type: 'timestamp with time zone', name: 'window_ends_at' })
  windowEndsAt!: Date;

  @Column({ type: 'timestamp with time zone', name: 'next_attempt_at' })
  nextAttemptAt!: Date;

  @Column({
    type: 'enum',
    enum: DeliveryStatus,
    enumName: 'delivery_status',
    default: DeliveryStatus.PENDING,
  })
  status!: DeliveryStatus;

  @Column({ type: 'integer', name: 'attempt_count', default: 0 })
  attemptCount!: number;

  @Column({ type: 'text', name: 'last_error', nullable: true })
  lastError!: string | null;

  @Column({ type: 'varchar', length: 128, name: 'content_fingerprint', nullable: true })
  contentFingerprint!: string | null;

  @Column({ type: 'text', nullable: true })
  content!: string | null;

  @Column({ type: 'varchar', length: 255, name: 'receipt_id', nullable: true })
  receiptId!: string | null;

  @Column({ type: 'uuid', name: 'claim_token', nullable: true })
  claimToken!: string | null;

  @Column({ type: 'varchar', length: 100, name: 'claimed_by', nullable: true })
  claimedBy!: string | null;

  @Column({ type: 'timestamp with time zone', name: 'claimed_at', nullable: true })
  claimedAt!: Date | null;

  @Column({ type: 'timestamp with time zone', name: 'sent_at', nullable: true })
  sentAt!: Date | null;

  @CreateDateColumn({ type: 'timestamp with time zone', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp with time zone', name: 'updated_at' })
  updatedAt!: Date;
}
