import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('message_history')
@Index('IDX_MESSAGE_HISTORY_SUBSCRIBER_RECORDED', ['subscriberId', 'recordedAt'])
export class MessageHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'subscriber_id' })
  subscriberId!: string;

  @Column({ type: 'varchar', length: 128 })
  fingerprint!: string;

  @CreateDateColumn({ type: 'timestamp with time zone', name: 'recorded_at' })
  recordedAt!: Date;
}
