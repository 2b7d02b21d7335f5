import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

export class CreateScheduledDeliveriesTable1717000100000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TYPE delivery_status AS ENUM (
        'pending',
        'in_progress',
        'sent',
        'failed',
        'cancelled'
      );
    `);

    await queryRunner.createTable(
      new Table({
        name: 'scheduled_deliveries',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          {
            name: 'subscriber_id',
            type: 'uuid',
            isNullable: false,
          },
          {
            name: 'delivery_date',
            type: 'varchar',
            length: '10',
            isNullable: false,
            comment: 'Subscriber-local calendar day (yyyy-MM-dd)',
          },
          {
            name: 'idempotency_key',
            type: 'varchar',
            length: '255',
            isNullable: false,
            isUnique: true,
            comment: 'Format: {subscriberId}:daily:{date} - one delivery per subscriber and day',
          },
          {
            name: 'scheduled_at',
            type: 'timestamp with time zone',
            isNullable: false,
          },
          {
            name: 'window_ends_at',
            type: 'timestamp with time zone',
            isNullable: false,
          },
          {
            name: 'next_attempt_at',
            type: 'timestamp with time zone',
            isNullable: false,
          },
          {
            name: 'status',
            type: 'delivery_status',
            default: "'pending'",
            isNullable: false,
          },
          {
            name: 'attempt_count',
            type: 'integer',
            default: 0,
            isNullable: false,
          },
          {
            name: 'last_error',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'content_fingerprint',
            type: 'varchar',
            length: '128',
            isNullable: true,
          },
          {
            name: 'content',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'receipt_id',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'claim_token',
            type: 'uuid',
            isNullable: true,
          },
          {
            name: 'claimed_by',
            type: 'varchar',
            length: '100',
            isNullable: true,
          },
          {
            name: 'claimed_at',
            type: 'timestamp with time zone',
            isNullable: true,
          },
          {
            name: 'sent_at',
            type: 'timestamp with time zone',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamp with time zone',
            default: 'CURRENT_TIMESTAMP',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamp with time zone',
            default: 'CURRENT_TIMESTAMP',
            isNullable: false,
          },
        ],
      }),
      true
    );

    await queryRunner.createForeignKey(
      'scheduled_deliveries',
      new TableForeignKey({
        name: 'FK_SCHEDULED_DELIVERIES_SUBSCRIBER',
        columnNames: ['subscriber_id'],
        referencedTableName: 'subscribers',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      })
    );

    // Due selection
    await queryRunner.createIndex(
      'scheduled_deliveries',
      new TableIndex({
        name: 'IDX_SCHEDULED_DELIVERIES_DUE',
        columnNames: ['status', 'next_attempt_at'],
        where: "status = 'pending'",
      })
    );

    // Stale-claim recovery
    await queryRunner.createIndex(
      'scheduled_deliveries',
      new TableIndex({
        name: 'IDX_SCHEDULED_DELIVERIES_CLAIMED',
        columnNames: ['status', 'claimed_at'],
        where: "status = 'in_progress'",
      })
    );

    await queryRunner.createIndex(
      'scheduled_deliveries',
      new TableIndex({
        name: 'IDX_SCHEDULED_DELIVERIES_SUBSCRIBER_DATE',
        columnNames: ['subscriber_id', 'delivery_date'],
      })
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('scheduled_deliveries');
    await queryRunner.query('DROP TYPE delivery_status;');
  }
}
