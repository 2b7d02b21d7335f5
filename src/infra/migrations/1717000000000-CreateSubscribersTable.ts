import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateSubscribersTable1717000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'subscribers',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'gen_random_uuid()',
          },
          {
            name: 'phone_number',
            type: 'varchar',
            length: '20',
            isNullable: false,
            isUnique: true,
          },
          {
            name: 'timezone',
            type: 'varchar',
            length: '50',
            isNullable: false,
            comment: 'IANA timezone (e.g., America/New_York)',
          },
          {
            name: 'window_start_hour',
            type: 'smallint',
            isNullable: true,
            comment: 'Local hour the delivery window opens; null uses the default window',
          },
          {
            name: 'window_end_hour',
            type: 'smallint',
            isNullable: true,
          },
          {
            name: 'is_active',
            type: 'boolean',
            default: true,
            isNullable: false,
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
          {
            name: 'deleted_at',
            type: 'timestamp with time zone',
            isNullable: true,
          },
        ],
        checks: [
          {
            name: 'CHK_SUBSCRIBERS_WINDOW',
            expression:
              'window_start_hour IS NULL OR window_end_hour IS NULL OR (window_start_hour >= 0 AND window_end_hour <= 24 AND window_start_hour < window_end_hour)',
          },
        ],
      }),
      true
    );

    await queryRunner.createIndex(
      'subscribers',
      new TableIndex({
        name: 'IDX_SUBSCRIBERS_ACTIVE',
        columnNames: ['is_active'],
        where: 'deleted_at IS NULL',
      })
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('subscribers');
  }
}
