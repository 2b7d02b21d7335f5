import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateMessageHistoryTable1717000200000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'message_history',
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
            name: 'fingerprint',
            type: 'varchar',
            length: '128',
            isNullable: false,
          },
          {
            name: 'recorded_at',
            type: 'timestamp with time zone',
            default: 'CURRENT_TIMESTAMP',
            isNullable: false,
          },
        ],
      }),
      true
    );

    await queryRunner.createIndex(
      'message_history',
      new TableIndex({
        name: 'IDX_MESSAGE_HISTORY_SUBSCRIBER_RECORDED',
        columnNames: ['subscriber_id', 'recorded_at'],
      })
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('message_history');
  }
}
