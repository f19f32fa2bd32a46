import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateDisclosureTables1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'persons',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'id_type', type: 'varchar', length: '10' },
          { name: 'id_number', type: 'varchar', length: '40' },
          { name: 'first_name', type: 'varchar', length: '120' },
          { name: 'last_name', type: 'varchar', length: '120' },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        checks: [
          {
            name: 'CHK_persons_id_type',
            expression: `"id_type" IN ('CC', 'CE', 'PA', 'NIT', 'TI', 'PEP', 'OTRO')`,
          },
        ],
        indices: [
          {
            name: 'IDX_persons_identity',
            columnNames: ['id_type', 'id_number'],
            isUnique: true,
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'issuing_entities',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'name', type: 'varchar', length: '200', isUnique: true },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: `'pending'`,
          },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        checks: [
          {
            name: 'CHK_issuing_entities_status',
            expression: `"status" IN ('pending', 'approved', 'blocked')`,
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'document_definitions',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'title', type: 'varchar', length: '200' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'person_documents',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'person_id', type: 'integer' },
          { name: 'document_definition_id', type: 'integer', isNullable: true },
          { name: 'issuer_entity_id', type: 'integer', isNullable: true },
          {
            name: 'review_status',
            type: 'varchar',
            length: '20',
            default: `'pending'`,
          },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        checks: [
          {
            name: 'CHK_person_documents_review_status',
            expression: `"review_status" IN ('pending', 'approved', 'rejected')`,
          },
        ],
        indices: [
          {
            name: 'IDX_person_documents_person_review',
            columnNames: ['person_id', 'review_status'],
          },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKeys('person_documents', [
      new TableForeignKey({
        columnNames: ['person_id'],
        referencedTableName: 'persons',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
      new TableForeignKey({
        columnNames: ['document_definition_id'],
        referencedTableName: 'document_definitions',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
      new TableForeignKey({
        columnNames: ['issuer_entity_id'],
        referencedTableName: 'issuing_entities',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'files',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'person_document_id', type: 'integer' },
          {
            name: 'original_name',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          { name: 'mime_type', type: 'varchar', length: '120', isNullable: true },
          { name: 'byte_size', type: 'bigint', isNullable: true },
          { name: 'sha256_hex', type: 'char', length: '64', isNullable: true },
          {
            name: 'storage_path',
            type: 'varchar',
            length: '500',
            isNullable: true,
          },
          { name: 'version', type: 'integer', isNullable: true },
          { name: 'uploaded_at', type: 'timestamptz', default: 'now()' },
        ],
        foreignKeys: [
          {
            columnNames: ['person_document_id'],
            referencedTableName: 'person_documents',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
        ],
        indices: [
          {
            name: 'IDX_files_document_version',
            columnNames: ['person_document_id', 'version'],
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'access_requests',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'entity_id', type: 'integer' },
          { name: 'person_id', type: 'integer' },
          { name: 'purpose', type: 'varchar', length: '300' },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: `'pending'`,
          },
          { name: 'requested_at', type: 'timestamptz' },
          { name: 'decided_at', type: 'timestamptz', isNullable: true },
          { name: 'expires_at', type: 'timestamptz' },
          {
            name: 'decision_note',
            type: 'varchar',
            length: '300',
            isNullable: true,
          },
        ],
        foreignKeys: [
          {
            columnNames: ['entity_id'],
            referencedTableName: 'issuing_entities',
            referencedColumnNames: ['id'],
          },
          {
            columnNames: ['person_id'],
            referencedTableName: 'persons',
            referencedColumnNames: ['id'],
          },
        ],
        checks: [
          {
            name: 'CHK_access_requests_status',
            expression: `"status" IN ('pending', 'approved', 'rejected', 'expired')`,
          },
          {
            // decided_at is set exactly when the request leaves pending
            name: 'CHK_access_requests_decided_at',
            expression: `("status" = 'pending') = ("decided_at" IS NULL)`,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndices('access_requests', [
      new TableIndex({
        name: 'IDX_access_requests_person_requested_at',
        columnNames: ['person_id', 'requested_at'],
      }),
      new TableIndex({
        name: 'IDX_access_requests_entity_requested_at',
        columnNames: ['entity_id', 'requested_at'],
      }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'access_request_items',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'access_request_id', type: 'integer' },
          { name: 'person_document_id', type: 'integer' },
        ],
        foreignKeys: [
          {
            columnNames: ['access_request_id'],
            referencedTableName: 'access_requests',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
          {
            columnNames: ['person_document_id'],
            referencedTableName: 'person_documents',
            referencedColumnNames: ['id'],
          },
        ],
        indices: [
          {
            name: 'IDX_access_request_items_request_document',
            columnNames: ['access_request_id', 'person_document_id'],
            isUnique: true,
          },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // Foreign keys and indexes go with their tables
    await queryRunner.dropTable('access_request_items', true);
    await queryRunner.dropTable('access_requests', true);
    await queryRunner.dropTable('files', true);
    await queryRunner.dropTable('person_documents', true);
    await queryRunner.dropTable('document_definitions', true);
    await queryRunner.dropTable('issuing_entities', true);
    await queryRunner.dropTable('persons', true);
  }
}
