import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableCheck,
  TableColumnOptions,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

const idColumn: TableColumnOptions = {
  name: 'id',
  type: 'integer',
  isPrimary: true,
  isGenerated: true,
  generationStrategy: 'increment',
};

const createdAtColumn: TableColumnOptions = {
  name: 'created_at',
  type: 'timestamp',
  default: 'now()',
  isNullable: false,
};

const updatedAtColumn: TableColumnOptions = {
  name: 'updated_at',
  type: 'timestamp',
  default: 'now()',
  isNullable: false,
};

function requestColumn(): TableColumnOptions {
  return { name: 'opinion_request_id', type: 'integer', isNullable: false };
}

function requestForeignKey(): TableForeignKey {
  return new TableForeignKey({
    columnNames: ['opinion_request_id'],
    referencedTableName: 'opinion_requests',
    referencedColumnNames: ['id'],
    onDelete: 'CASCADE',
  });
}

function text(name: string, isNullable = true): TableColumnOptions {
  return { name, type: 'text', isNullable };
}

export class CreateOpinionWorkflowTables1780000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    // Reference data
    await queryRunner.createTable(
      new Table({
        name: 'departments',
        columns: [
          idColumn,
          { name: 'name', type: 'varchar', length: '255', isUnique: true },
          { name: 'code', type: 'varchar', length: '50', isUnique: true },
          text('description'),
          createdAtColumn,
          updatedAtColumn,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          idColumn,
          { name: 'email', type: 'varchar', length: '255', isUnique: true },
          { name: 'is_active', type: 'boolean', default: true },
          { name: 'department_id', type: 'integer', isNullable: true },
          createdAtColumn,
          updatedAtColumn,
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
            onDelete: 'SET NULL',
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_users_department_id',
            columnNames: ['department_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'workflow_statuses',
        columns: [
          idColumn,
          { name: 'name', type: 'varchar', length: '50', isUnique: true },
          text('description'),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'categories',
        columns: [
          idColumn,
          { name: 'name', type: 'varchar', length: '255', isUnique: true },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'subcategories',
        columns: [
          idColumn,
          { name: 'category_id', type: 'integer', isNullable: false },
          { name: 'name', type: 'varchar', length: '255' },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['category_id'],
            referencedTableName: 'categories',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_subcategories_category_id',
            columnNames: ['category_id'],
          }),
        ],
      }),
      true,
    );

    // Aggregate root
    await queryRunner.createTable(
      new Table({
        name: 'opinion_requests',
        columns: [
          idColumn,
          {
            name: 'reference_number',
            type: 'varchar',
            length: '20',
            isUnique: true,
          },
          { name: 'title', type: 'varchar', length: '255' },
          text('description'),
          { name: 'requester_id', type: 'integer' },
          { name: 'department_id', type: 'integer' },
          { name: 'category_id', type: 'integer' },
          { name: 'subcategory_id', type: 'integer', isNullable: true },
          {
            name: 'priority',
            type: 'varchar',
            length: '10',
            default: "'medium'",
          },
          { name: 'current_status_id', type: 'integer' },
          { name: 'due_date', type: 'timestamp', isNullable: true },
          { name: 'version', type: 'integer', default: 1 },
          text('request_statement'),
          text('challenges_opportunities'),
          text('subject_content'),
          text('alternatives'),
          text('expected_impact'),
          text('potential_risks'),
          text('studies_statistics'),
          text('legal_financial_opinions'),
          text('stakeholder_feedback'),
          text('work_plan'),
          text('decision_draft'),
          { name: 'is_deleted', type: 'boolean', default: false },
          { name: 'deleted_by', type: 'integer', isNullable: true },
          { name: 'deleted_at', type: 'timestamp', isNullable: true },
          createdAtColumn,
          updatedAtColumn,
        ],
        checks: [
          new TableCheck({
            name: 'CHK_opinion_requests_priority',
            expression: `"priority" IN ('low', 'medium', 'high', 'urgent')`,
          }),
          new TableCheck({
            name: 'CHK_opinion_requests_version',
            expression: '"version" >= 1',
          }),
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['category_id'],
            referencedTableName: 'categories',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['subcategory_id'],
            referencedTableName: 'subcategories',
            referencedColumnNames: ['id'],
            onDelete: 'SET NULL',
          }),
          new TableForeignKey({
            columnNames: ['current_status_id'],
            referencedTableName: 'workflow_statuses',
            referencedColumnNames: ['id'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_opinion_requests_requester_id',
            columnNames: ['requester_id'],
          }),
          new TableIndex({
            name: 'IDX_opinion_requests_department_id',
            columnNames: ['department_id'],
          }),
          new TableIndex({
            name: 'IDX_opinion_requests_category_id',
            columnNames: ['category_id'],
          }),
          new TableIndex({
            name: 'IDX_opinion_requests_current_status_id',
            columnNames: ['current_status_id'],
          }),
          new TableIndex({
            name: 'IDX_opinion_requests_is_deleted',
            columnNames: ['is_deleted'],
          }),
          new TableIndex({
            name: 'IDX_opinion_requests_created_at',
            columnNames: ['created_at'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'request_assignments',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'department_id', type: 'integer' },
          { name: 'assigned_by', type: 'integer' },
          { name: 'expert_id', type: 'integer', isNullable: true },
          { name: 'status_id', type: 'integer' },
          { name: 'assigned_at', type: 'timestamp', default: 'now()' },
          { name: 'due_date', type: 'timestamp', isNullable: true },
          { name: 'is_primary', type: 'boolean', default: false },
          text('remarks'),
          createdAtColumn,
        ],
        foreignKeys: [
          requestForeignKey(),
          new TableForeignKey({
            columnNames: ['department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['status_id'],
            referencedTableName: 'workflow_statuses',
            referencedColumnNames: ['id'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_request_assignments_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
          new TableIndex({
            name: 'IDX_request_assignments_department_id',
            columnNames: ['department_id'],
          }),
          new TableIndex({
            name: 'IDX_request_assignments_expert_id',
            columnNames: ['expert_id'],
          }),
          // At most one primary assignment per request
          new TableIndex({
            name: 'IDX_request_assignments_single_primary',
            columnNames: ['opinion_request_id'],
            isUnique: true,
            where: '"is_primary" = true',
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'opinions',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'department_id', type: 'integer' },
          { name: 'expert_id', type: 'integer' },
          text('content', false),
          text('recommendation'),
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: "'draft'",
          },
          text('review_comments'),
          { name: 'reviewed_by', type: 'integer', isNullable: true },
          { name: 'reviewed_at', type: 'timestamp', isNullable: true },
          { name: 'submitted_at', type: 'timestamp', isNullable: true },
          createdAtColumn,
          updatedAtColumn,
        ],
        checks: [
          new TableCheck({
            name: 'CHK_opinions_status',
            expression: `"status" IN ('draft', 'submitted', 'reviewed', 'approved', 'rejected', 'unassigned')`,
          }),
        ],
        foreignKeys: [
          requestForeignKey(),
          new TableForeignKey({
            columnNames: ['department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_opinions_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
          new TableIndex({
            name: 'IDX_opinions_expert_id',
            columnNames: ['expert_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'workflow_history',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'action_type', type: 'varchar', length: '50' },
          { name: 'action_by', type: 'integer' },
          { name: 'from_status_id', type: 'integer', isNullable: true },
          { name: 'to_status_id', type: 'integer' },
          { name: 'action_details', type: 'jsonb', default: "'{}'" },
          createdAtColumn,
        ],
        foreignKeys: [
          requestForeignKey(),
          new TableForeignKey({
            columnNames: ['from_status_id'],
            referencedTableName: 'workflow_statuses',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['to_status_id'],
            referencedTableName: 'workflow_statuses',
            referencedColumnNames: ['id'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_workflow_history_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'request_documents',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'file_name', type: 'varchar', length: '255' },
          { name: 'stored_name', type: 'varchar', length: '300' },
          { name: 'file_path', type: 'varchar', length: '1024' },
          { name: 'file_type', type: 'varchar', length: '255' },
          { name: 'file_size', type: 'integer' },
          { name: 'uploaded_by', type: 'integer' },
          text('remarks'),
          createdAtColumn,
        ],
        foreignKeys: [requestForeignKey()],
        indices: [
          new TableIndex({
            name: 'IDX_request_documents_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'request_remarks',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'user_id', type: 'integer' },
          text('content', false),
          createdAtColumn,
        ],
        foreignKeys: [requestForeignKey()],
        indices: [
          new TableIndex({
            name: 'IDX_request_remarks_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'interdepartmental_communications',
        columns: [
          idColumn,
          requestColumn(),
          { name: 'from_department_id', type: 'integer' },
          { name: 'to_department_id', type: 'integer' },
          { name: 'from_user_id', type: 'integer' },
          { name: 'to_user_id', type: 'integer', isNullable: true },
          { name: 'subject', type: 'varchar', length: '255' },
          text('content', false),
          { name: 'priority', type: 'varchar', length: '10' },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: "'pending'",
          },
          { name: 'requires_response', type: 'boolean', default: true },
          { name: 'due_date', type: 'timestamp', isNullable: true },
          createdAtColumn,
          updatedAtColumn,
        ],
        checks: [
          new TableCheck({
            name: 'CHK_communications_distinct_departments',
            expression: '"to_department_id" <> "from_department_id"',
          }),
          new TableCheck({
            name: 'CHK_communications_status',
            expression: `"status" IN ('pending', 'responded', 'closed')`,
          }),
          new TableCheck({
            name: 'CHK_communications_priority',
            expression: `"priority" IN ('low', 'medium', 'high', 'urgent')`,
          }),
        ],
        foreignKeys: [
          requestForeignKey(),
          new TableForeignKey({
            columnNames: ['from_department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['to_department_id'],
            referencedTableName: 'departments',
            referencedColumnNames: ['id'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_communications_opinion_request_id',
            columnNames: ['opinion_request_id'],
          }),
          new TableIndex({
            name: 'IDX_communications_to_department_id',
            columnNames: ['to_department_id'],
          }),
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('interdepartmental_communications', true);
    await queryRunner.dropTable('request_remarks', true);
    await queryRunner.dropTable('request_documents', true);
    await queryRunner.dropTable('workflow_history', true);
    await queryRunner.dropTable('opinions', true);
    await queryRunner.dropTable('request_assignments', true);
    await queryRunner.dropTable('opinion_requests', true);
    await queryRunner.dropTable('subcategories', true);
    await queryRunner.dropTable('categories', true);
    await queryRunner.dropTable('workflow_statuses', true);
    await queryRunner.dropTable('users', true);
    await queryRunner.dropTable('departments', true);
  }
}
