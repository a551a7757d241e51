import { MigrationInterface, QueryRunner } from 'typeorm';
import referenceData from '../seeds/reference-data.json';

/**
 * Seeds workflow statuses, departments and categories. Existing rows with
 * the same name are left alone.
 */
export class SeedReferenceData1780000001000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    for (const status of referenceData.workflowStatuses) {
      await queryRunner.query(
        `INSERT INTO "workflow_statuses" ("name", "description") VALUES ($1, $2)
         ON CONFLICT ("name") DO NOTHING`,
        [status.name, status.description],
      );
    }

    for (const department of referenceData.departments) {
      await queryRunner.query(
        `INSERT INTO "departments" ("name", "code", "description") VALUES ($1, $2, $3)
         ON CONFLICT ("code") DO NOTHING`,
        [department.name, department.code, department.description],
      );
    }

    for (const category of referenceData.categories) {
      await queryRunner.query(
        `INSERT INTO "categories" ("name") VALUES ($1)
         ON CONFLICT ("name") DO NOTHING`,
        [category.name],
      );
      for (const subcategory of category.subcategories) {
        await queryRunner.query(
          `INSERT INTO "subcategories" ("category_id", "name")
           SELECT "id", $2 FROM "categories" WHERE "name" = $1
             AND NOT EXISTS (
               SELECT 1 FROM "subcategories" s
               JOIN "categories" c ON c."id" = s."category_id"
               WHERE c."name" = $1 AND s."name" = $2
             )`,
          [category.name, subcategory],
        );
      }
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DELETE FROM "subcategories"`);
    await queryRunner.query(`DELETE FROM "categories"`);
    await queryRunner.query(`DELETE FROM "departments"`);
    await queryRunner.query(`DELETE FROM "workflow_statuses"`);
  }
}
