import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateProcessedFiles1767225600000 implements MigrationInterface {
  name = 'CreateProcessedFiles1767225600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "public"."processed_files_outcome_enum" AS ENUM('ACCEPTED', 'SKIPPED')`,
    );
    await queryRunner.query(
      `CREATE TABLE "processed_files" ("source_file_id" character varying(255) NOT NULL, "outcome" "public"."processed_files_outcome_enum" NOT NULL, "file_name" character varying(512), "detail" character varying(255), "processed_at" TIMESTAMP WITH TIME ZONE NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_processed_files_source_file_id" PRIMARY KEY ("source_file_id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_processed_files_processed_at" ON "processed_files" ("processed_at") `,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP INDEX "public"."IDX_processed_files_processed_at"`,
    );
    await queryRunner.query(`DROP TABLE "processed_files"`);
    await queryRunner.query(
      `DROP TYPE "public"."processed_files_outcome_enum"`,
    );
  }
}
