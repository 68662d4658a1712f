import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates the users and transcripts tables.
 *
 * Hand-written to match the entity definitions. PostgreSQL-specific
 * (uuid_generate_v4, timestamptz, plpgsql trigger).
 */
export class InitialSchema1760860000000 implements MigrationInterface {
  name = 'InitialSchema1760860000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Transcripts table ──────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "transcripts" (
        "id"               uuid NOT NULL DEFAULT uuid_generate_v4(),
        "user_id"          uuid NOT NULL,
        "filename"         varchar(255) NOT NULL,
        "transcription"    text NOT NULL,
        "file_size"        bigint NOT NULL,
        "duration_seconds" double precision,
        "created_at"       TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_transcripts" PRIMARY KEY ("id"),
        CONSTRAINT "FK_transcripts_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_transcripts_user_id" ON "transcripts" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_transcripts_user_created" ON "transcripts" ("user_id", "created_at" DESC)`,
    );

    // ── Keep users.updated_at current ──────────────────────
    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION "set_updated_at"() RETURNS TRIGGER AS $$
      BEGIN
        NEW."updated_at" = now();
        RETURN NEW;
      END;
      $$ LANGUAGE plpgsql
    `);
    await queryRunner.query(`
      CREATE TRIGGER "TRG_users_updated_at"
        BEFORE UPDATE ON "users"
        FOR EACH ROW EXECUTE FUNCTION "set_updated_at"()
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP TRIGGER IF EXISTS "TRG_users_updated_at" ON "users"`,
    );
    await queryRunner.query(`DROP FUNCTION IF EXISTS "set_updated_at"()`);

    // ── Drop tables (reverse order of creation) ────────────
    await queryRunner.query(`DROP TABLE IF EXISTS "transcripts"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);

    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
