import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1730000000001 implements MigrationInterface {
  name = 'InitialSchema1730000000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // Create teams table
    await queryRunner.query(`
      CREATE TABLE "teams" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "name" text NOT NULL,
        "fifa_code" character varying(3) NOT NULL,
        "iso2" character varying(2) NOT NULL,
        "rank" integer NOT NULL,
        "group" text,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_teams" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_teams_fifa_code" UNIQUE ("fifa_code")
      )
    `);

    // Create games table
    await queryRunner.query(`
      CREATE TABLE "games" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "group" text NOT NULL,
        "home_team" uuid NOT NULL,
        "away_team" uuid NOT NULL,
        "home_result" integer,
        "away_result" integer,
        "home_fair_play" jsonb,
        "away_fair_play" jsonb,
        "played" boolean NOT NULL DEFAULT false,
        "kickoff" TIMESTAMP WITH TIME ZONE NOT NULL,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_games" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_games_distinct_teams" CHECK ("home_team" <> "away_team"),
        CONSTRAINT "CHK_games_results" CHECK ("home_result" >= 0 AND "away_result" >= 0)
      )
    `);

    // Add foreign key constraints
    await queryRunner.query(`
      ALTER TABLE "games"
      ADD CONSTRAINT "FK_games_home_team"
      FOREIGN KEY ("home_team") REFERENCES "teams"("id") ON DELETE CASCADE
    `);

    await queryRunner.query(`
      ALTER TABLE "games"
      ADD CONSTRAINT "FK_games_away_team"
      FOREIGN KEY ("away_team") REFERENCES "teams"("id") ON DELETE CASCADE
    `);

    // Create indexes for group lookups
    await queryRunner.query(`
      CREATE INDEX "idx_teams_group" ON "teams"("group")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_games_group_kickoff" ON "games"("group", "kickoff")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_games_group_kickoff"`);
    await queryRunner.query(`DROP INDEX "idx_teams_group"`);

    await queryRunner.query(`DROP TABLE "games"`);
    await queryRunner.query(`DROP TABLE "teams"`);
  }
}
