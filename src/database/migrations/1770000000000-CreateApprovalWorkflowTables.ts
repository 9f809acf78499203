import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Approval workflow schema: documents, review cycles, reviewer assignments,
 * write-once decisions, delegations, escalation records and the
 * notification outbox.
 */
export class CreateApprovalWorkflowTables1770000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TYPE approval_documents_status_enum
      AS ENUM ('draft', 'review', 'approved', 'rejected');
    `);
    await queryRunner.query(`
      CREATE TYPE review_cycles_outcome_enum
      AS ENUM ('pending', 'approved', 'rejected');
    `);
    await queryRunner.query(`
      CREATE TYPE review_decisions_verdict_enum
      AS ENUM ('approve', 'reject');
    `);

    await queryRunner.query(`
      CREATE TABLE approval_documents (
        id uuid PRIMARY KEY,
        author_id varchar(255) NOT NULL,
        title varchar(500) NOT NULL,
        body text NOT NULL,
        status approval_documents_status_enum NOT NULL DEFAULT 'draft',
        current_cycle_id uuid NULL,
        escalation_timeout_hours double precision NULL
          CHECK (escalation_timeout_hours IS NULL OR escalation_timeout_hours >= 0),
        escalation_ladder jsonb NOT NULL DEFAULT '[]',
        escalation_depth integer NOT NULL DEFAULT 0
          CHECK (escalation_depth >= 0),
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_approval_documents_author_id" ON approval_documents (author_id);`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_approval_documents_status" ON approval_documents (status);`,
    );

    await queryRunner.query(`
      CREATE TABLE review_cycles (
        id uuid PRIMARY KEY,
        document_id uuid NOT NULL REFERENCES approval_documents (id) ON DELETE CASCADE,
        cycle_number integer NOT NULL,
        reviewer_ids jsonb NOT NULL,
        outcome review_cycles_outcome_enum NOT NULL DEFAULT 'pending',
        created_at timestamptz NOT NULL,
        closed_at timestamptz NULL,
        CONSTRAINT "UQ_review_cycles_document_cycle" UNIQUE (document_id, cycle_number)
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_review_cycles_document_id" ON review_cycles (document_id);`,
    );
    await queryRunner.query(`
      ALTER TABLE approval_documents
      ADD CONSTRAINT "FK_approval_documents_current_cycle"
      FOREIGN KEY (current_cycle_id) REFERENCES review_cycles (id)
      DEFERRABLE INITIALLY DEFERRED;
    `);

    await queryRunner.query(`
      CREATE TABLE reviewer_assignments (
        id uuid PRIMARY KEY,
        cycle_id uuid NOT NULL REFERENCES review_cycles (id) ON DELETE CASCADE,
        reviewer_id varchar(255) NOT NULL,
        assigned_at timestamptz NOT NULL,
        escalated boolean NOT NULL DEFAULT false,
        escalation_depth integer NOT NULL DEFAULT 0,
        CONSTRAINT "UQ_reviewer_assignments_cycle_reviewer" UNIQUE (cycle_id, reviewer_id)
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_reviewer_assignments_cycle_id" ON reviewer_assignments (cycle_id);`,
    );

    await queryRunner.query(`
      CREATE TABLE review_decisions (
        id uuid PRIMARY KEY,
        cycle_id uuid NOT NULL REFERENCES review_cycles (id) ON DELETE CASCADE,
        reviewer_id varchar(255) NOT NULL,
        acting_actor_id varchar(255) NOT NULL,
        verdict review_decisions_verdict_enum NOT NULL,
        reason text NULL,
        decided_at timestamptz NOT NULL,
        CONSTRAINT "UQ_review_decisions_cycle_reviewer" UNIQUE (cycle_id, reviewer_id),
        CONSTRAINT "CHK_review_decisions_reject_reason"
          CHECK (verdict = 'approve' OR (reason IS NOT NULL AND length(trim(reason)) > 0))
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_review_decisions_cycle_id" ON review_decisions (cycle_id);`,
    );

    await queryRunner.query(`
      CREATE TABLE review_delegations (
        id uuid PRIMARY KEY,
        document_id uuid NOT NULL REFERENCES approval_documents (id) ON DELETE CASCADE,
        cycle_id uuid NOT NULL REFERENCES review_cycles (id) ON DELETE CASCADE,
        delegator_id varchar(255) NOT NULL,
        substitute_id varchar(255) NOT NULL,
        expires_at timestamptz NOT NULL,
        revoked boolean NOT NULL DEFAULT false,
        revoked_at timestamptz NULL,
        created_at timestamptz NOT NULL,
        CONSTRAINT "CHK_review_delegations_not_self" CHECK (delegator_id <> substitute_id)
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_review_delegations_document_delegator" ON review_delegations (document_id, delegator_id);`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_review_delegations_substitute_id" ON review_delegations (substitute_id);`,
    );

    await queryRunner.query(`
      CREATE TABLE escalation_records (
        id uuid PRIMARY KEY,
        document_id uuid NOT NULL REFERENCES approval_documents (id) ON DELETE CASCADE,
        cycle_id uuid NOT NULL REFERENCES review_cycles (id) ON DELETE CASCADE,
        depth integer NOT NULL CHECK (depth >= 1),
        escalated_to_id varchar(255) NOT NULL,
        escalated_from_ids jsonb NOT NULL,
        triggered_at timestamptz NOT NULL,
        timeout_hours double precision NOT NULL,
        CONSTRAINT "UQ_escalation_records_cycle_depth" UNIQUE (cycle_id, depth)
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_escalation_records_document_id" ON escalation_records (document_id);`,
    );

    await queryRunner.query(`
      CREATE TABLE notification_events (
        id uuid PRIMARY KEY,
        document_id uuid NOT NULL REFERENCES approval_documents (id) ON DELETE CASCADE,
        recipient_id varchar(255) NOT NULL,
        type varchar(50) NOT NULL,
        cycle_id uuid NULL,
        message text NOT NULL,
        created_at timestamptz NOT NULL
      );
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_notification_events_document_id" ON notification_events (document_id);`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_notification_events_recipient_created" ON notification_events (recipient_id, created_at);`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS notification_events;`);
    await queryRunner.query(`DROP TABLE IF EXISTS escalation_records;`);
    await queryRunner.query(`DROP TABLE IF EXISTS review_delegations;`);
    await queryRunner.query(`DROP TABLE IF EXISTS review_decisions;`);
    await queryRunner.query(`DROP TABLE IF EXISTS reviewer_assignments;`);
    await queryRunner.query(
      `ALTER TABLE approval_documents DROP CONSTRAINT IF EXISTS "FK_approval_documents_current_cycle";`,
    );
    await queryRunner.query(`DROP TABLE IF EXISTS review_cycles;`);
    await queryRunner.query(`DROP TABLE IF EXISTS approval_documents;`);
    await queryRunner.query(`DROP TYPE IF EXISTS review_decisions_verdict_enum;`);
    await queryRunner.query(`DROP TYPE IF EXISTS review_cycles_outcome_enum;`);
    await queryRunner.query(`DROP TYPE IF EXISTS approval_documents_status_enum;`);
  }
}
