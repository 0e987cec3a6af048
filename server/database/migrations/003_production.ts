import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // 1. print_jobs
  // ============================================================

  await knex.schema.createTable('print_jobs', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies');
    t.uuid('branch_id').notNullable().references('id').inTable('branches');
    t.uuid('invoice_id').references('id').inTable('invoices').onDelete('SET NULL');
    t.string('job_number', 50).notNullable();
    t.string('job_type', 50).notNullable();
    t.string('production_status', 30).notNullable().defaultTo('pending');
    t.string('priority', 20).notNullable().defaultTo('normal');
    t.decimal('quantity', 12, 3).notNullable().defaultTo(1);
    t.integer('completion_percentage').notNullable().defaultTo(0);
    t.timestamp('started_at', { useTz: true });
    t.timestamp('actual_completion', { useTz: true });
    t.text('production_notes');
    t.jsonb('specifications').notNullable().defaultTo('{}');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.integer('version').notNullable().defaultTo(1);
    t.unique(['branch_id', 'job_number']);
    t.index(['company_id', 'production_status']);
  });

  await knex.raw(`ALTER TABLE print_jobs ADD CONSTRAINT chk_pj_status CHECK (production_status IN ('pending', 'design_review', 'design_approved', 'pre_press', 'printing', 'finishing', 'quality_check', 'completed', 'on_hold', 'cancelled'));`);
  await knex.raw(`ALTER TABLE print_jobs ADD CONSTRAINT chk_pj_priority CHECK (priority IN ('low', 'normal', 'high', 'urgent'));`);
  await knex.raw(`ALTER TABLE print_jobs ADD CONSTRAINT chk_pj_percentage CHECK (completion_percentage BETWEEN 0 AND 100);`);
  await knex.raw(`CREATE TRIGGER trg_print_jobs_upd BEFORE UPDATE ON print_jobs FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 2. production_stages
  // ============================================================

  await knex.schema.createTable('production_stages', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('print_job_id').notNullable().references('id').inTable('print_jobs').onDelete('CASCADE');
    t.string('stage_name', 100).notNullable();
    t.integer('stage_order').notNullable();
    t.string('stage_status', 30).notNullable().defaultTo('pending');
    t.timestamp('started_at', { useTz: true });
    t.timestamp('completed_at', { useTz: true });
    t.integer('actual_duration');
    t.integer('estimated_duration');
    t.boolean('requires_customer_approval').notNullable().defaultTo(false);
    t.timestamp('customer_approved_at', { useTz: true });
    t.uuid('approved_by');
    t.string('approval_status', 20);
    t.text('rejection_reason');
    t.text('notes');
    t.jsonb('stage_data').notNullable().defaultTo('{}');
    t.uuid('updated_by');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.integer('version').notNullable().defaultTo(1);
    t.unique(['print_job_id', 'stage_order']);
  });

  await knex.raw(`ALTER TABLE production_stages ADD CONSTRAINT chk_ps_status CHECK (stage_status IN ('pending', 'in_progress', 'completed', 'on_hold', 'requires_approval', 'rejected', 'skipped'));`);
  await knex.raw(`CREATE INDEX idx_ps_awaiting_approval ON production_stages (stage_status) WHERE stage_status = 'requires_approval';`);
  await knex.raw(`CREATE TRIGGER trg_production_stages_upd BEFORE UPDATE ON production_stages FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('production_stages');
  await knex.schema.dropTableIfExists('print_jobs');
}
