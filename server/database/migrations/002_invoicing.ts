import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // 1. invoices
  // ============================================================

  await knex.schema.createTable('invoices', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies');
    t.uuid('branch_id').notNullable().references('id').inTable('branches');
    t.uuid('customer_id').notNullable().references('id').inTable('customers');
    t.uuid('created_by').notNullable();
    t.string('invoice_number', 50).notNullable();
    t.date('invoice_date').notNullable();
    t.date('due_date').notNullable();
    t.decimal('subtotal', 14, 2).notNullable().defaultTo(0);
    t.decimal('weight_charge', 14, 2).notNullable().defaultTo(0);
    t.decimal('tax_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('discount_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('total_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('total_weight', 12, 3).notNullable().defaultTo(0);
    t.string('status', 20).notNullable().defaultTo('draft');
    t.string('payment_status', 20).notNullable().defaultTo('pending');
    t.text('notes');
    t.text('terms_conditions');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.boolean('is_deleted').notNullable().defaultTo(false);
    t.timestamp('deleted_at', { useTz: true });
    t.integer('version').notNullable().defaultTo(1);
    t.unique(['branch_id', 'invoice_number']);
    t.index(['branch_id', 'created_at']);
    t.index(['company_id', 'status']);
  });

  await knex.raw(`ALTER TABLE invoices ADD CONSTRAINT chk_invoices_status CHECK (status IN ('draft', 'pending', 'processing', 'completed', 'cancelled'));`);
  await knex.raw(`ALTER TABLE invoices ADD CONSTRAINT chk_invoices_payment_status CHECK (payment_status IN ('pending', 'partially_paid', 'paid', 'refunded'));`);
  await knex.raw(`ALTER TABLE invoices ADD CONSTRAINT chk_invoices_discount CHECK (discount_amount >= 0);`);
  await knex.raw(`CREATE TRIGGER trg_invoices_upd BEFORE UPDATE ON invoices FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 2. invoice_line_items
  // ============================================================

  await knex.schema.createTable('invoice_line_items', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('invoice_id').notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.uuid('product_id').notNullable().references('id').inTable('products');
    t.text('item_description').notNullable();
    t.decimal('quantity', 12, 3).notNullable();
    t.decimal('unit_price', 12, 2).notNullable().defaultTo(0);
    t.decimal('unit_weight', 10, 3).notNullable().defaultTo(0);
    t.decimal('line_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('line_weight', 12, 3).notNullable().defaultTo(0);
    t.decimal('tax_amount', 14, 2).notNullable().defaultTo(0);
    t.jsonb('specifications').notNullable().defaultTo('{}');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['invoice_id']);
  });

  await knex.raw(`ALTER TABLE invoice_line_items ADD CONSTRAINT chk_ili_values CHECK (quantity > 0 AND unit_price >= 0 AND unit_weight >= 0);`);
  await knex.raw(`CREATE TRIGGER trg_ili_upd BEFORE UPDATE ON invoice_line_items FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 3. payments
  // ============================================================

  await knex.schema.createTable('payments', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('invoice_id').notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.decimal('amount', 14, 2).notNullable();
    t.string('payment_method', 30).notNullable();
    t.date('payment_date').notNullable();
    t.string('status', 20).notNullable().defaultTo('completed');
    t.string('reference', 100);
    t.uuid('received_by').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['invoice_id']);
  });

  await knex.raw(`ALTER TABLE payments ADD CONSTRAINT chk_payments_amount CHECK (amount > 0);`);
  await knex.raw(`ALTER TABLE payments ADD CONSTRAINT chk_payments_method CHECK (payment_method IN ('cash', 'bank_transfer', 'online', 'card', 'cheque', 'mobile_payment'));`);
  await knex.raw(`ALTER TABLE payments ADD CONSTRAINT chk_payments_status CHECK (status IN ('pending', 'completed', 'failed', 'cancelled', 'refunded'));`);
  await knex.raw(`CREATE TRIGGER trg_payments_upd BEFORE UPDATE ON payments FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('payments');
  await knex.schema.dropTableIfExists('invoice_line_items');
  await knex.schema.dropTableIfExists('invoices');
}
