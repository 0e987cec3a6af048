import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // Extensions & trigger functions
  // ============================================================

  await knex.raw('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');

  await knex.raw(`
    CREATE OR REPLACE FUNCTION trigger_set_updated_at()
    RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = NOW();
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql;
  `);

  // ============================================================
  // 1. companies
  // ============================================================

  await knex.schema.createTable('companies', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('name', 255).notNullable();
    t.string('email', 255);
    t.string('phone', 20);
    t.text('address');
    t.decimal('tax_rate', 5, 4);
    t.jsonb('settings').notNullable().defaultTo('{}');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.boolean('is_deleted').notNullable().defaultTo(false);
  });

  await knex.raw(`ALTER TABLE companies ADD CONSTRAINT chk_companies_tax_rate CHECK (tax_rate IS NULL OR (tax_rate >= 0 AND tax_rate <= 1));`);
  await knex.raw(`CREATE TRIGGER trg_companies_upd BEFORE UPDATE ON companies FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 2. branches
  // ============================================================

  await knex.schema.createTable('branches', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies').onDelete('CASCADE');
    t.string('code', 20).notNullable();
    t.string('name', 255).notNullable();
    t.text('address');
    t.string('phone', 20);
    t.boolean('is_main_branch').notNullable().defaultTo(false);
    t.string('status', 20).notNullable().defaultTo('active');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.boolean('is_deleted').notNullable().defaultTo(false);
    t.unique(['company_id', 'code']);
  });

  await knex.raw(`ALTER TABLE branches ADD CONSTRAINT chk_branches_code CHECK (code ~ '^[A-Z0-9]+$');`);
  await knex.raw(`ALTER TABLE branches ADD CONSTRAINT chk_branches_status CHECK (status IN ('active', 'inactive'));`);
  await knex.raw(`CREATE TRIGGER trg_branches_upd BEFORE UPDATE ON branches FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 3. customers
  // ============================================================

  await knex.schema.createTable('customers', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies').onDelete('CASCADE');
    t.string('name', 255).notNullable();
    t.string('email', 255);
    t.string('phone', 20);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.boolean('is_deleted').notNullable().defaultTo(false);
    t.index(['company_id']);
  });

  await knex.raw(`CREATE TRIGGER trg_customers_upd BEFORE UPDATE ON customers FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 4. products
  // ============================================================

  await knex.schema.createTable('products', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies').onDelete('CASCADE');
    t.string('product_code', 50).notNullable();
    t.string('name', 255).notNullable();
    t.text('description');
    t.decimal('base_price', 12, 2).notNullable().defaultTo(0);
    t.decimal('weight_per_unit', 10, 3).notNullable().defaultTo(0);
    t.string('weight_unit', 10).notNullable().defaultTo('kg');
    t.decimal('tax_rate', 5, 2).notNullable().defaultTo(0);
    t.decimal('minimum_quantity', 12, 3);
    t.decimal('maximum_quantity', 12, 3);
    t.string('status', 20).notNullable().defaultTo('active');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.boolean('is_deleted').notNullable().defaultTo(false);
    t.unique(['company_id', 'product_code']);
  });

  await knex.raw(`ALTER TABLE products ADD CONSTRAINT chk_products_weight_unit CHECK (weight_unit IN ('kg', 'g', 'grams', 'lb', 'oz'));`);
  await knex.raw(`ALTER TABLE products ADD CONSTRAINT chk_products_qty_range CHECK (maximum_quantity IS NULL OR minimum_quantity IS NULL OR maximum_quantity >= minimum_quantity);`);
  await knex.raw(`CREATE TRIGGER trg_products_upd BEFORE UPDATE ON products FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);

  // ============================================================
  // 5. weight_pricing_tiers
  // ============================================================

  await knex.schema.createTable('weight_pricing_tiers', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('company_id').notNullable().references('id').inTable('companies').onDelete('CASCADE');
    t.string('tier_name', 100).notNullable();
    t.decimal('min_weight', 10, 3).notNullable().defaultTo(0);
    t.decimal('max_weight', 10, 3);
    t.decimal('base_price', 12, 2).notNullable().defaultTo(0);
    t.decimal('price_per_kg', 12, 2).notNullable().defaultTo(0);
    t.string('status', 20).notNullable().defaultTo('active');
    t.integer('sort_order').notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['company_id', 'status', 'min_weight']);
  });

  await knex.raw(`ALTER TABLE weight_pricing_tiers ADD CONSTRAINT chk_wpt_range CHECK (min_weight >= 0 AND (max_weight IS NULL OR max_weight >= min_weight));`);
  await knex.raw(`ALTER TABLE weight_pricing_tiers ADD CONSTRAINT chk_wpt_status CHECK (status IN ('active', 'inactive'));`);
  await knex.raw(`CREATE TRIGGER trg_wpt_upd BEFORE UPDATE ON weight_pricing_tiers FOR EACH ROW EXECUTE FUNCTION trigger_set_updated_at();`);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('weight_pricing_tiers');
  await knex.schema.dropTableIfExists('products');
  await knex.schema.dropTableIfExists('customers');
  await knex.schema.dropTableIfExists('branches');
  await knex.schema.dropTableIfExists('companies');
  await knex.raw('DROP FUNCTION IF EXISTS trigger_set_updated_at CASCADE;');
}
