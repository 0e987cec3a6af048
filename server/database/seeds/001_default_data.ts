import { Knex } from 'knex';
import { moduleLogger } from '../../lib/logger';

const log = moduleLogger('seed');

/**
 * Seeds a demo company with a main branch, a walk-in customer and a few print
 * products. No weight pricing tiers: a company without tiers is priced by the
 * built-in default ladder.
 *
 * Usage: npm run seed
 *
 * Skips any part that already has rows for the first company.
 */
export async function seed(knex: Knex): Promise<void> {
  let company = await knex('companies').where('is_deleted', false).first();
  if (!company) {
    [company] = await knex('companies')
      .insert({ name: 'Demo Print Shop', email: 'office@example.com', tax_rate: 0.12 })
      .returning('*');
    log.info({ companyId: company.id }, 'Created demo company');
  }

  const companyId: string = company.id;

  // ============================================================
  // 1. Branch & customer
  // ============================================================

  const branch = await knex('branches').where({ company_id: companyId, is_main_branch: true }).first();
  if (!branch) {
    await knex('branches').insert({ company_id: companyId, code: 'MAIN', name: 'Main Branch', is_main_branch: true });
  }

  const existingCustomers = await knex('customers').where({ company_id: companyId }).count('id as count').first();
  if (parseInt(String(existingCustomers?.count || '0'), 10) === 0) {
    await knex('customers').insert({ company_id: companyId, name: 'Walk-in Customer' });
  }

  // ============================================================
  // 2. Products
  // ============================================================

  const existingProducts = await knex('products').where({ company_id: companyId }).count('id as count').first();
  if (parseInt(String(existingProducts?.count || '0'), 10) === 0) {
    await knex('products').insert([
      { company_id: companyId, product_code: 'BC-STD', name: 'Standard Business Cards (100)', base_price: 450, weight_per_unit: 250, weight_unit: 'g', tax_rate: 0, minimum_quantity: 1 },
      { company_id: companyId, product_code: 'FLY-A5', name: 'A5 Flyers (500)', base_price: 1800, weight_per_unit: 1.2, weight_unit: 'kg', tax_rate: 0 },
      { company_id: companyId, product_code: 'BRO-TRI', name: 'Tri-fold Brochures (250)', base_price: 3200, weight_per_unit: 2.5, weight_unit: 'lb', tax_rate: 0 },
      { company_id: companyId, product_code: 'BAN-VIN', name: 'Vinyl Banner 2x1m', base_price: 2500, weight_per_unit: 32, weight_unit: 'oz', tax_rate: 5, maximum_quantity: 20 },
    ]);
  }

  log.info({ companyId }, 'Default data seeded');
}
