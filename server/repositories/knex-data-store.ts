import { Knex } from 'knex';
import { getDb } from '../database/connection';
import { KnexBranchRepository, KnexCompanyRepository, KnexProductRepository } from './setup.repository';
import { KnexWeightPricingTierRepository } from './weight-pricing-tier.repository';
import { KnexInvoiceLineItemRepository, KnexInvoiceRepository, KnexPaymentRepository } from './invoice.repository';
import { KnexPrintJobRepository, KnexProductionStageRepository } from './production.repository';
import type { DataStore, Repositories } from './types';

export function knexRepositories(trx: Knex | Knex.Transaction): Repositories {
  return {
    companies: new KnexCompanyRepository(trx, 'companies'),
    branches: new KnexBranchRepository(trx, 'branches'),
    products: new KnexProductRepository(trx, 'products'),
    tiers: new KnexWeightPricingTierRepository(trx, 'weight_pricing_tiers'),
    invoices: new KnexInvoiceRepository(trx, 'invoices'),
    lineItems: new KnexInvoiceLineItemRepository(trx, 'invoice_line_items'),
    payments: new KnexPaymentRepository(trx, 'payments'),
    printJobs: new KnexPrintJobRepository(trx, 'print_jobs'),
    stages: new KnexProductionStageRepository(trx, 'production_stages'),
  };
}

export class KnexDataStore implements DataStore {
  // Resolved lazily so building the server does not open a pool.
  constructor(private readonly resolveDb: () => Knex = getDb) {}

  async transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return this.resolveDb().transaction(async (trx) => fn(knexRepositories(trx)));
  }
}
