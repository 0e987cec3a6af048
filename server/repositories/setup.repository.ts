// =============================================================
// File: server/repositories/setup.repository.ts
// Module: Company Setup
// Description: Read access to companies, branches and products.
// =============================================================

import type { Branch, Company, Product } from '../../shared/types';
import { parseNum, parseNullableNum } from '../lib/numbers';
import { BaseRepository, RowOf, jsonMap } from './base.repository';
import type { BranchRepository, CompanyRepository, ProductRepository } from './types';

type CompanyRow = RowOf<Company, 'tax_rate'>;
type ProductRow = RowOf<Product, 'base_price' | 'weight_per_unit' | 'tax_rate' | 'minimum_quantity' | 'maximum_quantity'>;

function toCompany(row: CompanyRow): Company {
  return {
    ...row,
    tax_rate: parseNullableNum(row.tax_rate),
    settings: jsonMap(row.settings),
  };
}

function toProduct(row: ProductRow): Product {
  return {
    ...row,
    base_price: parseNum(row.base_price),
    weight_per_unit: parseNum(row.weight_per_unit),
    tax_rate: parseNum(row.tax_rate),
    minimum_quantity: parseNullableNum(row.minimum_quantity),
    maximum_quantity: parseNullableNum(row.maximum_quantity),
  };
}

export class KnexCompanyRepository extends BaseRepository implements CompanyRepository {
  async findById(id: string): Promise<Company | null> {
    const row: CompanyRow | undefined = await this.table.where({ id, is_deleted: false }).first();
    return row ? toCompany(row) : null;
  }
}

export class KnexBranchRepository extends BaseRepository implements BranchRepository {
  async findById(id: string): Promise<Branch | null> {
    const row: Branch | undefined = await this.table.where({ id, is_deleted: false }).first();
    return row ?? null;
  }

  async lockById(id: string): Promise<Branch | null> {
    const row: Branch | undefined = await this.table.where({ id, is_deleted: false }).forUpdate().first();
    return row ?? null;
  }
}

export class KnexProductRepository extends BaseRepository implements ProductRepository {
  async findById(id: string, companyId: string): Promise<Product | null> {
    const row: ProductRow | undefined = await this.table
      .where({ id, company_id: companyId, is_deleted: false })
      .first();
    return row ? toProduct(row) : null;
  }
}
