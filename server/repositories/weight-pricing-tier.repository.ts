import type { WeightPricingTier } from '../../shared/types';
import { ENTITY_STATUS } from '../../shared/constants';
import { parseNum, parseNullableNum } from '../lib/numbers';
import { NotFoundError } from '../lib/errors';
import { BaseRepository, RowOf } from './base.repository';
import type { NewWeightPricingTier, WeightPricingTierPatch, WeightPricingTierRepository } from './types';

type TierRow = RowOf<WeightPricingTier, 'min_weight' | 'max_weight' | 'base_price' | 'price_per_kg'>;

function toTier(row: TierRow): WeightPricingTier {
  return {
    ...row,
    min_weight: parseNum(row.min_weight),
    max_weight: parseNullableNum(row.max_weight),
    base_price: parseNum(row.base_price),
    price_per_kg: parseNum(row.price_per_kg),
  };
}

export class KnexWeightPricingTierRepository extends BaseRepository implements WeightPricingTierRepository {
  async listByCompany(companyId: string, options: { activeOnly?: boolean } = {}): Promise<WeightPricingTier[]> {
    let query = this.table.where({ company_id: companyId });
    if (options.activeOnly) {
      query = query.where('status', ENTITY_STATUS.ACTIVE);
    }
    const rows: TierRow[] = await query.orderBy('min_weight', 'asc').orderBy('sort_order', 'asc');
    return rows.map(toTier);
  }

  async findById(id: string, companyId: string): Promise<WeightPricingTier | null> {
    const row: TierRow | undefined = await this.table.where({ id, company_id: companyId }).first();
    return row ? toTier(row) : null;
  }

  async create(data: NewWeightPricingTier): Promise<WeightPricingTier> {
    const [row]: TierRow[] = await this.table.insert(data).returning('*');
    return toTier(row);
  }

  async update(id: string, patch: WeightPricingTierPatch): Promise<WeightPricingTier> {
    const [row]: TierRow[] = await this.table
      .where({ id })
      .update({ ...patch, updated_at: this.now() })
      .returning('*');
    if (!row) throw new NotFoundError('Weight pricing tier not found');
    return toTier(row);
  }

  async delete(id: string): Promise<void> {
    await this.table.where({ id }).delete();
  }
}
