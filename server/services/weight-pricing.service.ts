// =============================================================
// File: server/services/weight-pricing.service.ts
// Module: Pricing
// Description: Delivery charge quotes by weight, tier maintenance
//              with overlap validation, and tier table analysis
//              (gaps, price progression, coverage).
// =============================================================

import type { WeightPricingTier } from '../../shared/types';
import { ENTITY_STATUS } from '../../shared/constants';
import type { OperationContext } from '../lib/context';
import { NotFoundError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { priceWeight, validateTierRange, WeightPrice } from '../domain/weight-pricing';
import type { Repositories, WeightPricingTierPatch } from '../repositories/types';
import { BaseService } from './base.service';

const log = moduleLogger('weight-pricing');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface TierInput {
  tier_name: string;
  min_weight: number;
  max_weight?: number | null;
  base_price: number;
  price_per_kg?: number;
  status?: WeightPricingTier['status'];
  sort_order?: number;
}

export type TierUpdateInput = Partial<TierInput>;

export interface TierSuggestion {
  type: 'gap' | 'pricing_inconsistency';
  message: string;
  recommendation: string;
}

export interface TierAnalysis {
  total_tiers: number;
  active_tiers: number;
  suggestions: TierSuggestion[];
  coverage: {
    min_covered_weight: number;
    max_covered_weight: number | null;
    total_coverage: string;
  };
}

export const SAMPLE_WEIGHTS: readonly number[] = [0.5, 1, 2, 3, 5, 10, 15, 20, 25, 50];

/** Prices weights against the company's active tiers, inside an open transaction. */
export async function weightPricer(repos: Repositories, companyId: string): Promise<(weight: number) => WeightPrice> {
  const tiers = await repos.tiers.listByCompany(companyId, { activeOnly: true });
  return (weight) => priceWeight(tiers, weight);
}

export class WeightPricingService extends BaseService {
  async priceForWeight(companyId: string, weight: number): Promise<WeightPrice> {
    return this.read(async (repos) => (await weightPricer(repos, companyId))(weight));
  }

  async pricingBreakdown(companyId: string, weights: readonly number[]): Promise<WeightPrice[]> {
    return this.read(async (repos) => {
      const price = await weightPricer(repos, companyId);
      return weights.map((w) => price(w));
    });
  }

  async samplePricingTable(companyId: string): Promise<WeightPrice[]> {
    return this.pricingBreakdown(companyId, SAMPLE_WEIGHTS);
  }

  async listTiers(companyId: string): Promise<WeightPricingTier[]> {
    return this.read((repos) => repos.tiers.listByCompany(companyId));
  }

  // ──────── CREATE ────────

  async createTier(ctx: OperationContext, input: TierInput): Promise<WeightPricingTier> {
    return this.mutate('createTier', async (repos) => {
      const candidate = {
        min_weight: input.min_weight,
        max_weight: input.max_weight ?? null,
        base_price: input.base_price,
        price_per_kg: input.price_per_kg ?? 0,
      };
      const status = input.status ?? ENTITY_STATUS.ACTIVE;
      const others = status === ENTITY_STATUS.ACTIVE
        ? await repos.tiers.listByCompany(ctx.companyId, { activeOnly: true })
        : [];
      validateTierRange(candidate, others);

      const tier = await repos.tiers.create({
        company_id: ctx.companyId,
        tier_name: input.tier_name,
        ...candidate,
        status,
        sort_order: input.sort_order ?? 0,
      });

      log.info({ tierId: tier.id, companyId: ctx.companyId, actorId: ctx.actorId }, 'Weight pricing tier created');
      return tier;
    });
  }

  // ──────── UPDATE ────────

  async updateTier(ctx: OperationContext, id: string, input: TierUpdateInput): Promise<WeightPricingTier> {
    return this.mutate('updateTier', async (repos) => {
      const existing = await repos.tiers.findById(id, ctx.companyId);
      if (!existing) throw new NotFoundError('Weight pricing tier not found');

      const merged = {
        min_weight: input.min_weight ?? existing.min_weight,
        max_weight: input.max_weight === undefined ? existing.max_weight : input.max_weight,
        base_price: input.base_price ?? existing.base_price,
        price_per_kg: input.price_per_kg ?? existing.price_per_kg,
      };
      const status = input.status ?? existing.status;
      const others = status === ENTITY_STATUS.ACTIVE
        ? (await repos.tiers.listByCompany(ctx.companyId, { activeOnly: true })).filter((t) => t.id !== id)
        : [];
      validateTierRange(merged, others);

      const patch: WeightPricingTierPatch = { ...merged, status };
      if (input.tier_name !== undefined) patch.tier_name = input.tier_name;
      if (input.sort_order !== undefined) patch.sort_order = input.sort_order;

      return repos.tiers.update(id, patch);
    });
  }

  // ──────── DELETE ────────

  async deleteTier(ctx: OperationContext, id: string): Promise<void> {
    await this.mutate('deleteTier', async (repos) => {
      const existing = await repos.tiers.findById(id, ctx.companyId);
      if (!existing) throw new NotFoundError('Weight pricing tier not found');
      await repos.tiers.delete(id);
      log.info({ tierId: id, companyId: ctx.companyId, actorId: ctx.actorId }, 'Weight pricing tier deleted');
    });
  }

  // ──────── ANALYSIS ────────

  async analyzeTiers(companyId: string): Promise<TierAnalysis> {
    const tiers = await this.listTiers(companyId);
    return analyzeTierTable(tiers);
  }
}

export function analyzeTierTable(tiers: readonly WeightPricingTier[]): TierAnalysis {
  const sorted = [...tiers].sort((a, b) => a.min_weight - b.min_weight || a.sort_order - b.sort_order);
  const suggestions: TierSuggestion[] = [];

  let previousMax = 0;
  for (const tier of sorted) {
    if (tier.min_weight > previousMax) {
      suggestions.push({
        type: 'gap',
        message: `Gap in weight range from ${previousMax}kg to ${tier.min_weight}kg`,
        recommendation: 'Consider adding a tier to cover this weight range',
      });
    }
    previousMax = tier.max_weight ?? Number.POSITIVE_INFINITY;
  }

  for (let i = 0; i < sorted.length - 1; i++) {
    const tier = sorted[i];
    const next = sorted[i + 1];
    if (tier.base_price > next.base_price) {
      suggestions.push({
        type: 'pricing_inconsistency',
        message: `Tier '${tier.tier_name}' has higher base price than '${next.tier_name}'`,
        recommendation: 'Consider adjusting pricing to maintain logical progression',
      });
    }
  }

  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  const minCovered = first ? first.min_weight : 0;
  const maxCovered = last ? last.max_weight : 0;

  return {
    total_tiers: tiers.length,
    active_tiers: tiers.filter((t) => t.status === ENTITY_STATUS.ACTIVE).length,
    suggestions,
    coverage: {
      min_covered_weight: minCovered,
      max_covered_weight: maxCovered,
      total_coverage: `${minCovered}kg - ${maxCovered === null ? 'unlimited' : `${maxCovered}kg`}`,
    },
  };
}
