// =============================================================
// File: server/domain/weight-pricing.ts
// Module: Pricing
// Description: Resolves a shipment weight to a delivery charge from a
//              company's tier table, falling back to the default ladder.
//              Also holds tier range validation used on create/update.
// =============================================================

import type { WeightPricingTier } from '../../shared/types';
import { ValidationError } from '../lib/errors';
import { round2, round3 } from '../lib/numbers';

export type PricingTier = Pick<
  WeightPricingTier,
  'tier_name' | 'min_weight' | 'max_weight' | 'base_price' | 'price_per_kg' | 'sort_order'
>;

export interface WeightPrice {
  tier_name: string;
  weight: number;
  base_price: number;
  additional_price: number;
  total_price: number;
  is_default: boolean;
}

interface LadderStep {
  tier_name: string;
  max_weight: number | null;
  base_price: number;
  floor_weight: number;
  price_per_kg: number;
}

export const DEFAULT_WEIGHT_LADDER: readonly LadderStep[] = [
  { tier_name: 'Light', max_weight: 1, base_price: 200, floor_weight: 0, price_per_kg: 0 },
  { tier_name: 'Medium', max_weight: 3, base_price: 300, floor_weight: 1, price_per_kg: 0 },
  { tier_name: 'Heavy', max_weight: 5, base_price: 400, floor_weight: 3, price_per_kg: 0 },
  { tier_name: 'Extra Heavy', max_weight: 10, base_price: 500, floor_weight: 5, price_per_kg: 50 },
  { tier_name: 'Bulk', max_weight: null, base_price: 750, floor_weight: 10, price_per_kg: 75 },
];

export function assertValidWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new ValidationError('Weight must be a non-negative number', { constraint: 'weight', weight });
  }
}

function upperBound(tier: Pick<PricingTier, 'max_weight'>): number {
  return tier.max_weight === null ? Number.POSITIVE_INFINITY : tier.max_weight;
}

export function tierMatches(tier: PricingTier, weight: number): boolean {
  return tier.min_weight <= weight && weight <= upperBound(tier);
}

/**
 * Highest `min_weight` wins among matching tiers. Equal lower bounds fall back
 * to the narrower range, then to `sort_order`.
 */
export function findMatchingTier<T extends PricingTier>(tiers: readonly T[], weight: number): T | null {
  let best: T | null = null;
  for (const tier of tiers) {
    if (!tierMatches(tier, weight)) continue;
    if (
      best === null ||
      tier.min_weight > best.min_weight ||
      (tier.min_weight === best.min_weight &&
        (upperBound(tier) < upperBound(best) ||
          (upperBound(tier) === upperBound(best) && tier.sort_order < best.sort_order)))
    ) {
      best = tier;
    }
  }
  return best;
}

export function priceFromTier(tier: PricingTier, weight: number): WeightPrice {
  const additional = Math.max(0, (weight - tier.min_weight) * tier.price_per_kg);
  return {
    tier_name: tier.tier_name,
    weight: round3(weight),
    base_price: round2(tier.base_price),
    additional_price: round2(additional),
    total_price: round2(tier.base_price + additional),
    is_default: false,
  };
}

export function defaultLadderPrice(weight: number): WeightPrice {
  const step =
    DEFAULT_WEIGHT_LADDER.find((s) => s.max_weight === null || weight <= s.max_weight) ??
    DEFAULT_WEIGHT_LADDER[DEFAULT_WEIGHT_LADDER.length - 1];
  const additional = step.price_per_kg > 0 ? Math.max(0, (weight - step.floor_weight) * step.price_per_kg) : 0;
  return {
    tier_name: step.tier_name,
    weight: round3(weight),
    base_price: step.base_price,
    additional_price: round2(additional),
    total_price: round2(step.base_price + additional),
    is_default: true,
  };
}

/** Prices `weight` against the given (already active-filtered) tiers. */
export function priceWeight(tiers: readonly PricingTier[], weight: number): WeightPrice {
  assertValidWeight(weight);
  const tier = findMatchingTier(tiers, weight);
  return tier ? priceFromTier(tier, weight) : defaultLadderPrice(weight);
}

// ──────── Tier validation ────────

export interface TierRange {
  min_weight: number;
  max_weight: number | null;
  base_price: number;
  price_per_kg: number;
}

export function rangesOverlap(a: Pick<TierRange, 'min_weight' | 'max_weight'>, b: Pick<TierRange, 'min_weight' | 'max_weight'>): boolean {
  return a.min_weight < upperBound(b) && upperBound(a) > b.min_weight;
}

export function validateTierRange<T extends TierRange & { id: string; tier_name: string }>(
  candidate: TierRange,
  others: readonly T[]
): void {
  if (!Number.isFinite(candidate.min_weight) || candidate.min_weight < 0) {
    throw new ValidationError('Minimum weight must be zero or greater', { constraint: 'min_weight' });
  }
  if (candidate.max_weight !== null && candidate.max_weight < candidate.min_weight) {
    throw new ValidationError('Maximum weight must be greater than or equal to minimum weight', {
      constraint: 'max_weight',
    });
  }
  if (candidate.base_price < 0 || candidate.price_per_kg < 0) {
    throw new ValidationError('Tier prices cannot be negative', { constraint: 'price' });
  }

  const clash = others.find((other) => rangesOverlap(candidate, other));
  if (clash) {
    throw new ValidationError(`Weight range overlaps with tier "${clash.tier_name}"`, {
      constraint: 'overlap',
      tier_id: clash.id,
    });
  }
}
