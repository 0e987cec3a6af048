// =============================================================
// File: server/domain/line-item.ts
// Module: Invoicing
// Description: Per-line money, weight and tax math, weight unit
//              normalization, creation-time product defaults and
//              line validation.
// =============================================================

import type { Product, SpecificationMap, SpecificationValue } from '../../shared/types';
import { WEIGHT_UNITS } from '../../shared/constants';
import { ValidationError } from '../lib/errors';
import { round2, round3 } from '../lib/numbers';

export interface LineInput {
  quantity: number;
  unit_price: number;
  unit_weight: number;
  product_tax_rate: number;
}

export interface LineAmounts {
  line_total: number;
  line_weight: number;
  tax_amount: number;
  total_with_tax: number;
}

export type LineConstraint = 'quantity' | 'minimum_quantity' | 'maximum_quantity' | 'unit_price' | 'unit_weight';

export type ProductLimits = Pick<Product, 'minimum_quantity' | 'maximum_quantity'>;

export type ProductDefaults = Pick<
  Product,
  'name' | 'base_price' | 'weight_per_unit' | 'weight_unit' | 'tax_rate' | 'minimum_quantity' | 'maximum_quantity'
>;

export interface LineDraft {
  item_description?: string | null;
  quantity: number;
  unit_price?: number | null;
  unit_weight?: number | null;
  specifications?: SpecificationMap;
}

export interface ResolvedLine {
  item_description: string;
  quantity: number;
  unit_price: number;
  unit_weight: number;
  specifications: SpecificationMap;
}

const KG_FACTORS: Record<string, number> = {
  [WEIGHT_UNITS.G]: 0.001,
  [WEIGHT_UNITS.GRAMS]: 0.001,
  [WEIGHT_UNITS.LB]: 0.453592,
  [WEIGHT_UNITS.OZ]: 0.0283495,
};

/** Converts `value` in `unit` to kilograms. Unknown units (including kg) pass through. */
export function normalizeWeight(value: number, unit: string | null | undefined): number {
  const factor = KG_FACTORS[(unit ?? '').trim().toLowerCase()];
  return factor === undefined ? value : value * factor;
}

function fail(constraint: LineConstraint, message: string): never {
  throw new ValidationError(message, { constraint });
}

export function validateLine(
  line: Pick<LineInput, 'quantity' | 'unit_price' | 'unit_weight'>,
  limits?: ProductLimits | null
): void {
  if (!Number.isFinite(line.quantity) || line.quantity <= 0) {
    fail('quantity', 'Quantity must be greater than zero');
  }
  if (limits?.minimum_quantity != null && line.quantity < limits.minimum_quantity) {
    fail('minimum_quantity', `Quantity must be at least ${limits.minimum_quantity}`);
  }
  if (limits?.maximum_quantity != null && line.quantity > limits.maximum_quantity) {
    fail('maximum_quantity', `Quantity cannot exceed ${limits.maximum_quantity}`);
  }
  if (!Number.isFinite(line.unit_price) || line.unit_price < 0) {
    fail('unit_price', 'Unit price cannot be negative');
  }
  if (!Number.isFinite(line.unit_weight) || line.unit_weight < 0) {
    fail('unit_weight', 'Unit weight cannot be negative');
  }
}

export function computeLine(input: LineInput): LineAmounts {
  validateLine(input);
  const lineTotal = round2(input.quantity * input.unit_price);
  const taxAmount = input.product_tax_rate > 0 ? round2((lineTotal * input.product_tax_rate) / 100) : 0;
  return {
    line_total: lineTotal,
    line_weight: round3(input.quantity * input.unit_weight),
    tax_amount: taxAmount,
    total_with_tax: round2(lineTotal + taxAmount),
  };
}

/**
 * Fills creation-time defaults from the product. Only called when a line is
 * first added; updates keep whatever the caller sends.
 */
export function applyProductDefaults(draft: LineDraft, product: ProductDefaults): ResolvedLine {
  const description = draft.item_description?.trim() ? draft.item_description : product.name;
  const unitPrice = draft.unit_price == null || draft.unit_price === 0 ? product.base_price : draft.unit_price;
  const unitWeight =
    draft.unit_weight == null || draft.unit_weight === 0
      ? round3(normalizeWeight(product.weight_per_unit, product.weight_unit))
      : draft.unit_weight;

  return {
    item_description: description,
    quantity: draft.quantity,
    unit_price: unitPrice,
    unit_weight: unitWeight,
    specifications: draft.specifications ?? {},
  };
}

function formatSpecValue(value: SpecificationValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** `{ paper: 'matte', sides: 2 }` → `"Paper: matte, Sides: 2"` */
export function specificationsSummary(specs: SpecificationMap | null | undefined): string {
  if (!specs) return '';
  return Object.entries(specs)
    .map(([key, value]) => `${key.charAt(0).toUpperCase()}${key.slice(1)}: ${formatSpecValue(value)}`)
    .join(', ');
}
