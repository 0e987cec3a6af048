import { describe, it, expect } from 'vitest';
import {
  applyProductDefaults,
  computeLine,
  normalizeWeight,
  specificationsSummary,
  validateLine,
} from '../server/domain/line-item';
import { ValidationError } from '../server/lib/errors';
import { createTestEnvironment } from './helpers/factory';
import { expectAppError } from './helpers/assertions';

function constraintOf(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.details?.constraint;
    throw err;
  }
  return undefined;
}

describe('normalizeWeight', () => {
  it('converts grams, pounds and ounces to kilograms', () => {
    expect(normalizeWeight(200, 'g')).toBeCloseTo(0.2, 10);
    expect(normalizeWeight(1500, 'grams')).toBeCloseTo(1.5, 10);
    expect(normalizeWeight(2, 'lb')).toBeCloseTo(0.907184, 10);
    expect(normalizeWeight(10, 'oz')).toBeCloseTo(0.283495, 10);
  });

  it('ignores case and surrounding spaces in the unit', () => {
    expect(normalizeWeight(2, ' LB ')).toBeCloseTo(0.907184, 10);
  });

  it('passes kilograms and unknown units through', () => {
    expect(normalizeWeight(1.2, 'kg')).toBe(1.2);
    expect(normalizeWeight(3, 'stone')).toBe(3);
    expect(normalizeWeight(3, null)).toBe(3);
  });
});

describe('computeLine', () => {
  it('computes a 200 g line of three items', () => {
    const unitWeight = applyProductDefaults(
      { quantity: 3, unit_price: 100 },
      {
        name: 'A5 Flyers',
        base_price: 100,
        weight_per_unit: 200,
        weight_unit: 'g',
        tax_rate: 0,
        minimum_quantity: null,
        maximum_quantity: null,
      }
    ).unit_weight;
    expect(unitWeight).toBe(0.2);

    const line = computeLine({ quantity: 3, unit_price: 100, unit_weight: unitWeight, product_tax_rate: 0 });
    expect(line).toEqual({ line_total: 300, line_weight: 0.6, tax_amount: 0, total_with_tax: 300 });
  });

  it('applies the product tax rate as a percentage', () => {
    const line = computeLine({ quantity: 2, unit_price: 1500, unit_weight: 1.2, product_tax_rate: 5 });
    expect(line).toEqual({ line_total: 3000, line_weight: 2.4, tax_amount: 150, total_with_tax: 3150 });
  });

  it('rounds money to cents and weight to grams', () => {
    const line = computeLine({ quantity: 3, unit_price: 0.333, unit_weight: 0.0014, product_tax_rate: 0 });
    expect(line.line_total).toBe(1);
    expect(line.line_weight).toBe(0.004);
  });
});

describe('validateLine', () => {
  it('names the violated constraint', () => {
    expect(constraintOf(() => validateLine({ quantity: 0, unit_price: 1, unit_weight: 1 }))).toBe('quantity');
    expect(constraintOf(() => validateLine({ quantity: 1, unit_price: -1, unit_weight: 1 }))).toBe('unit_price');
    expect(constraintOf(() => validateLine({ quantity: 1, unit_price: 1, unit_weight: -0.1 }))).toBe('unit_weight');
  });

  it('enforces product quantity limits', () => {
    const limits = { minimum_quantity: 100, maximum_quantity: 1000 };
    expect(() => validateLine({ quantity: 50, unit_price: 1, unit_weight: 0 }, limits)).toThrow(
      'Quantity must be at least 100'
    );
    expect(() => validateLine({ quantity: 1001, unit_price: 1, unit_weight: 0 }, limits)).toThrow(
      'Quantity cannot exceed 1000'
    );
    expect(() => validateLine({ quantity: 100, unit_price: 1, unit_weight: 0 }, limits)).not.toThrow();
  });

  it('accepts a zero price and zero weight', () => {
    expect(() => validateLine({ quantity: 1, unit_price: 0, unit_weight: 0 })).not.toThrow();
  });
});

describe('applyProductDefaults', () => {
  const product = {
    name: 'Vinyl Banner',
    base_price: 1500,
    weight_per_unit: 1.2,
    weight_unit: 'kg',
    tax_rate: 5,
    minimum_quantity: null,
    maximum_quantity: null,
  };

  it('fills blank description, zero price and missing weight from the product', () => {
    expect(applyProductDefaults({ item_description: '   ', quantity: 1, unit_price: 0 }, product)).toEqual({
      item_description: 'Vinyl Banner',
      quantity: 1,
      unit_price: 1500,
      unit_weight: 1.2,
      specifications: {},
    });
  });

  it('keeps explicit values', () => {
    const line = applyProductDefaults(
      { item_description: 'Event banner', quantity: 2, unit_price: 1200, unit_weight: 2, specifications: { size: '3x1m' } },
      product
    );
    expect(line).toEqual({
      item_description: 'Event banner',
      quantity: 2,
      unit_price: 1200,
      unit_weight: 2,
      specifications: { size: '3x1m' },
    });
  });
});

describe('specificationsSummary', () => {
  it('capitalizes keys and flattens nested maps', () => {
    expect(specificationsSummary({ paper: 'matte', sides: 2, finish: { gloss: true }, notes: null })).toBe(
      'Paper: matte, Sides: 2, Finish: {"gloss":true}, Notes: '
    );
  });

  it('returns an empty string without specifications', () => {
    expect(specificationsSummary(undefined)).toBe('');
  });
});

describe('InvoiceService.previewLine', () => {
  it('resolves product defaults without storing anything', async () => {
    const env = createTestEnvironment();
    const preview = await env.services.invoices.previewLine(env.company.id, {
      product_id: env.products.flyers.id,
      quantity: 3,
      specifications: { paper: 'gloss' },
    });

    expect(preview).toEqual({
      item_description: 'A5 Flyers',
      quantity: 3,
      unit_price: 100,
      unit_weight: 0.2,
      line_total: 300,
      line_weight: 0.6,
      tax_amount: 0,
      total_with_tax: 300,
      specifications_summary: 'Paper: gloss',
    });
    expect(env.store.tables.lineItems).toHaveLength(0);
  });

  it('computes a bare line without a product', async () => {
    const env = createTestEnvironment();
    const preview = await env.services.invoices.previewLine(env.company.id, {
      quantity: 4,
      unit_price: 25,
      unit_weight: 0.25,
      product_tax_rate: 10,
    });
    expect(preview.line_total).toBe(100);
    expect(preview.tax_amount).toBe(10);
    expect(preview.line_weight).toBe(1);
    expect(preview.item_description).toBeNull();
  });

  it('enforces the product minimum quantity', async () => {
    const env = createTestEnvironment();
    const error = await expectAppError(
      env.services.invoices.previewLine(env.company.id, { product_id: env.products.businessCards.id, quantity: 50 }),
      'VALIDATION_ERROR'
    );
    expect(error.details).toEqual({ constraint: 'minimum_quantity' });
  });
});
