import { describe, it, expect } from 'vitest';
import {
  assertModifiable,
  canBeDeleted,
  canBeModified,
  computeInvoiceTotals,
  derivePaymentStatus,
  remainingAmount,
} from '../server/domain/invoice-totals';
import { priceWeight } from '../server/domain/weight-pricing';
import { ValidationError } from '../server/lib/errors';

const flat = (charge: number) => () => charge;

describe('computeInvoiceTotals', () => {
  it('taxes subtotal plus weight charge net of discount', () => {
    const totals = computeInvoiceTotals([{ line_total: 1000, line_weight: 4 }], 50, flat(300), 0.12);
    expect(totals).toEqual({
      subtotal: 1000,
      total_weight: 4,
      weight_charge: 300,
      taxable_amount: 1250,
      tax_amount: 150,
      discount_amount: 50,
      total_amount: 1400,
    });
  });

  it('sums line totals and weights before pricing the weight', () => {
    const weights: number[] = [];
    const totals = computeInvoiceTotals(
      [
        { line_total: 300, line_weight: 0.6 },
        { line_total: 3000, line_weight: 2.4 },
      ],
      0,
      (w) => {
        weights.push(w);
        return priceWeight([], w).total_price;
      },
      0.12
    );
    expect(weights).toEqual([3]);
    expect(totals.subtotal).toBe(3300);
    expect(totals.weight_charge).toBe(300);
    expect(totals.tax_amount).toBe(432);
    expect(totals.total_amount).toBe(4032);
  });

  it('still charges the lightest band on an empty invoice', () => {
    const totals = computeInvoiceTotals([], 0, (w) => priceWeight([], w).total_price, 0.12);
    expect(totals).toMatchObject({ subtotal: 0, total_weight: 0, weight_charge: 200, tax_amount: 24, total_amount: 224 });
  });

  it('rejects a negative discount', () => {
    expect(() => computeInvoiceTotals([], -1, flat(0), 0.12)).toThrow('Discount amount cannot be negative');
  });

  it('rejects a discount larger than subtotal plus weight charge', () => {
    try {
      computeInvoiceTotals([{ line_total: 100, line_weight: 1 }], 400, flat(200), 0.12);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details).toEqual({ constraint: 'discount_amount', discount_amount: 400, max_discount: 300 });
      }
    }
  });

  it('allows a discount equal to the pre-tax amount', () => {
    const totals = computeInvoiceTotals([{ line_total: 100, line_weight: 1 }], 300, flat(200), 0.12);
    expect(totals.taxable_amount).toBe(0);
    expect(totals.tax_amount).toBe(0);
    expect(totals.total_amount).toBe(0);
  });

  it('yields identical totals when run twice over the same lines', () => {
    const lines = [
      { line_total: 19.99, line_weight: 0.333 },
      { line_total: 5.01, line_weight: 0.667 },
    ];
    const first = computeInvoiceTotals(lines, 2.5, flat(200), 0.12);
    const second = computeInvoiceTotals(lines, 2.5, flat(200), 0.12);
    expect(second).toEqual(first);
  });
});

describe('invoice editability', () => {
  it.each([
    ['draft', 0, true, true],
    ['pending', 0, true, false],
    ['processing', 0, false, false],
    ['completed', 0, false, false],
    ['cancelled', 0, false, false],
    ['draft', 1, false, false],
  ] as const)('%s with %i payments: modifiable=%s deletable=%s', (status, payments, modifiable, deletable) => {
    expect(canBeModified({ status }, payments)).toBe(modifiable);
    expect(canBeDeleted({ status }, payments)).toBe(deletable);
  });

  it('raises with the invoice number when locked', () => {
    expect(() => assertModifiable({ status: 'completed', invoice_number: 'MAIN-000007' }, 0)).toThrow(
      'Invoice cannot be modified'
    );
  });
});

describe('payment status', () => {
  it.each([
    [100, 0, 'pending'],
    [100, 40, 'partially_paid'],
    [100, 100, 'paid'],
    [100, 120, 'paid'],
  ] as const)('total %s paid %s → %s', (total, paid, expected) => {
    expect(derivePaymentStatus(total, paid)).toBe(expected);
  });

  it('never reports a negative remaining amount', () => {
    expect(remainingAmount(100, 40)).toBe(60);
    expect(remainingAmount(100, 120)).toBe(0);
  });
});
