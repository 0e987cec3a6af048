// =============================================================
// File: server/domain/invoice-totals.ts
// Module: Invoicing
// Description: Pure invoice totals computation, editability rules
//              and payment status derivation. Persisting the result
//              is the caller's job.
// =============================================================

import type { Invoice, InvoiceLineItem, PaymentStatus } from '../../shared/types';
import { INVOICE_STATUSES, PAYMENT_STATUSES } from '../../shared/constants';
import { ValidationError } from '../lib/errors';
import { round2, round3 } from '../lib/numbers';

export interface InvoiceTotals {
  subtotal: number;
  total_weight: number;
  weight_charge: number;
  taxable_amount: number;
  tax_amount: number;
  discount_amount: number;
  total_amount: number;
}

export type TotalsLine = Pick<InvoiceLineItem, 'line_total' | 'line_weight'>;

export function computeInvoiceTotals(
  lines: readonly TotalsLine[],
  discountAmount: number,
  weightPrice: (totalWeight: number) => number,
  taxRate: number
): InvoiceTotals {
  if (!Number.isFinite(discountAmount) || discountAmount < 0) {
    throw new ValidationError('Discount amount cannot be negative', { constraint: 'discount_amount' });
  }

  const subtotal = round2(lines.reduce((sum, line) => sum + line.line_total, 0));
  const totalWeight = round3(lines.reduce((sum, line) => sum + line.line_weight, 0));
  const weightCharge = round2(weightPrice(totalWeight));
  const taxableAmount = round2(subtotal + weightCharge - discountAmount);

  if (taxableAmount < 0) {
    throw new ValidationError('Discount exceeds invoice amount', {
      constraint: 'discount_amount',
      discount_amount: discountAmount,
      max_discount: round2(subtotal + weightCharge),
    });
  }

  const taxAmount = round2(taxableAmount * taxRate);

  return {
    subtotal,
    total_weight: totalWeight,
    weight_charge: weightCharge,
    taxable_amount: taxableAmount,
    tax_amount: taxAmount,
    discount_amount: round2(discountAmount),
    total_amount: round2(subtotal + weightCharge + taxAmount - discountAmount),
  };
}

// ──────── Editability ────────

export function canBeModified(invoice: Pick<Invoice, 'status'>, paymentCount: number): boolean {
  return (
    (invoice.status === INVOICE_STATUSES.DRAFT || invoice.status === INVOICE_STATUSES.PENDING) && paymentCount === 0
  );
}

export function canBeDeleted(invoice: Pick<Invoice, 'status'>, paymentCount: number): boolean {
  return invoice.status === INVOICE_STATUSES.DRAFT && paymentCount === 0;
}

export function assertModifiable(invoice: Pick<Invoice, 'status' | 'invoice_number'>, paymentCount: number): void {
  if (!canBeModified(invoice, paymentCount)) {
    throw new ValidationError('Invoice cannot be modified', {
      invoice_number: invoice.invoice_number,
      status: invoice.status,
      payment_count: paymentCount,
    });
  }
}

// ──────── Payments ────────

export function derivePaymentStatus(totalAmount: number, totalPaid: number): PaymentStatus {
  if (totalPaid <= 0) return PAYMENT_STATUSES.PENDING;
  if (totalPaid >= totalAmount) return PAYMENT_STATUSES.PAID;
  return PAYMENT_STATUSES.PARTIALLY_PAID;
}

export function remainingAmount(totalAmount: number, totalPaid: number): number {
  return round2(Math.max(0, totalAmount - totalPaid));
}
