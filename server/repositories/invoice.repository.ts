// =============================================================
// File: server/repositories/invoice.repository.ts
// Module: Invoicing
// Description: Invoices (versioned), their line items and payments.
// =============================================================

import type { Invoice, InvoiceLineItem, Payment } from '../../shared/types';
import { PAYMENT_RECORD_STATUSES } from '../../shared/constants';
import { parseNum } from '../lib/numbers';
import { NotFoundError } from '../lib/errors';
import { BaseRepository, RowOf, jsonMap } from './base.repository';
import type {
  InvoiceLineItemPatch,
  InvoiceLineItemRepository,
  InvoicePatch,
  InvoiceRepository,
  NewInvoice,
  NewInvoiceLineItem,
  NewPayment,
  PaymentRepository,
} from './types';

type InvoiceRow = RowOf<
  Invoice,
  'subtotal' | 'weight_charge' | 'tax_amount' | 'discount_amount' | 'total_amount' | 'total_weight'
>;
type LineItemRow = RowOf<
  InvoiceLineItem,
  'quantity' | 'unit_price' | 'unit_weight' | 'line_total' | 'line_weight' | 'tax_amount'
>;
type PaymentRow = RowOf<Payment, 'amount'>;

function toInvoice(row: InvoiceRow): Invoice {
  return {
    ...row,
    subtotal: parseNum(row.subtotal),
    weight_charge: parseNum(row.weight_charge),
    tax_amount: parseNum(row.tax_amount),
    discount_amount: parseNum(row.discount_amount),
    total_amount: parseNum(row.total_amount),
    total_weight: parseNum(row.total_weight),
  };
}

function toLineItem(row: LineItemRow): InvoiceLineItem {
  return {
    ...row,
    quantity: parseNum(row.quantity),
    unit_price: parseNum(row.unit_price),
    unit_weight: parseNum(row.unit_weight),
    line_total: parseNum(row.line_total),
    line_weight: parseNum(row.line_weight),
    tax_amount: parseNum(row.tax_amount),
    specifications: jsonMap(row.specifications),
  };
}

function toPayment(row: PaymentRow): Payment {
  return { ...row, amount: parseNum(row.amount) };
}

export class KnexInvoiceRepository extends BaseRepository implements InvoiceRepository {
  async findById(id: string, companyId?: string): Promise<Invoice | null> {
    const query = this.table.where({ id, is_deleted: false });
    if (companyId) query.where('company_id', companyId);
    const row: InvoiceRow | undefined = await query.first();
    return row ? toInvoice(row) : null;
  }

  async latestNumberForBranch(branchId: string): Promise<string | null> {
    const row: Pick<Invoice, 'invoice_number'> | undefined = await this.latestNumberQuery(branchId).first();
    return row ? row.invoice_number : null;
  }

  /**
   * Numbers share the branch prefix and a fixed-width sequence, so the text
   * order is the sequence order. `created_at` is the transaction start time and
   * can run behind the order in which the branch lock was granted.
   */
  latestNumberQuery(branchId: string) {
    return this.table.where({ branch_id: branchId }).orderBy('invoice_number', 'desc').select('invoice_number');
  }

  async create(data: NewInvoice): Promise<Invoice> {
    const [row]: InvoiceRow[] = await this.table.insert({ ...data, version: 1 }).returning('*');
    return toInvoice(row);
  }

  async update(id: string, expectedVersion: number, patch: InvoicePatch): Promise<Invoice> {
    return toInvoice(await this.updateVersioned<InvoiceRow>('Invoice', id, expectedVersion, patch));
  }
}

export class KnexInvoiceLineItemRepository extends BaseRepository implements InvoiceLineItemRepository {
  async listByInvoice(invoiceId: string): Promise<InvoiceLineItem[]> {
    // Lines inserted in one transaction share created_at
    const rows: LineItemRow[] = await this.table
      .where({ invoice_id: invoiceId })
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc');
    return rows.map(toLineItem);
  }

  async findById(id: string, invoiceId: string): Promise<InvoiceLineItem | null> {
    const row: LineItemRow | undefined = await this.table.where({ id, invoice_id: invoiceId }).first();
    return row ? toLineItem(row) : null;
  }

  async create(data: NewInvoiceLineItem): Promise<InvoiceLineItem> {
    const [row]: LineItemRow[] = await this.table.insert(data).returning('*');
    return toLineItem(row);
  }

  async update(id: string, patch: InvoiceLineItemPatch): Promise<InvoiceLineItem> {
    const [row]: LineItemRow[] = await this.table
      .where({ id })
      .update({ ...patch, updated_at: this.now() })
      .returning('*');
    if (!row) throw new NotFoundError('Line item not found');
    return toLineItem(row);
  }

  async delete(id: string): Promise<void> {
    await this.table.where({ id }).delete();
  }
}

export class KnexPaymentRepository extends BaseRepository implements PaymentRepository {
  async listByInvoice(invoiceId: string): Promise<Payment[]> {
    const rows: PaymentRow[] = await this.table.where({ invoice_id: invoiceId }).orderBy('payment_date', 'asc');
    return rows.map(toPayment);
  }

  async countByInvoice(invoiceId: string): Promise<number> {
    const result = await this.table
      .where({ invoice_id: invoiceId })
      .whereNot('status', PAYMENT_RECORD_STATUSES.CANCELLED)
      .count('id as total')
      .first();
    return parseInt(String(result?.total ?? '0'), 10);
  }

  async create(data: NewPayment): Promise<Payment> {
    const [row]: PaymentRow[] = await this.table.insert(data).returning('*');
    return toPayment(row);
  }
}
