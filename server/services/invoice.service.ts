// =============================================================
// File: server/services/invoice.service.ts
// Module: Invoicing
// Description: Invoice lifecycle with per-branch sequential
//              numbering, line items priced from products, weight
//              based delivery charges and company tax. Totals are
//              recomputed and written once per mutation, inside the
//              same transaction as the mutation itself.
// =============================================================

import type {
  Invoice,
  InvoiceLineItem,
  InvoiceStatus,
  Payment,
  SpecificationMap,
} from '../../shared/types';
import { INVOICE_STATUSES, PAYMENT_RECORD_STATUSES, PAYMENT_STATUSES } from '../../shared/constants';
import { addDays, OperationContext, toDateString } from '../lib/context';
import { NotFoundError, ValidationError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { round2 } from '../lib/numbers';
import { nextInvoiceNumberAfter } from '../domain/document-number';
import {
  assertModifiable,
  canBeDeleted,
  canBeModified,
  computeInvoiceTotals,
  InvoiceTotals,
  remainingAmount,
} from '../domain/invoice-totals';
import {
  applyProductDefaults,
  computeLine,
  LineAmounts,
  LineDraft,
  specificationsSummary,
  validateLine,
} from '../domain/line-item';
import type { InvoicePatch, Repositories } from '../repositories/types';
import { BaseService } from './base.service';
import { weightPricer } from './weight-pricing.service';

const log = moduleLogger('invoice');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface LineItemInput extends LineDraft {
  product_id: string;
}

export interface LineItemUpdateInput {
  item_description?: string;
  quantity?: number;
  unit_price?: number;
  unit_weight?: number;
  specifications?: SpecificationMap;
}

export interface CreateInvoiceInput {
  branch_id?: string;
  customer_id: string;
  invoice_date?: string;
  due_date?: string;
  discount_amount?: number;
  status?: Extract<InvoiceStatus, 'draft' | 'pending'>;
  notes?: string | null;
  terms_conditions?: string | null;
  items?: LineItemInput[];
}

export interface UpdateInvoiceInput {
  customer_id?: string;
  due_date?: string;
  discount_amount?: number;
  status?: InvoiceStatus;
  notes?: string | null;
  terms_conditions?: string | null;
}

export interface LinePreviewInput {
  product_id?: string;
  quantity: number;
  unit_price?: number;
  unit_weight?: number;
  product_tax_rate?: number;
  specifications?: SpecificationMap;
}

export interface LinePreview extends LineAmounts {
  item_description: string | null;
  quantity: number;
  unit_price: number;
  unit_weight: number;
  specifications_summary: string;
}

export interface InvoiceDetail {
  invoice: Invoice;
  items: InvoiceLineItem[];
  payments: Payment[];
  total_paid: number;
  remaining_amount: number;
  can_be_modified: boolean;
  can_be_deleted: boolean;
}

export function totalPaid(payments: readonly Payment[]): number {
  return round2(
    payments.filter((p) => p.status === PAYMENT_RECORD_STATUSES.COMPLETED).reduce((sum, p) => sum + p.amount, 0)
  );
}

/** Recomputes totals from the stored lines and writes them with a version check. */
export async function recalculateWithin(
  repos: Repositories,
  invoice: Invoice,
  defaultTaxRate: number,
  extra: InvoicePatch = {}
): Promise<{ invoice: Invoice; totals: InvoiceTotals }> {
  const company = await repos.companies.findById(invoice.company_id);
  if (!company) throw new NotFoundError('Company not found');

  const lines = await repos.lineItems.listByInvoice(invoice.id);
  const price = await weightPricer(repos, invoice.company_id);
  const discount = extra.discount_amount ?? invoice.discount_amount;

  const totals = computeInvoiceTotals(
    lines,
    discount,
    (weight) => price(weight).total_price,
    company.tax_rate ?? defaultTaxRate
  );

  const updated = await repos.invoices.update(invoice.id, invoice.version, {
    ...extra,
    subtotal: totals.subtotal,
    total_weight: totals.total_weight,
    weight_charge: totals.weight_charge,
    tax_amount: totals.tax_amount,
    discount_amount: totals.discount_amount,
    total_amount: totals.total_amount,
  });

  return { invoice: updated, totals };
}

export class InvoiceService extends BaseService {
  // ──────── NUMBERING ────────

  /** Preview of the number the next invoice on this branch will get. */
  async nextInvoiceNumber(companyId: string, branchId: string): Promise<string> {
    return this.read(async (repos) => {
      const branch = await repos.branches.findById(branchId);
      if (!branch || branch.company_id !== companyId) throw new NotFoundError('Branch not found');
      return nextInvoiceNumberAfter(branch.code, await repos.invoices.latestNumberForBranch(branchId));
    });
  }

  // ──────── CREATE ────────

  async createInvoice(ctx: OperationContext, input: CreateInvoiceInput): Promise<InvoiceDetail> {
    const branchId = input.branch_id ?? ctx.branchId;
    if (!branchId) {
      throw new ValidationError('branch_id is required', { constraint: 'branch_id' });
    }

    return this.mutate('createInvoice', async (repos) => {
      // Held until commit: concurrent creations on this branch queue here
      const branch = await repos.branches.lockById(branchId);
      if (!branch || branch.company_id !== ctx.companyId) throw new NotFoundError('Branch not found');

      const invoiceNumber = nextInvoiceNumberAfter(branch.code, await repos.invoices.latestNumberForBranch(branch.id));
      const invoiceDate = input.invoice_date ?? toDateString(ctx.clock.now());

      const draft = await repos.invoices.create({
        company_id: ctx.companyId,
        branch_id: branch.id,
        customer_id: input.customer_id,
        created_by: ctx.actorId,
        invoice_number: invoiceNumber,
        invoice_date: invoiceDate,
        due_date: input.due_date ?? addDays(invoiceDate, this.settings.defaultDueDays),
        subtotal: 0,
        weight_charge: 0,
        tax_amount: 0,
        discount_amount: 0,
        total_amount: 0,
        total_weight: 0,
        status: input.status ?? INVOICE_STATUSES.DRAFT,
        payment_status: PAYMENT_STATUSES.PENDING,
        notes: input.notes ?? null,
        terms_conditions: input.terms_conditions ?? null,
        is_deleted: false,
      });

      for (const item of input.items ?? []) {
        await this.insertLine(repos, draft, item);
      }

      const { invoice } = await recalculateWithin(repos, draft, this.settings.defaultTaxRate, {
        discount_amount: input.discount_amount ?? 0,
      });

      log.info(
        { invoiceId: invoice.id, invoiceNumber, branchId: branch.id, actorId: ctx.actorId },
        'Invoice created'
      );
      return this.detail(repos, invoice);
    });
  }

  // ──────── READ ────────

  async getInvoice(companyId: string, id: string): Promise<InvoiceDetail> {
    return this.read(async (repos) => this.detail(repos, await this.load(repos, id, companyId)));
  }

  // ──────── UPDATE ────────

  async updateInvoice(ctx: OperationContext, id: string, input: UpdateInvoiceInput): Promise<InvoiceDetail> {
    return this.mutate('updateInvoice', async (repos) => {
      const invoice = await this.load(repos, id, ctx.companyId);
      assertModifiable(invoice, await repos.payments.countByInvoice(invoice.id));

      const patch: InvoicePatch = {};
      if (input.customer_id !== undefined) patch.customer_id = input.customer_id;
      if (input.due_date !== undefined) patch.due_date = input.due_date;
      if (input.status !== undefined) patch.status = input.status;
      if (input.notes !== undefined) patch.notes = input.notes;
      if (input.terms_conditions !== undefined) patch.terms_conditions = input.terms_conditions;

      if (input.discount_amount !== undefined && input.discount_amount !== invoice.discount_amount) {
        const { invoice: updated } = await recalculateWithin(repos, invoice, this.settings.defaultTaxRate, {
          ...patch,
          discount_amount: input.discount_amount,
        });
        return this.detail(repos, updated);
      }

      return this.detail(repos, await repos.invoices.update(invoice.id, invoice.version, patch));
    });
  }

  async recalculateInvoice(ctx: OperationContext, id: string): Promise<InvoiceTotals> {
    return this.mutate('recalculateInvoice', async (repos) => {
      const invoice = await this.load(repos, id, ctx.companyId);
      // Totals are frozen once money has been taken against them
      assertModifiable(invoice, await repos.payments.countByInvoice(invoice.id));
      const { totals } = await recalculateWithin(repos, invoice, this.settings.defaultTaxRate);
      return totals;
    });
  }

  // ──────── DELETE ────────

  async deleteInvoice(ctx: OperationContext, id: string): Promise<void> {
    await this.mutate('deleteInvoice', async (repos) => {
      const invoice = await this.load(repos, id, ctx.companyId);
      if (!canBeDeleted(invoice, await repos.payments.countByInvoice(invoice.id))) {
        throw new ValidationError('Invoice cannot be deleted', {
          invoice_number: invoice.invoice_number,
          status: invoice.status,
        });
      }
      await repos.invoices.update(invoice.id, invoice.version, { is_deleted: true });
      log.info({ invoiceId: invoice.id, actorId: ctx.actorId }, 'Invoice deleted');
    });
  }

  // ──────── LINE ITEMS ────────

  async addLineItem(ctx: OperationContext, invoiceId: string, input: LineItemInput): Promise<InvoiceDetail> {
    return this.mutate('addLineItem', async (repos) => {
      const invoice = await this.load(repos, invoiceId, ctx.companyId);
      assertModifiable(invoice, await repos.payments.countByInvoice(invoice.id));
      await this.insertLine(repos, invoice, input);
      const { invoice: updated } = await recalculateWithin(repos, invoice, this.settings.defaultTaxRate);
      return this.detail(repos, updated);
    });
  }

  async updateLineItem(
    ctx: OperationContext,
    invoiceId: string,
    itemId: string,
    input: LineItemUpdateInput
  ): Promise<InvoiceDetail> {
    return this.mutate('updateLineItem', async (repos) => {
      const invoice = await this.load(repos, invoiceId, ctx.companyId);
      assertModifiable(invoice, await repos.payments.countByInvoice(invoice.id));

      const item = await repos.lineItems.findById(itemId, invoice.id);
      if (!item) throw new NotFoundError('Line item not found');
      const product = await repos.products.findById(item.product_id, invoice.company_id);
      if (!product) throw new NotFoundError('Product not found');

      // No unit conversion or product defaults on update
      const next = {
        quantity: input.quantity ?? item.quantity,
        unit_price: input.unit_price ?? item.unit_price,
        unit_weight: input.unit_weight ?? item.unit_weight,
      };
      validateLine(next, product);
      const amounts = computeLine({ ...next, product_tax_rate: product.tax_rate });

      await repos.lineItems.update(item.id, {
        ...next,
        item_description: input.item_description ?? item.item_description,
        specifications: input.specifications ?? item.specifications,
        line_total: amounts.line_total,
        line_weight: amounts.line_weight,
        tax_amount: amounts.tax_amount,
      });

      const { invoice: updated } = await recalculateWithin(repos, invoice, this.settings.defaultTaxRate);
      return this.detail(repos, updated);
    });
  }

  async removeLineItem(ctx: OperationContext, invoiceId: string, itemId: string): Promise<InvoiceDetail> {
    return this.mutate('removeLineItem', async (repos) => {
      const invoice = await this.load(repos, invoiceId, ctx.companyId);
      assertModifiable(invoice, await repos.payments.countByInvoice(invoice.id));

      const item = await repos.lineItems.findById(itemId, invoice.id);
      if (!item) throw new NotFoundError('Line item not found');
      await repos.lineItems.delete(item.id);

      const { invoice: updated } = await recalculateWithin(repos, invoice, this.settings.defaultTaxRate);
      return this.detail(repos, updated);
    });
  }

  /** Line math without persisting; fills product defaults when `product_id` is given. */
  async previewLine(companyId: string, input: LinePreviewInput): Promise<LinePreview> {
    return this.read(async (repos) => {
      let description: string | null = null;
      let line = {
        quantity: input.quantity,
        unit_price: input.unit_price ?? 0,
        unit_weight: input.unit_weight ?? 0,
      };
      let taxRate = input.product_tax_rate ?? 0;

      if (input.product_id) {
        const product = await repos.products.findById(input.product_id, companyId);
        if (!product) throw new NotFoundError('Product not found');
        const resolved = applyProductDefaults({ ...input, item_description: null }, product);
        validateLine(resolved, product);
        description = resolved.item_description;
        line = { quantity: resolved.quantity, unit_price: resolved.unit_price, unit_weight: resolved.unit_weight };
        taxRate = product.tax_rate;
      }

      return {
        item_description: description,
        ...line,
        ...computeLine({ ...line, product_tax_rate: taxRate }),
        specifications_summary: specificationsSummary(input.specifications),
      };
    });
  }

  // ────────────────────────────────────────────────────────────
  // Helpers
  // ────────────────────────────────────────────────────────────

  private async load(repos: Repositories, id: string, companyId: string): Promise<Invoice> {
    const invoice = await repos.invoices.findById(id, companyId);
    if (!invoice) throw new NotFoundError('Invoice not found');
    return invoice;
  }

  private async insertLine(repos: Repositories, invoice: Invoice, input: LineItemInput): Promise<InvoiceLineItem> {
    const product = await repos.products.findById(input.product_id, invoice.company_id);
    if (!product) throw new NotFoundError('Product not found');

    const resolved = applyProductDefaults(input, product);
    validateLine(resolved, product);
    const amounts = computeLine({ ...resolved, product_tax_rate: product.tax_rate });

    return repos.lineItems.create({
      invoice_id: invoice.id,
      product_id: product.id,
      ...resolved,
      line_total: amounts.line_total,
      line_weight: amounts.line_weight,
      tax_amount: amounts.tax_amount,
    });
  }

  private async detail(repos: Repositories, invoice: Invoice): Promise<InvoiceDetail> {
    const items = await repos.lineItems.listByInvoice(invoice.id);
    const payments = await repos.payments.listByInvoice(invoice.id);
    const paymentCount = await repos.payments.countByInvoice(invoice.id);
    const paid = totalPaid(payments);

    return {
      invoice,
      items,
      payments,
      total_paid: paid,
      remaining_amount: remainingAmount(invoice.total_amount, paid),
      can_be_modified: canBeModified(invoice, paymentCount),
      can_be_deleted: canBeDeleted(invoice, paymentCount),
    };
  }
}
