// =============================================================
// File: server/services/payment.service.ts
// Module: Invoicing
// Description: Records payments against invoices and keeps the
//              invoice payment_status in step with the completed
//              payment total.
// =============================================================

import type { Invoice, Payment, PaymentMethod, PaymentRecordStatus } from '../../shared/types';
import { INVOICE_STATUSES, PAYMENT_RECORD_STATUSES, PAYMENT_STATUSES } from '../../shared/constants';
import { OperationContext, toDateString } from '../lib/context';
import { NotFoundError, ValidationError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { round2 } from '../lib/numbers';
import { derivePaymentStatus, remainingAmount } from '../domain/invoice-totals';
import type { InvoicePatch, Repositories } from '../repositories/types';
import { BaseService } from './base.service';
import { totalPaid } from './invoice.service';

const log = moduleLogger('payment');

export interface RecordPaymentInput {
  amount: number;
  payment_method: PaymentMethod;
  payment_date?: string;
  reference?: string | null;
  status?: PaymentRecordStatus;
}

export interface PaymentOutcome {
  payment: Payment | null;
  invoice: Invoice;
  total_paid: number;
  remaining_amount: number;
}

export class PaymentService extends BaseService {
  async recordPayment(ctx: OperationContext, invoiceId: string, input: RecordPaymentInput): Promise<PaymentOutcome> {
    if (!Number.isFinite(input.amount) || input.amount <= 0) {
      throw new ValidationError('Payment amount must be greater than zero', { constraint: 'amount' });
    }

    return this.mutate('recordPayment', async (repos) => {
      const invoice = await this.load(repos, invoiceId, ctx.companyId);
      if (invoice.status === INVOICE_STATUSES.CANCELLED) {
        throw new ValidationError('Cannot record a payment on a cancelled invoice', {
          invoice_number: invoice.invoice_number,
        });
      }

      const payment = await repos.payments.create({
        invoice_id: invoice.id,
        amount: round2(input.amount),
        payment_method: input.payment_method,
        payment_date: input.payment_date ?? toDateString(ctx.clock.now()),
        status: input.status ?? PAYMENT_RECORD_STATUSES.COMPLETED,
        reference: input.reference ?? null,
        received_by: ctx.actorId,
      });

      const outcome = await this.refreshWithin(repos, invoice);
      log.info(
        { invoiceId: invoice.id, paymentId: payment.id, amount: payment.amount, paymentStatus: outcome.invoice.payment_status },
        'Payment recorded'
      );
      return { ...outcome, payment };
    });
  }

  async refreshPaymentStatus(ctx: OperationContext, invoiceId: string): Promise<PaymentOutcome> {
    return this.mutate('refreshPaymentStatus', async (repos) =>
      this.refreshWithin(repos, await this.load(repos, invoiceId, ctx.companyId))
    );
  }

  /** Forces `paid`; a draft invoice moves to completed. */
  async markAsPaid(ctx: OperationContext, invoiceId: string): Promise<PaymentOutcome> {
    return this.mutate('markAsPaid', async (repos) => {
      const invoice = await this.load(repos, invoiceId, ctx.companyId);
      const patch: InvoicePatch = { payment_status: PAYMENT_STATUSES.PAID };
      if (invoice.status === INVOICE_STATUSES.DRAFT) patch.status = INVOICE_STATUSES.COMPLETED;

      const updated = await repos.invoices.update(invoice.id, invoice.version, patch);
      const paid = totalPaid(await repos.payments.listByInvoice(invoice.id));
      return { payment: null, invoice: updated, total_paid: paid, remaining_amount: remainingAmount(updated.total_amount, paid) };
    });
  }

  private async refreshWithin(repos: Repositories, invoice: Invoice): Promise<PaymentOutcome> {
    const paid = totalPaid(await repos.payments.listByInvoice(invoice.id));
    const status = derivePaymentStatus(invoice.total_amount, paid);
    const updated = status === invoice.payment_status
      ? invoice
      : await repos.invoices.update(invoice.id, invoice.version, { payment_status: status });

    return {
      payment: null,
      invoice: updated,
      total_paid: paid,
      remaining_amount: remainingAmount(updated.total_amount, paid),
    };
  }

  private async load(repos: Repositories, id: string, companyId: string): Promise<Invoice> {
    const invoice = await repos.invoices.findById(id, companyId);
    if (!invoice) throw new NotFoundError('Invoice not found');
    return invoice;
  }
}
