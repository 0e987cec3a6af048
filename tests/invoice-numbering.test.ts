import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import knex from 'knex';
import {
  formatInvoiceNumber,
  jobNumberPrefix,
  nextInvoiceNumberAfter,
  nextJobNumberAfter,
  parseInvoiceSequence,
} from '../server/domain/document-number';
import { ConcurrencyConflictError, FormatError } from '../server/lib/errors';
import { KnexInvoiceRepository } from '../server/repositories/invoice.repository';
import type { Invoice } from '../shared/types';
import { createTestEnvironment, TestEnv } from './helpers/factory';
import { expectAppError } from './helpers/assertions';

function storedInvoice(env: TestEnv, invoiceNumber: string): Invoice {
  return env.store.insertInvoiceRow({
    company_id: env.company.id,
    branch_id: env.branch.id,
    customer_id: 'customer-1',
    created_by: 'user-1',
    invoice_number: invoiceNumber,
    invoice_date: '2025-06-01',
    due_date: '2025-07-01',
    subtotal: 0,
    weight_charge: 0,
    tax_amount: 0,
    discount_amount: 0,
    total_amount: 0,
    total_weight: 0,
    status: 'draft',
    payment_status: 'pending',
    notes: null,
    terms_conditions: null,
    is_deleted: false,
  });
}

describe('invoice number format', () => {
  it('starts a branch at 000001', () => {
    expect(nextInvoiceNumberAfter('MAIN', null)).toBe('MAIN-000001');
  });

  it('increments the trailing six digits', () => {
    expect(nextInvoiceNumberAfter('MAIN', 'MAIN-000041')).toBe('MAIN-000042');
    expect(parseInvoiceSequence('NORTH-001200')).toBe(1200);
    expect(formatInvoiceNumber('NORTH', 7)).toBe('NORTH-000007');
  });

  it('refuses to wrap past 999999', () => {
    expect(() => nextInvoiceNumberAfter('MAIN', 'MAIN-999999')).toThrow(FormatError);
  });

  it('refuses a stored number without a numeric sequence', () => {
    expect(() => nextInvoiceNumberAfter('MAIN', 'MAIN-LEGACY')).toThrow(FormatError);
    expect(() => parseInvoiceSequence('42')).toThrow('does not end in a 6-digit sequence');
  });
});

describe('print job number format', () => {
  const date = new Date('2025-06-15T09:00:00.000Z');

  it('uses the branch code and UTC date', () => {
    expect(jobNumberPrefix('MAIN', date)).toBe('MAIN-20250615');
    expect(nextJobNumberAfter('MAIN', date, null)).toBe('MAIN-20250615-001');
  });

  it('increments the daily sequence', () => {
    expect(nextJobNumberAfter('MAIN', date, 'MAIN-20250615-009')).toBe('MAIN-20250615-010');
  });

  it('refuses to wrap past 999 jobs a day', () => {
    expect(() => nextJobNumberAfter('MAIN', date, 'MAIN-20250615-999')).toThrow(FormatError);
  });
});

describe('InvoiceService numbering', () => {
  let env: TestEnv;

  beforeEach(() => {
    env = createTestEnvironment();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('previews without consuming a number', async () => {
    expect(await env.services.invoices.nextInvoiceNumber(env.company.id, env.branch.id)).toBe('MAIN-000001');
    expect(await env.services.invoices.nextInvoiceNumber(env.company.id, env.branch.id)).toBe('MAIN-000001');

    await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    expect(await env.services.invoices.nextInvoiceNumber(env.company.id, env.branch.id)).toBe('MAIN-000002');
  });

  it('hands out strictly increasing numbers to sequential creations', async () => {
    const numbers: string[] = [];
    for (let i = 0; i < 5; i++) {
      const detail = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
      numbers.push(detail.invoice.invoice_number);
    }
    expect(numbers).toEqual(['MAIN-000001', 'MAIN-000002', 'MAIN-000003', 'MAIN-000004', 'MAIN-000005']);
  });

  it('never duplicates a number under concurrent creation', async () => {
    const details = await Promise.all(
      Array.from({ length: 10 }, () => env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' }))
    );
    const numbers = details.map((d) => d.invoice.invoice_number);
    expect(new Set(numbers).size).toBe(10);
    expect([...numbers].sort()).toEqual(
      Array.from({ length: 10 }, (_, i) => `MAIN-${String(i + 1).padStart(6, '0')}`)
    );
  });

  it('does not reuse the number of a deleted invoice', async () => {
    const first = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    await env.services.invoices.deleteInvoice(env.ctx, first.invoice.id);

    const second = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    expect(second.invoice.invoice_number).toBe('MAIN-000002');
  });

  it('numbers each branch independently', async () => {
    const north = env.store.insertBranch({
      company_id: env.company.id,
      code: 'NORTH',
      name: 'North Branch',
      is_main_branch: false,
      status: 'active',
    });
    await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    const detail = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1', branch_id: north.id });
    expect(detail.invoice.invoice_number).toBe('NORTH-000001');
  });

  it('fails without writing when the latest stored number is malformed', async () => {
    storedInvoice(env, 'MAIN-LEGACY');
    await expectAppError(env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' }), 'FORMAT_ERROR', 500);
    expect(env.store.tables.invoices).toHaveLength(1);
  });

  it('continues after an imported sequence', async () => {
    storedInvoice(env, 'MAIN-000120');
    const detail = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    expect(detail.invoice.invoice_number).toBe('MAIN-000121');
  });

  it('continues from the highest number when it carries an earlier timestamp', async () => {
    // A creation that began first but waited on the branch lock commits the higher number
    const waited = storedInvoice(env, 'MAIN-000006');
    const first = storedInvoice(env, 'MAIN-000005');
    expect(waited.created_at.getTime()).toBeLessThan(first.created_at.getTime());

    const detail = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    expect(detail.invoice.invoice_number).toBe('MAIN-000007');
    expect(await env.services.invoices.nextInvoiceNumber(env.company.id, env.branch.id)).toBe('MAIN-000008');
  });

  it('rejects a branch from another company', async () => {
    const other = env.store.insertCompany({ name: 'Other Co', tax_rate: 0.1, settings: {} });
    const foreign = env.store.insertBranch({
      company_id: other.id,
      code: 'OTH',
      name: 'Other',
      is_main_branch: true,
      status: 'active',
    });
    await expectAppError(
      env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1', branch_id: foreign.id }),
      'NOT_FOUND',
      404
    );
  });
});

describe('optimistic locking', () => {
  let env: TestEnv;

  beforeEach(() => {
    env = createTestEnvironment();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects a write against a stale version', async () => {
    const { invoice } = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    await expect(
      env.store.transaction((repos) => repos.invoices.update(invoice.id, invoice.version - 1, { notes: 'late' }))
    ).rejects.toBeInstanceOf(ConcurrencyConflictError);
  });

  it('retries the whole cycle after a lost race', async () => {
    const { invoice } = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    const update = vi
      .spyOn(env.store.repos.invoices, 'update')
      .mockRejectedValueOnce(new ConcurrencyConflictError('Invoice', invoice.id));

    const totals = await env.services.invoices.recalculateInvoice(env.ctx, invoice.id);
    expect(totals.total_amount).toBe(224);
    expect(update).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of attempts', async () => {
    const { invoice } = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    const update = vi
      .spyOn(env.store.repos.invoices, 'update')
      .mockRejectedValue(new ConcurrencyConflictError('Invoice', invoice.id));

    await expectAppError(env.services.invoices.recalculateInvoice(env.ctx, invoice.id), 'CONCURRENCY_CONFLICT', 409);
    expect(update).toHaveBeenCalledTimes(3);
  });
});

describe('KnexInvoiceRepository', () => {
  const db = knex({ client: 'pg' });

  afterAll(async () => {
    await db.destroy();
  });

  it('looks up the latest number by sequence, not by creation time', () => {
    const query = new KnexInvoiceRepository(db, 'invoices').latestNumberQuery('branch-1').toSQL();
    expect(query.sql).toBe('select "invoice_number" from "invoices" where "branch_id" = ? order by "invoice_number" desc');
    expect(query.bindings).toEqual(['branch-1']);
  });
});
