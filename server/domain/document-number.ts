// =============================================================
// File: server/domain/document-number.ts
// Module: Numbering
// Description: Invoice numbers ({branch}-{000001}) and print job
//              numbers ({branch}-{YYYYMMDD}-{001}). Serialization of
//              allocation is handled by the caller's transaction.
// =============================================================

import { INVOICE_SEQUENCE_LENGTH, JOB_SEQUENCE_LENGTH } from '../../shared/constants';
import { FormatError } from '../lib/errors';

function parseTrailingSequence(documentNumber: string, length: number, kind: string): number {
  const tail = documentNumber.slice(-length);
  if (tail.length !== length || !/^\d+$/.test(tail)) {
    throw new FormatError(`Stored ${kind} number "${documentNumber}" does not end in a ${length}-digit sequence`, {
      [`${kind}_number`]: documentNumber,
    });
  }
  return parseInt(tail, 10);
}

function formatSequence(prefix: string, sequence: number, length: number, kind: string): string {
  if (sequence >= 10 ** length) {
    throw new FormatError(`${kind} sequence for ${prefix} is exhausted`, { prefix, sequence });
  }
  return `${prefix}-${String(sequence).padStart(length, '0')}`;
}

export function parseInvoiceSequence(invoiceNumber: string): number {
  return parseTrailingSequence(invoiceNumber, INVOICE_SEQUENCE_LENGTH, 'invoice');
}

export function formatInvoiceNumber(branchCode: string, sequence: number): string {
  return formatSequence(branchCode, sequence, INVOICE_SEQUENCE_LENGTH, 'invoice');
}

/** `latest` is the branch's most recently created invoice number, or null for the first invoice. */
export function nextInvoiceNumberAfter(branchCode: string, latest: string | null): string {
  const next = latest === null ? 1 : parseInvoiceSequence(latest) + 1;
  return formatInvoiceNumber(branchCode, next);
}

// ──────── Print jobs ────────

export function jobDatePart(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function jobNumberPrefix(branchCode: string, date: Date): string {
  return `${branchCode}-${jobDatePart(date)}`;
}

export function nextJobNumberAfter(branchCode: string, date: Date, latest: string | null): string {
  const next = latest === null ? 1 : parseTrailingSequence(latest, JOB_SEQUENCE_LENGTH, 'job') + 1;
  return formatSequence(jobNumberPrefix(branchCode, date), next, JOB_SEQUENCE_LENGTH, 'job');
}
