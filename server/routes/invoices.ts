// =============================================================
// File: server/routes/invoices.ts
// Module: Invoicing
// Description: REST API routes for invoices, their line items and
//              payments, plus number preview and line previews.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, requestContext } from '../plugins/auth.plugin';
import {
  branchParams,
  createInvoiceBody,
  idParams,
  itemParams,
  lineItemBody,
  lineItemUpdateBody,
  linePreviewBody,
  paymentBody,
  updateInvoiceBody,
} from './schemas';

export async function invoiceRoutes(server: FastifyInstance) {
  const { invoices, payments } = server.services;

  // ──────────────────────────────────────────────────────────
  // POST /invoices — Create invoice (number allocated per branch)
  // ──────────────────────────────────────────────────────────
  server.post('/invoices', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createInvoiceBody.parse(request.body);
    const data = await invoices.createInvoice(requestContext(request), body);
    return reply.code(201).send({
      success: true,
      data,
      message: `Invoice ${data.invoice.invoice_number} created`,
    });
  });

  server.get('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await invoices.getInvoice(requestContext(request).companyId, id);
    return { success: true, data };
  });

  server.put('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = updateInvoiceBody.parse(request.body);
    const data = await invoices.updateInvoice(requestContext(request), id, body);
    return { success: true, data };
  });

  server.delete('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    await invoices.deleteInvoice(requestContext(request), id);
    return { success: true, message: 'Invoice deleted' };
  });

  server.post('/invoices/:id/recalculate', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await invoices.recalculateInvoice(requestContext(request), id);
    return { success: true, data };
  });

  // ──────────────────────────────────────────────────────────
  // Line items
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/items', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const body = lineItemBody.parse(request.body);
    const data = await invoices.addLineItem(requestContext(request), id, body);
    return reply.code(201).send({ success: true, data });
  });

  server.put('/invoices/:id/items/:itemId', { preHandler: [authenticate] }, async (request) => {
    const { id, itemId } = itemParams.parse(request.params);
    const body = lineItemUpdateBody.parse(request.body);
    const data = await invoices.updateLineItem(requestContext(request), id, itemId, body);
    return { success: true, data };
  });

  server.delete('/invoices/:id/items/:itemId', { preHandler: [authenticate] }, async (request) => {
    const { id, itemId } = itemParams.parse(request.params);
    const data = await invoices.removeLineItem(requestContext(request), id, itemId);
    return { success: true, data };
  });

  server.post('/line-items/compute', { preHandler: [authenticate] }, async (request) => {
    const body = linePreviewBody.parse(request.body);
    const data = await invoices.previewLine(requestContext(request).companyId, body);
    return { success: true, data };
  });

  // ──────────────────────────────────────────────────────────
  // Payments
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/payments', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const body = paymentBody.parse(request.body);
    const data = await payments.recordPayment(requestContext(request), id, body);
    return reply.code(201).send({ success: true, data });
  });

  server.post('/invoices/:id/mark-paid', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await payments.markAsPaid(requestContext(request), id);
    return { success: true, data };
  });

  // ──────────────────────────────────────────────────────────
  // GET /branches/:branchId/next-invoice-number — Preview only
  // ──────────────────────────────────────────────────────────
  server.get('/branches/:branchId/next-invoice-number', { preHandler: [authenticate] }, async (request) => {
    const { branchId } = branchParams.parse(request.params);
    const invoiceNumber = await invoices.nextInvoiceNumber(requestContext(request).companyId, branchId);
    return { success: true, data: { invoice_number: invoiceNumber } };
  });
}
