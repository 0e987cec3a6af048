import { z } from 'zod';
import type { SpecificationMap, SpecificationValue } from '../../shared/types';
import {
  INVOICE_STATUSES,
  PAYMENT_METHODS,
  PAYMENT_RECORD_STATUSES,
  PRIORITY_LEVELS,
  PRODUCTION_STATUSES,
  STAGE_EVENTS,
} from '../../shared/constants';

const specificationValueSchema: z.ZodType<SpecificationValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), specificationMapSchema])
);

export const specificationMapSchema: z.ZodType<SpecificationMap> = z.lazy(() =>
  z.record(z.string(), specificationValueSchema)
);

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

function enumOf<T extends Record<string, string>>(values: T) {
  const list: readonly string[] = Object.values(values);
  return z.string().refine((v): v is T[keyof T] => list.includes(v), {
    message: `Expected one of: ${list.join(', ')}`,
  });
}

export const idParams = z.object({ id: z.string().min(1) });
export const itemParams = z.object({ id: z.string().min(1), itemId: z.string().min(1) });
export const branchParams = z.object({ branchId: z.string().min(1) });

// ──────── Weight pricing ────────

export const tierBody = z.object({
  tier_name: z.string().min(1).max(100),
  min_weight: z.coerce.number(),
  max_weight: z.coerce.number().nullable().optional(),
  base_price: z.coerce.number(),
  price_per_kg: z.coerce.number().optional(),
  status: z.enum(['active', 'inactive']).optional(),
  sort_order: z.coerce.number().int().optional(),
});

export const tierUpdateBody = tierBody.partial();

export const quoteQuery = z.object({
  weight: z.coerce.number(),
});

export const breakdownQuery = z.object({
  weights: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(',').map((w) => Number(w.trim())) : undefined))
    .pipe(z.array(z.number().finite()).optional()),
});

// ──────── Invoices ────────

export const lineItemBody = z.object({
  product_id: z.string().min(1),
  item_description: z.string().nullable().optional(),
  quantity: z.coerce.number(),
  unit_price: z.coerce.number().nullable().optional(),
  unit_weight: z.coerce.number().nullable().optional(),
  specifications: specificationMapSchema.optional(),
});

export const lineItemUpdateBody = z.object({
  item_description: z.string().optional(),
  quantity: z.coerce.number().optional(),
  unit_price: z.coerce.number().optional(),
  unit_weight: z.coerce.number().optional(),
  specifications: specificationMapSchema.optional(),
});

export const linePreviewBody = z.object({
  product_id: z.string().min(1).optional(),
  quantity: z.coerce.number(),
  unit_price: z.coerce.number().optional(),
  unit_weight: z.coerce.number().optional(),
  product_tax_rate: z.coerce.number().min(0).optional(),
  specifications: specificationMapSchema.optional(),
});

export const createInvoiceBody = z.object({
  branch_id: z.string().min(1).optional(),
  customer_id: z.string().min(1),
  invoice_date: isoDate.optional(),
  due_date: isoDate.optional(),
  discount_amount: z.coerce.number().optional(),
  status: z.enum(['draft', 'pending']).optional(),
  notes: z.string().nullable().optional(),
  terms_conditions: z.string().nullable().optional(),
  items: z.array(lineItemBody).optional(),
});

export const updateInvoiceBody = z.object({
  customer_id: z.string().min(1).optional(),
  due_date: isoDate.optional(),
  discount_amount: z.coerce.number().optional(),
  status: enumOf(INVOICE_STATUSES).optional(),
  notes: z.string().nullable().optional(),
  terms_conditions: z.string().nullable().optional(),
});

export const paymentBody = z.object({
  amount: z.coerce.number(),
  payment_method: enumOf(PAYMENT_METHODS),
  payment_date: isoDate.optional(),
  reference: z.string().max(100).nullable().optional(),
  status: enumOf(PAYMENT_RECORD_STATUSES).optional(),
});

// ──────── Production ────────

export const createPrintJobBody = z.object({
  branch_id: z.string().min(1).optional(),
  invoice_id: z.string().min(1).nullable().optional(),
  job_type: z.string().min(1).max(50),
  priority: enumOf(PRIORITY_LEVELS).optional(),
  quantity: z.coerce.number().optional(),
  specifications: specificationMapSchema.optional(),
  production_notes: z.string().nullable().optional(),
  create_stages: z.boolean().optional(),
});

export const progressBody = z.object({
  percentage: z.coerce.number(),
  notes: z.string().nullable().optional(),
});

export const jobStatusBody = z.object({
  status: enumOf(PRODUCTION_STATUSES),
  notes: z.string().nullable().optional(),
});

export const cancelBody = z.object({
  reason: z.string().nullable().optional(),
});

export const addStageBody = z.object({
  stage_name: z.string().min(1).max(100),
  stage_order: z.coerce.number().int().optional(),
  estimated_duration: z.coerce.number().int().nonnegative().nullable().optional(),
  requires_customer_approval: z.boolean().optional(),
});

export const transitionBody = z.object({
  event: enumOf(STAGE_EVENTS),
  notes: z.string().nullable().optional(),
  stage_data: specificationMapSchema.optional(),
});
