export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const DEFAULT_TAX_RATE = 0.12;
export const DEFAULT_DUE_DAYS = 30;
export const INVOICE_SEQUENCE_LENGTH = 6;
export const JOB_SEQUENCE_LENGTH = 3;

export const ENTITY_STATUS = {
  ACTIVE: 'active',
  INACTIVE: 'inactive',
} as const;

export const INVOICE_STATUSES = {
  DRAFT: 'draft',
  PENDING: 'pending',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
} as const;

export const PAYMENT_STATUSES = {
  PENDING: 'pending',
  PARTIALLY_PAID: 'partially_paid',
  PAID: 'paid',
  REFUNDED: 'refunded',
} as const;

export const PAYMENT_RECORD_STATUSES = {
  PENDING: 'pending',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
  REFUNDED: 'refunded',
} as const;

export const PAYMENT_METHODS = {
  CASH: 'cash',
  BANK_TRANSFER: 'bank_transfer',
  ONLINE: 'online',
  CARD: 'card',
  CHEQUE: 'cheque',
  MOBILE_PAYMENT: 'mobile_payment',
} as const;

export const WEIGHT_UNITS = {
  KG: 'kg',
  G: 'g',
  GRAMS: 'grams',
  LB: 'lb',
  OZ: 'oz',
} as const;

export const STAGE_STATUSES = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  ON_HOLD: 'on_hold',
  REQUIRES_APPROVAL: 'requires_approval',
  REJECTED: 'rejected',
  SKIPPED: 'skipped',
} as const;

export const STAGE_EVENTS = {
  START: 'start',
  COMPLETE: 'complete',
  PUT_ON_HOLD: 'putOnHold',
  RESUME: 'resume',
  REJECT: 'reject',
  REQUIRE_APPROVAL: 'requireApproval',
  APPROVE: 'approve',
  SKIP: 'skip',
} as const;

export const PRODUCTION_STATUSES = {
  PENDING: 'pending',
  DESIGN_REVIEW: 'design_review',
  DESIGN_APPROVED: 'design_approved',
  PRE_PRESS: 'pre_press',
  PRINTING: 'printing',
  FINISHING: 'finishing',
  QUALITY_CHECK: 'quality_check',
  COMPLETED: 'completed',
  ON_HOLD: 'on_hold',
  CANCELLED: 'cancelled',
} as const;

export const PRIORITY_LEVELS = {
  LOW: 'low',
  NORMAL: 'normal',
  HIGH: 'high',
  URGENT: 'urgent',
} as const;
