import type {
  ENTITY_STATUS,
  INVOICE_STATUSES,
  PAYMENT_STATUSES,
  PAYMENT_RECORD_STATUSES,
  PAYMENT_METHODS,
  STAGE_STATUSES,
  STAGE_EVENTS,
  PRODUCTION_STATUSES,
  PRIORITY_LEVELS,
} from '../constants';

type ValueOf<T> = T[keyof T];

export type EntityStatus = ValueOf<typeof ENTITY_STATUS>;
export type InvoiceStatus = ValueOf<typeof INVOICE_STATUSES>;
export type PaymentStatus = ValueOf<typeof PAYMENT_STATUSES>;
export type PaymentRecordStatus = ValueOf<typeof PAYMENT_RECORD_STATUSES>;
export type PaymentMethod = ValueOf<typeof PAYMENT_METHODS>;
export type StageStatus = ValueOf<typeof STAGE_STATUSES>;
export type StageEvent = ValueOf<typeof STAGE_EVENTS>;
export type ProductionStatus = ValueOf<typeof PRODUCTION_STATUSES>;
export type Priority = ValueOf<typeof PRIORITY_LEVELS>;

// ============================================================
// Free-form maps (specifications, stage_data, settings)
// ============================================================

export type SpecificationValue = string | number | boolean | null | SpecificationMap;

export interface SpecificationMap {
  [key: string]: SpecificationValue;
}

// ============================================================
// Base types used by all entities
// ============================================================

export interface BaseEntity {
  id: string;
  created_at: Date;
  updated_at: Date;
}

export interface VersionedEntity extends BaseEntity {
  version: number;
}

// ============================================================
// Company & Setup
// ============================================================

export interface Company extends BaseEntity {
  name: string;
  tax_rate: number | null;
  settings: SpecificationMap;
}

export interface Branch extends BaseEntity {
  company_id: string;
  code: string;
  name: string;
  is_main_branch: boolean;
  status: EntityStatus;
}

export interface Product extends BaseEntity {
  company_id: string;
  product_code: string;
  name: string;
  base_price: number;
  weight_per_unit: number;
  weight_unit: string;
  tax_rate: number;
  minimum_quantity: number | null;
  maximum_quantity: number | null;
  status: EntityStatus;
}

export interface WeightPricingTier extends BaseEntity {
  company_id: string;
  tier_name: string;
  min_weight: number;
  max_weight: number | null;
  base_price: number;
  price_per_kg: number;
  status: EntityStatus;
  sort_order: number;
}

// ============================================================
// Invoicing
// ============================================================

export interface Invoice extends VersionedEntity {
  company_id: string;
  branch_id: string;
  customer_id: string;
  created_by: string;
  invoice_number: string;
  invoice_date: string;
  due_date: string;
  subtotal: number;
  weight_charge: number;
  tax_amount: number;
  discount_amount: number;
  total_amount: number;
  total_weight: number;
  status: InvoiceStatus;
  payment_status: PaymentStatus;
  notes: string | null;
  terms_conditions: string | null;
  is_deleted: boolean;
}

export interface InvoiceLineItem extends BaseEntity {
  invoice_id: string;
  product_id: string;
  item_description: string;
  quantity: number;
  unit_price: number;
  unit_weight: number;
  line_total: number;
  line_weight: number;
  tax_amount: number;
  specifications: SpecificationMap;
}

export interface Payment extends BaseEntity {
  invoice_id: string;
  amount: number;
  payment_method: PaymentMethod;
  payment_date: string;
  status: PaymentRecordStatus;
  reference: string | null;
  received_by: string;
}

// ============================================================
// Production
// ============================================================

export interface PrintJob extends VersionedEntity {
  company_id: string;
  branch_id: string;
  invoice_id: string | null;
  job_number: string;
  job_type: string;
  production_status: ProductionStatus;
  priority: Priority;
  quantity: number;
  completion_percentage: number;
  started_at: Date | null;
  actual_completion: Date | null;
  production_notes: string | null;
  specifications: SpecificationMap;
}

export interface ProductionStage extends VersionedEntity {
  print_job_id: string;
  stage_name: string;
  stage_order: number;
  stage_status: StageStatus;
  started_at: Date | null;
  completed_at: Date | null;
  actual_duration: number | null;
  estimated_duration: number | null;
  requires_customer_approval: boolean;
  customer_approved_at: Date | null;
  approved_by: string | null;
  approval_status: string | null;
  rejection_reason: string | null;
  notes: string | null;
  stage_data: SpecificationMap;
  updated_by: string | null;
}
