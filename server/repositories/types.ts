// =============================================================
// File: server/repositories/types.ts
// Module: Persistence
// Description: Repository contracts the services run against, and
//              the DataStore that hands them out inside a single
//              transaction. Knex implements them for PostgreSQL.
// =============================================================

import type {
  Branch,
  Company,
  Invoice,
  InvoiceLineItem,
  Payment,
  PrintJob,
  Product,
  ProductionStage,
  WeightPricingTier,
} from '../../shared/types';

type Generated = 'id' | 'created_at' | 'updated_at';
type Versioned = Generated | 'version';

export type NewWeightPricingTier = Omit<WeightPricingTier, Generated>;
export type WeightPricingTierPatch = Partial<Omit<WeightPricingTier, Generated | 'company_id'>>;

export type NewInvoice = Omit<Invoice, Versioned>;
export type InvoicePatch = Partial<Omit<Invoice, Versioned | 'company_id' | 'branch_id' | 'invoice_number' | 'created_by'>>;

export type NewInvoiceLineItem = Omit<InvoiceLineItem, Generated>;
export type InvoiceLineItemPatch = Partial<Omit<InvoiceLineItem, Generated | 'invoice_id'>>;

export type NewPayment = Omit<Payment, Generated>;

export type NewPrintJob = Omit<PrintJob, Versioned>;
export type PrintJobPatch = Partial<Omit<PrintJob, Versioned | 'company_id' | 'branch_id' | 'job_number'>>;

export type NewProductionStage = Omit<ProductionStage, Versioned>;
export type ProductionStagePatch = Partial<Omit<ProductionStage, Versioned | 'print_job_id'>>;

export interface CompanyRepository {
  findById(id: string): Promise<Company | null>;
}

export interface BranchRepository {
  findById(id: string): Promise<Branch | null>;
  /** Row lock held until the surrounding transaction ends. */
  lockById(id: string): Promise<Branch | null>;
}

export interface ProductRepository {
  findById(id: string, companyId: string): Promise<Product | null>;
}

export interface WeightPricingTierRepository {
  /** Ordered by `min_weight`, then `sort_order`. */
  listByCompany(companyId: string, options?: { activeOnly?: boolean }): Promise<WeightPricingTier[]>;
  findById(id: string, companyId: string): Promise<WeightPricingTier | null>;
  create(data: NewWeightPricingTier): Promise<WeightPricingTier>;
  update(id: string, patch: WeightPricingTierPatch): Promise<WeightPricingTier>;
  delete(id: string): Promise<void>;
}

export interface InvoiceRepository {
  /** Soft-deleted invoices are not returned. */
  findById(id: string, companyId?: string): Promise<Invoice | null>;
  /** Most recently created invoice number for the branch, soft-deleted invoices included. */
  latestNumberForBranch(branchId: string): Promise<string | null>;
  create(data: NewInvoice): Promise<Invoice>;
  /** Applies `patch` only if the stored version still equals `expectedVersion`; bumps the version. */
  update(id: string, expectedVersion: number, patch: InvoicePatch): Promise<Invoice>;
}

export interface InvoiceLineItemRepository {
  listByInvoice(invoiceId: string): Promise<InvoiceLineItem[]>;
  findById(id: string, invoiceId: string): Promise<InvoiceLineItem | null>;
  create(data: NewInvoiceLineItem): Promise<InvoiceLineItem>;
  update(id: string, patch: InvoiceLineItemPatch): Promise<InvoiceLineItem>;
  delete(id: string): Promise<void>;
}

export interface PaymentRepository {
  listByInvoice(invoiceId: string): Promise<Payment[]>;
  countByInvoice(invoiceId: string): Promise<number>;
  create(data: NewPayment): Promise<Payment>;
}

export interface PrintJobRepository {
  findById(id: string, companyId?: string): Promise<PrintJob | null>;
  /** Row lock held until the surrounding transaction ends. */
  lockById(id: string, companyId: string): Promise<PrintJob | null>;
  /** Highest job number on the branch starting with `prefix`. */
  latestNumberWithPrefix(branchId: string, prefix: string): Promise<string | null>;
  create(data: NewPrintJob): Promise<PrintJob>;
  update(id: string, expectedVersion: number, patch: PrintJobPatch): Promise<PrintJob>;
}

export interface ProductionStageRepository {
  /** Ordered by `stage_order`. */
  listByJob(printJobId: string): Promise<ProductionStage[]>;
  findById(id: string): Promise<ProductionStage | null>;
  maxOrder(printJobId: string): Promise<number>;
  create(data: NewProductionStage): Promise<ProductionStage>;
  update(id: string, expectedVersion: number, patch: ProductionStagePatch): Promise<ProductionStage>;
  /** Stages in `requires_approval` across the company's jobs, oldest first. */
  listAwaitingApproval(companyId: string): Promise<ProductionStage[]>;
}

export interface Repositories {
  companies: CompanyRepository;
  branches: BranchRepository;
  products: ProductRepository;
  tiers: WeightPricingTierRepository;
  invoices: InvoiceRepository;
  lineItems: InvoiceLineItemRepository;
  payments: PaymentRepository;
  printJobs: PrintJobRepository;
  stages: ProductionStageRepository;
}

export interface DataStore {
  /** Runs `fn` in one transaction; a thrown error rolls every write back. */
  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
}
