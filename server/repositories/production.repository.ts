// =============================================================
// File: server/repositories/production.repository.ts
// Module: Production
// Description: Print jobs and their ordered production stages.
//              Both carry a version column for optimistic locking.
// =============================================================

import type { PrintJob, ProductionStage } from '../../shared/types';
import { STAGE_STATUSES } from '../../shared/constants';
import { parseNum } from '../lib/numbers';
import { BaseRepository, RowOf, jsonMap } from './base.repository';
import type {
  NewPrintJob,
  NewProductionStage,
  PrintJobPatch,
  PrintJobRepository,
  ProductionStagePatch,
  ProductionStageRepository,
} from './types';

type PrintJobRow = RowOf<PrintJob, 'quantity' | 'completion_percentage'>;

function toPrintJob(row: PrintJobRow): PrintJob {
  return {
    ...row,
    quantity: parseNum(row.quantity),
    completion_percentage: parseNum(row.completion_percentage),
    specifications: jsonMap(row.specifications),
  };
}

function toStage(row: ProductionStage): ProductionStage {
  return { ...row, stage_data: jsonMap(row.stage_data) };
}

export class KnexPrintJobRepository extends BaseRepository implements PrintJobRepository {
  async findById(id: string, companyId?: string): Promise<PrintJob | null> {
    const query = this.table.where({ id });
    if (companyId) query.where('company_id', companyId);
    const row: PrintJobRow | undefined = await query.first();
    return row ? toPrintJob(row) : null;
  }

  async lockById(id: string, companyId: string): Promise<PrintJob | null> {
    const row: PrintJobRow | undefined = await this.table.where({ id, company_id: companyId }).forUpdate().first();
    return row ? toPrintJob(row) : null;
  }

  async latestNumberWithPrefix(branchId: string, prefix: string): Promise<string | null> {
    const row: Pick<PrintJob, 'job_number'> | undefined = await this.table
      .where({ branch_id: branchId })
      .where('job_number', 'like', `${prefix}-%`)
      .orderBy('job_number', 'desc')
      .select('job_number')
      .first();
    return row ? row.job_number : null;
  }

  async create(data: NewPrintJob): Promise<PrintJob> {
    const [row]: PrintJobRow[] = await this.table.insert({ ...data, version: 1 }).returning('*');
    return toPrintJob(row);
  }

  async update(id: string, expectedVersion: number, patch: PrintJobPatch): Promise<PrintJob> {
    return toPrintJob(await this.updateVersioned<PrintJobRow>('Print job', id, expectedVersion, patch));
  }
}

export class KnexProductionStageRepository extends BaseRepository implements ProductionStageRepository {
  async listByJob(printJobId: string): Promise<ProductionStage[]> {
    const rows: ProductionStage[] = await this.table
      .where({ print_job_id: printJobId })
      .orderBy('stage_order', 'asc');
    return rows.map(toStage);
  }

  async findById(id: string): Promise<ProductionStage | null> {
    const row: ProductionStage | undefined = await this.table.where({ id }).first();
    return row ? toStage(row) : null;
  }

  async maxOrder(printJobId: string): Promise<number> {
    const result = await this.table.where({ print_job_id: printJobId }).max('stage_order as max_order').first();
    return parseNum(result?.max_order ?? 0);
  }

  async create(data: NewProductionStage): Promise<ProductionStage> {
    const [row]: ProductionStage[] = await this.table.insert({ ...data, version: 1 }).returning('*');
    return toStage(row);
  }

  async update(id: string, expectedVersion: number, patch: ProductionStagePatch): Promise<ProductionStage> {
    return toStage(await this.updateVersioned<ProductionStage>('Production stage', id, expectedVersion, patch));
  }

  async listAwaitingApproval(companyId: string): Promise<ProductionStage[]> {
    const rows: ProductionStage[] = await this.db('production_stages as ps')
      .join('print_jobs as pj', 'ps.print_job_id', 'pj.id')
      .where('pj.company_id', companyId)
      .where('ps.stage_status', STAGE_STATUSES.REQUIRES_APPROVAL)
      .orderBy('ps.updated_at', 'asc')
      .select('ps.*');
    return rows.map(toStage);
  }
}
