// =============================================================
// File: server/services/print-job.service.ts
// Module: Production
// Description: Print jobs with per-branch daily job numbers,
//              default stage templates per job type, production
//              start, manual status / progress changes and the
//              stage-driven progress recompute.
// =============================================================

import type {
  Priority,
  PrintJob,
  ProductionStage,
  ProductionStatus,
  SpecificationMap,
} from '../../shared/types';
import { PRIORITY_LEVELS, PRODUCTION_STATUSES, STAGE_EVENTS, STAGE_STATUSES } from '../../shared/constants';
import stageTemplates from '../../shared/constants/stage-templates.json';
import { appendNote, formatTimestamp, OperationContext } from '../lib/context';
import { NotFoundError, ValidationError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { jobNumberPrefix, nextJobNumberAfter } from '../domain/document-number';
import {
  applyJobStatus,
  clampPercentage,
  countStages,
  deriveJobProgress,
  ProgressOutcome,
  StageCounts,
} from '../domain/print-job-progress';
import { transition } from '../domain/production-stage-machine';
import type { PrintJobPatch, Repositories } from '../repositories/types';
import { BaseService } from './base.service';

const log = moduleLogger('print-job');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface StageTemplate {
  name: string;
  estimated_duration: number;
  requires_approval: boolean;
}

export interface CreatePrintJobInput {
  branch_id?: string;
  invoice_id?: string | null;
  job_type: string;
  priority?: Priority;
  quantity?: number;
  specifications?: SpecificationMap;
  production_notes?: string | null;
  create_stages?: boolean;
}

export interface PrintJobDetail extends StageCounts {
  job: PrintJob;
  stages: ProductionStage[];
}

const TEMPLATES: Record<string, StageTemplate[]> = stageTemplates;

export function stageTemplateFor(jobType: string): StageTemplate[] {
  return TEMPLATES[jobType] ?? TEMPLATES.default;
}

/** Stage-driven recompute of one job, inside an open transaction. */
export async function recomputeJobProgressWithin(
  repos: Repositories,
  job: PrintJob,
  now: Date
): Promise<{ job: PrintJob; progress: ProgressOutcome }> {
  const stages = await repos.stages.listByJob(job.id);
  const progress = deriveJobProgress(job, stages, now);

  const unchanged =
    progress.patch.completion_percentage === job.completion_percentage && !progress.status_changed;
  const updated = unchanged ? job : await repos.printJobs.update(job.id, job.version, progress.patch);

  if (progress.status_changed && progress.production_status === PRODUCTION_STATUSES.COMPLETED) {
    log.info({ printJobId: job.id, jobNumber: job.job_number }, 'Print job completed');
  }
  return { job: updated, progress };
}

export class PrintJobService extends BaseService {
  // ──────── CREATE ────────

  async createPrintJob(ctx: OperationContext, input: CreatePrintJobInput): Promise<PrintJobDetail> {
    const branchId = input.branch_id ?? ctx.branchId;
    if (!branchId) {
      throw new ValidationError('branch_id is required', { constraint: 'branch_id' });
    }
    if (input.quantity !== undefined && (!Number.isFinite(input.quantity) || input.quantity <= 0)) {
      throw new ValidationError('Quantity must be greater than zero', { constraint: 'quantity' });
    }

    return this.mutate('createPrintJob', async (repos) => {
      const branch = await repos.branches.lockById(branchId);
      if (!branch || branch.company_id !== ctx.companyId) throw new NotFoundError('Branch not found');

      if (input.invoice_id) {
        const invoice = await repos.invoices.findById(input.invoice_id, ctx.companyId);
        if (!invoice) throw new NotFoundError('Invoice not found');
      }

      const now = ctx.clock.now();
      const latest = await repos.printJobs.latestNumberWithPrefix(branch.id, jobNumberPrefix(branch.code, now));

      const job = await repos.printJobs.create({
        company_id: ctx.companyId,
        branch_id: branch.id,
        invoice_id: input.invoice_id ?? null,
        job_number: nextJobNumberAfter(branch.code, now, latest),
        job_type: input.job_type,
        production_status: PRODUCTION_STATUSES.PENDING,
        priority: input.priority ?? PRIORITY_LEVELS.NORMAL,
        quantity: input.quantity ?? 1,
        completion_percentage: 0,
        started_at: null,
        actual_completion: null,
        production_notes: input.production_notes ?? null,
        specifications: input.specifications ?? {},
      });

      const stages = input.create_stages === false ? [] : await this.createTemplateStages(repos, job);

      log.info({ printJobId: job.id, jobNumber: job.job_number, stages: stages.length }, 'Print job created');
      return { job, stages, ...countStages(stages) };
    });
  }

  // ──────── READ ────────

  async getPrintJob(companyId: string, id: string): Promise<PrintJobDetail> {
    return this.read(async (repos) => {
      const job = await this.load(repos, id, companyId);
      const stages = await repos.stages.listByJob(job.id);
      return { job, stages, ...countStages(stages) };
    });
  }

  // ──────── PRODUCTION ────────

  /** pending → design_review; creates template stages when none exist and starts the first pending one. */
  async startProduction(ctx: OperationContext, id: string): Promise<PrintJobDetail> {
    return this.mutate('startProduction', async (repos) => {
      const job = await this.load(repos, id, ctx.companyId);
      if (job.production_status !== PRODUCTION_STATUSES.PENDING) {
        throw new ValidationError('Production can only be started for pending jobs', {
          production_status: job.production_status,
        });
      }

      const now = ctx.clock.now();
      const updated = await repos.printJobs.update(
        job.id,
        job.version,
        applyJobStatus(job, PRODUCTION_STATUSES.DESIGN_REVIEW, now, `Production started by ${ctx.actorId}`)
      );

      let stages = await repos.stages.listByJob(job.id);
      if (stages.length === 0) {
        stages = await this.createTemplateStages(repos, updated);
      }

      const first = stages.find((s) => s.stage_status === STAGE_STATUSES.PENDING);
      if (first) {
        const result = transition(first, STAGE_EVENTS.START, { actorId: ctx.actorId, now });
        if (!result.ok) throw result.error;
        const started = await repos.stages.update(first.id, first.version, {
          stage_status: result.stage.stage_status,
          started_at: result.stage.started_at,
          notes: result.stage.notes,
          updated_by: result.stage.updated_by,
        });
        stages = stages.map((s) => (s.id === started.id ? started : s));
      }

      log.info({ printJobId: job.id, actorId: ctx.actorId }, 'Production started');
      return { job: updated, stages, ...countStages(stages) };
    });
  }

  async recomputeJobProgress(ctx: OperationContext, id: string): Promise<ProgressOutcome> {
    return this.mutate('recomputeJobProgress', async (repos) => {
      const job = await this.load(repos, id, ctx.companyId);
      const { progress } = await recomputeJobProgressWithin(repos, job, ctx.clock.now());
      return progress;
    });
  }

  /** Manual override, clamped to 0-100. Does not touch production_status. */
  async updateProgress(ctx: OperationContext, id: string, percentage: number, notes?: string | null): Promise<PrintJob> {
    return this.mutate('updateProgress', async (repos) => {
      const job = await this.load(repos, id, ctx.companyId);
      const value = clampPercentage(percentage);
      const patch: PrintJobPatch = { completion_percentage: value };
      if (notes) {
        patch.production_notes = appendNote(
          job.production_notes,
          `${formatTimestamp(ctx.clock.now())}: Progress updated to ${value}%. ${notes}`
        );
      }
      return repos.printJobs.update(job.id, job.version, patch);
    });
  }

  async updateJobStatus(
    ctx: OperationContext,
    id: string,
    status: ProductionStatus,
    notes?: string | null
  ): Promise<PrintJob> {
    return this.mutate('updateJobStatus', async (repos) => {
      const job = await this.load(repos, id, ctx.companyId);
      if (job.production_status === PRODUCTION_STATUSES.CANCELLED) {
        throw new ValidationError('Cancelled jobs cannot change status', { production_status: job.production_status });
      }
      const updated = await repos.printJobs.update(job.id, job.version, applyJobStatus(job, status, ctx.clock.now(), notes));
      log.info({ printJobId: job.id, from: job.production_status, to: status }, 'Print job status changed');
      return updated;
    });
  }

  async cancel(ctx: OperationContext, id: string, reason?: string | null): Promise<PrintJob> {
    return this.mutate('cancelPrintJob', async (repos) => {
      const job = await this.load(repos, id, ctx.companyId);
      if (
        job.production_status === PRODUCTION_STATUSES.COMPLETED ||
        job.production_status === PRODUCTION_STATUSES.CANCELLED
      ) {
        throw new ValidationError(`Cannot cancel a ${job.production_status} job`, {
          production_status: job.production_status,
        });
      }
      return repos.printJobs.update(
        job.id,
        job.version,
        applyJobStatus(job, PRODUCTION_STATUSES.CANCELLED, ctx.clock.now(), reason ? `Cancelled: ${reason}` : 'Cancelled')
      );
    });
  }

  // ────────────────────────────────────────────────────────────
  // Helpers
  // ────────────────────────────────────────────────────────────

  private async load(repos: Repositories, id: string, companyId: string): Promise<PrintJob> {
    const job = await repos.printJobs.findById(id, companyId);
    if (!job) throw new NotFoundError('Print job not found');
    return job;
  }

  private async createTemplateStages(repos: Repositories, job: PrintJob): Promise<ProductionStage[]> {
    const created: ProductionStage[] = [];
    let order = await repos.stages.maxOrder(job.id);
    for (const template of stageTemplateFor(job.job_type)) {
      order += 1;
      created.push(
        await repos.stages.create({
          print_job_id: job.id,
          stage_name: template.name,
          stage_order: order,
          stage_status: STAGE_STATUSES.PENDING,
          started_at: null,
          completed_at: null,
          actual_duration: null,
          estimated_duration: template.estimated_duration,
          requires_customer_approval: template.requires_approval,
          customer_approved_at: null,
          approved_by: null,
          approval_status: null,
          rejection_reason: null,
          notes: null,
          stage_data: {},
          updated_by: null,
        })
      );
    }
    return created;
  }
}
