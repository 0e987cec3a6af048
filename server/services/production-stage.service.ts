// =============================================================
// File: server/services/production-stage.service.ts
// Module: Production
// Description: Applies state machine events to stored stages with
//              optimistic locking; complete / approve roll progress
//              up into the owning job in the same transaction.
// =============================================================

import type { PrintJob, ProductionStage, SpecificationMap, StageEvent } from '../../shared/types';
import { STAGE_STATUSES } from '../../shared/constants';
import type { OperationContext } from '../lib/context';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { availableEvents, transition } from '../domain/production-stage-machine';
import type { ProgressOutcome } from '../domain/print-job-progress';
import type { Repositories } from '../repositories/types';
import { BaseService } from './base.service';
import { recomputeJobProgressWithin } from './print-job.service';

const log = moduleLogger('production-stage');

export interface TransitionInput {
  notes?: string | null;
  stage_data?: SpecificationMap;
}

export interface AddStageInput {
  stage_name: string;
  stage_order?: number;
  estimated_duration?: number | null;
  requires_customer_approval?: boolean;
}

export type StageTransitionResult =
  | {
      ok: true;
      stage: ProductionStage;
      job: PrintJob;
      progress: ProgressOutcome | null;
      available_events: StageEvent[];
    }
  | { ok: false; error: InvalidTransitionError };

export interface PendingApprovals {
  customer_approvals: ProductionStage[];
  internal_approvals: ProductionStage[];
}

export class ProductionStageService extends BaseService {
  /**
   * Invalid state/event pairs come back as `{ ok: false }` with nothing
   * written; lost version races are retried.
   */
  async transitionStage(
    ctx: OperationContext,
    stageId: string,
    event: StageEvent,
    input: TransitionInput = {}
  ): Promise<StageTransitionResult> {
    return this.mutate<StageTransitionResult>('transitionStage', async (repos) => {
      const stage = await this.loadStage(repos, stageId);
      const job = await this.loadJob(repos, stage.print_job_id, ctx.companyId);
      const now = ctx.clock.now();

      const result = transition(stage, event, {
        actorId: ctx.actorId,
        now,
        notes: input.notes,
        stageData: input.stage_data,
      });
      if (!result.ok) {
        log.debug({ stageId, event, from: stage.stage_status }, 'Rejected stage transition');
        return result;
      }

      const next = result.stage;
      const saved = await repos.stages.update(stage.id, stage.version, {
        stage_status: next.stage_status,
        started_at: next.started_at,
        completed_at: next.completed_at,
        actual_duration: next.actual_duration,
        customer_approved_at: next.customer_approved_at,
        approved_by: next.approved_by,
        approval_status: next.approval_status,
        rejection_reason: next.rejection_reason,
        notes: next.notes,
        stage_data: next.stage_data,
        updated_by: next.updated_by,
      });

      let progress: ProgressOutcome | null = null;
      let updatedJob = job;
      if (result.triggersProgress) {
        const recomputed = await recomputeJobProgressWithin(repos, job, now);
        progress = recomputed.progress;
        updatedJob = recomputed.job;
      }

      log.info(
        { stageId, printJobId: job.id, event, from: result.from, to: saved.stage_status, actorId: ctx.actorId },
        'Stage transitioned'
      );
      return {
        ok: true,
        stage: saved,
        job: updatedJob,
        progress,
        available_events: availableEvents(saved.stage_status),
      };
    });
  }

  async addStage(ctx: OperationContext, printJobId: string, input: AddStageInput): Promise<ProductionStage> {
    if (!input.stage_name.trim()) {
      throw new ValidationError('stage_name is required', { constraint: 'stage_name' });
    }

    return this.mutate('addStage', async (repos) => {
      // Job row lock serializes stage inserts so two appends cannot read the same max order
      const job = await repos.printJobs.lockById(printJobId, ctx.companyId);
      if (!job) throw new NotFoundError('Print job not found');

      let order: number;
      if (input.stage_order && input.stage_order > 0) {
        order = input.stage_order;
        const existing = await repos.stages.listByJob(job.id);
        if (existing.some((s) => s.stage_order === order)) {
          throw new ValidationError(`Stage order ${order} is already taken`, {
            constraint: 'stage_order',
            stage_order: order,
          });
        }
      } else {
        order = (await repos.stages.maxOrder(job.id)) + 1;
      }

      return repos.stages.create({
        print_job_id: job.id,
        stage_name: input.stage_name,
        stage_order: order,
        stage_status: STAGE_STATUSES.PENDING,
        started_at: null,
        completed_at: null,
        actual_duration: null,
        estimated_duration: input.estimated_duration ?? null,
        requires_customer_approval: input.requires_customer_approval ?? false,
        customer_approved_at: null,
        approved_by: null,
        approval_status: null,
        rejection_reason: null,
        notes: null,
        stage_data: {},
        updated_by: ctx.actorId,
      });
    });
  }

  async getStage(companyId: string, stageId: string) {
    return this.read(async (repos) => {
      const stage = await this.loadStage(repos, stageId);
      await this.loadJob(repos, stage.print_job_id, companyId);
      return { stage, available_events: availableEvents(stage.stage_status) };
    });
  }

  async nextStage(companyId: string, stageId: string): Promise<ProductionStage | null> {
    return this.neighbour(companyId, stageId, 'next');
  }

  async previousStage(companyId: string, stageId: string): Promise<ProductionStage | null> {
    return this.neighbour(companyId, stageId, 'previous');
  }

  async pendingApprovals(companyId: string): Promise<PendingApprovals> {
    const stages = await this.read((repos) => repos.stages.listAwaitingApproval(companyId));
    return {
      customer_approvals: stages.filter((s) => s.requires_customer_approval),
      internal_approvals: stages.filter((s) => !s.requires_customer_approval),
    };
  }

  // ────────────────────────────────────────────────────────────
  // Helpers
  // ────────────────────────────────────────────────────────────

  private async neighbour(
    companyId: string,
    stageId: string,
    direction: 'next' | 'previous'
  ): Promise<ProductionStage | null> {
    return this.read(async (repos) => {
      const stage = await this.loadStage(repos, stageId);
      await this.loadJob(repos, stage.print_job_id, companyId);
      const siblings = await repos.stages.listByJob(stage.print_job_id);

      if (direction === 'next') {
        return siblings.find((s) => s.stage_order > stage.stage_order) ?? null;
      }
      const before = siblings.filter((s) => s.stage_order < stage.stage_order);
      return before.length > 0 ? before[before.length - 1] : null;
    });
  }

  private async loadStage(repos: Repositories, id: string): Promise<ProductionStage> {
    const stage = await repos.stages.findById(id);
    if (!stage) throw new NotFoundError('Production stage not found');
    return stage;
  }

  private async loadJob(repos: Repositories, id: string, companyId: string): Promise<PrintJob> {
    const job = await repos.printJobs.findById(id, companyId);
    if (!job) throw new NotFoundError('Print job not found');
    return job;
  }
}
