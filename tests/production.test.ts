import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ProductionStage, StageEvent } from '../shared/types';
import { ConcurrencyConflictError } from '../server/lib/errors';
import { stageTemplateFor } from '../server/services/print-job.service';
import { createTestEnvironment, TestEnv } from './helpers/factory';
import { assertProgressMatchesStages, expectAppError } from './helpers/assertions';

let env: TestEnv;

beforeEach(() => {
  env = createTestEnvironment();
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function transitionOk(stageId: string, event: StageEvent, notes?: string) {
  const result = await env.services.stages.transitionStage(env.ctx, stageId, event, { notes });
  if (!result.ok) throw result.error;
  return result;
}

async function newJob(jobType = 'business_cards') {
  return env.services.printJobs.createPrintJob(env.ctx, { job_type: jobType, quantity: 500 });
}

// ── Creation ───────────────────────────────────────────────────────

describe('createPrintJob', () => {
  it('numbers jobs per branch and day', async () => {
    const first = await newJob();
    const second = await newJob();
    expect(first.job.job_number).toBe('MAIN-20250615-001');
    expect(second.job.job_number).toBe('MAIN-20250615-002');

    env.clock.set('2025-06-16T08:00:00.000Z');
    const nextDay = await newJob();
    expect(nextDay.job.job_number).toBe('MAIN-20250616-001');
  });

  it('creates the template stages for the job type', async () => {
    const detail = await newJob();
    expect(detail.stages.map((s) => s.stage_name)).toEqual([
      'design_review',
      'customer_approval',
      'pre_press_setup',
      'printing_process',
      'cutting',
      'quality_inspection',
      'packaging',
    ]);
    expect(detail.stages.map((s) => s.stage_order)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(detail.stages[1].requires_customer_approval).toBe(true);
    expect(detail.job).toMatchObject({
      production_status: 'pending',
      priority: 'normal',
      quantity: 500,
      completion_percentage: 0,
      started_at: null,
    });
    expect(detail.total_stages).toBe(7);
  });

  it('uses the default template for unknown job types', async () => {
    const detail = await newJob('stickers');
    expect(detail.stages.map((s) => s.stage_name)).toEqual(stageTemplateFor('default').map((t) => t.name));
    expect(detail.stages[4].stage_name).toBe('finishing');
  });

  it('can skip stage creation', async () => {
    const detail = await env.services.printJobs.createPrintJob(env.ctx, { job_type: 'flyers', create_stages: false });
    expect(detail.stages).toEqual([]);
    expect(detail.job.quantity).toBe(1);
  });

  it('validates the quantity and the linked invoice', async () => {
    await expectAppError(
      env.services.printJobs.createPrintJob(env.ctx, { job_type: 'flyers', quantity: 0 }),
      'VALIDATION_ERROR'
    );
    await expectAppError(
      env.services.printJobs.createPrintJob(env.ctx, { job_type: 'flyers', invoice_id: 'missing' }),
      'NOT_FOUND'
    );
    expect(env.store.tables.printJobs).toHaveLength(0);

    const { invoice } = await env.services.invoices.createInvoice(env.ctx, { customer_id: 'customer-1' });
    const detail = await env.services.printJobs.createPrintJob(env.ctx, { job_type: 'flyers', invoice_id: invoice.id });
    expect(detail.job.invoice_id).toBe(invoice.id);
  });
});

// ── Production run ─────────────────────────────────────────────────

describe('startProduction', () => {
  it('moves the job to design review and starts the first stage', async () => {
    const { job } = await newJob();
    const started = await env.services.printJobs.startProduction(env.ctx, job.id);

    expect(started.job.production_status).toBe('design_review');
    expect(started.job.started_at).toEqual(new Date('2025-06-15T09:00:00.000Z'));
    expect(started.job.production_notes).toBe('2025-06-15 09:00:00: Production started by user-1');
    expect(started.stages[0].stage_status).toBe('in_progress');
    expect(started.stages[0].notes).toBe('2025-06-15 09:00:00: Started');
    expect(started.stages.slice(1).every((s) => s.stage_status === 'pending')).toBe(true);
  });

  it('creates stages for a job that has none', async () => {
    const { job } = await env.services.printJobs.createPrintJob(env.ctx, { job_type: 'banners', create_stages: false });
    const started = await env.services.printJobs.startProduction(env.ctx, job.id);
    expect(started.stages).toHaveLength(7);
    expect(started.stages[2].stage_name).toBe('material_preparation');
    expect(started.stages[0].stage_status).toBe('in_progress');
  });

  it('only starts pending jobs', async () => {
    const { job } = await newJob();
    await env.services.printJobs.startProduction(env.ctx, job.id);
    const error = await expectAppError(env.services.printJobs.startProduction(env.ctx, job.id), 'VALIDATION_ERROR');
    expect(error.message).toBe('Production can only be started for pending jobs');
  });
});

describe('stage transitions', () => {
  it('rolls a completed stage up into the job', async () => {
    const { job } = await newJob();
    const started = await env.services.printJobs.startProduction(env.ctx, job.id);
    env.clock.advanceMinutes(30);

    const result = await transitionOk(started.stages[0].id, 'complete');
    expect(result.stage.actual_duration).toBe(30);
    expect(result.stage.version).toBe(3);
    expect(result.progress).toMatchObject({ completed_stages: 1, total_stages: 7, completion_percentage: 14 });
    expect(result.job.completion_percentage).toBe(14);
    expect(result.job.production_status).toBe('design_review');
    expect(result.available_events).toEqual([]);
  });

  it('returns a failure and writes nothing for an invalid event', async () => {
    const { stages } = await newJob();
    const result = await env.services.stages.transitionStage(env.ctx, stages[0].id, 'complete');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Cannot complete a stage in pending status');
    }

    const { stage } = await env.services.stages.getStage(env.company.id, stages[0].id);
    expect(stage.stage_status).toBe('pending');
    expect(stage.version).toBe(1);
    expect(stage.notes).toBeNull();
  });

  it('starts a pending job when its first stage completes without startProduction', async () => {
    const { job, stages } = await newJob();
    await transitionOk(stages[0].id, 'start');
    const result = await transitionOk(stages[0].id, 'complete');
    expect(result.job.production_status).toBe('design_review');
    expect(result.job.started_at).toEqual(new Date('2025-06-15T09:00:00.000Z'));
    expect(result.progress?.status_changed).toBe(true);

    const reloaded = await env.services.printJobs.getPrintJob(env.company.id, job.id);
    expect(reloaded.job.version).toBe(2);
  });

  it('keeps job progress equal to the completed share after every step', async () => {
    const { job } = await newJob();
    await env.services.printJobs.startProduction(env.ctx, job.id);

    let detail = await env.services.printJobs.getPrintJob(env.company.id, job.id);
    for (const stage of detail.stages) {
      if (stage.stage_status === 'pending') await transitionOk(stage.id, 'start');
      if (stage.requires_customer_approval) {
        await transitionOk(stage.id, 'requireApproval');
        await transitionOk(stage.id, 'approve', 'Customer signed the proof');
      } else {
        await transitionOk(stage.id, 'complete');
      }
      detail = await env.services.printJobs.getPrintJob(env.company.id, job.id);
      assertProgressMatchesStages(detail.job, detail.stages);
    }

    expect(detail.job.production_status).toBe('completed');
    expect(detail.job.completion_percentage).toBe(100);
    expect(detail.job.actual_completion).toEqual(new Date('2025-06-15T09:00:00.000Z'));
    expect(detail.stages[1]).toMatchObject({ approved_by: 'user-1', approval_status: 'approved' });
  });

  it('never completes a job with a skipped stage', async () => {
    const { job } = await newJob();
    const started = await env.services.printJobs.startProduction(env.ctx, job.id);

    const skip = await transitionOk(started.stages[1].id, 'skip');
    expect(skip.progress).toBeNull();

    await transitionOk(started.stages[0].id, 'complete');
    for (const stage of started.stages.slice(2)) {
      await transitionOk(stage.id, 'start');
      await transitionOk(stage.id, 'complete');
    }

    const detail = await env.services.printJobs.getPrintJob(env.company.id, job.id);
    expect(detail.job.completion_percentage).toBe(85);
    expect(detail.job.production_status).toBe('design_review');
  });

  it('retries a transition that lost a version race', async () => {
    const { stages } = await newJob();
    const update = vi
      .spyOn(env.store.repos.stages, 'update')
      .mockRejectedValueOnce(new ConcurrencyConflictError('Production stage', stages[0].id));

    const result = await transitionOk(stages[0].id, 'start');
    expect(result.stage.stage_status).toBe('in_progress');
    expect(update).toHaveBeenCalledTimes(2);
    expect(result.stage.notes).toBe('2025-06-15 09:00:00: Started');
  });

  it('hides stages of other companies', async () => {
    const { stages } = await newJob();
    const stranger = { ...env.ctx, companyId: 'other-company' };
    await expectAppError(env.services.stages.transitionStage(stranger, stages[0].id, 'start'), 'NOT_FOUND');
  });
});

describe('stage maintenance and queries', () => {
  it('appends stages after the last one unless an order is given', async () => {
    const { job } = await newJob();
    const appended = await env.services.stages.addStage(env.ctx, job.id, { stage_name: 'lamination' });
    expect(appended.stage_order).toBe(8);
    expect(appended.stage_status).toBe('pending');

    const placed = await env.services.stages.addStage(env.ctx, job.id, { stage_name: 'delivery', stage_order: 20 });
    expect(placed.stage_order).toBe(20);

    await expectAppError(env.services.stages.addStage(env.ctx, job.id, { stage_name: '  ' }), 'VALIDATION_ERROR');
  });

  it('refuses a stage order that is already taken', async () => {
    const { job, stages } = await newJob();
    const error = await expectAppError(
      env.services.stages.addStage(env.ctx, job.id, { stage_name: 'lamination', stage_order: stages[0].stage_order }),
      'VALIDATION_ERROR',
      400
    );
    expect(error.message).toBe('Stage order 1 is already taken');
    expect(error.details).toEqual({ constraint: 'stage_order', stage_order: 1 });
    expect(env.store.tables.stages.filter((s) => s.print_job_id === job.id)).toHaveLength(7);
  });

  it('gives concurrent appends distinct orders', async () => {
    const { job } = await newJob();
    const added = await Promise.all(
      ['lamination', 'foiling', 'delivery'].map((stage_name) => env.services.stages.addStage(env.ctx, job.id, { stage_name }))
    );
    expect(added.map((s) => s.stage_order).sort((a, b) => a - b)).toEqual([8, 9, 10]);
  });

  it("does not add stages to another company's job", async () => {
    const { job } = await newJob();
    const stranger = { ...env.ctx, companyId: 'other-company' };
    await expectAppError(env.services.stages.addStage(stranger, job.id, { stage_name: 'lamination' }), 'NOT_FOUND', 404);
  });

  it('finds neighbouring stages by order', async () => {
    const { stages } = await newJob();
    expect((await env.services.stages.nextStage(env.company.id, stages[0].id))?.id).toBe(stages[1].id);
    expect(await env.services.stages.previousStage(env.company.id, stages[0].id)).toBeNull();
    expect((await env.services.stages.previousStage(env.company.id, stages[2].id))?.id).toBe(stages[1].id);
    expect(await env.services.stages.nextStage(env.company.id, stages[6].id)).toBeNull();
  });

  it('splits pending approvals into customer and internal queues', async () => {
    const { job, stages } = await newJob();
    const customerStage: ProductionStage = stages[1];
    await transitionOk(customerStage.id, 'start');
    await transitionOk(customerStage.id, 'requireApproval');

    const internal = await env.services.stages.addStage(env.ctx, job.id, { stage_name: 'proof_check' });
    await transitionOk(internal.id, 'start');
    await transitionOk(internal.id, 'requireApproval');

    const approvals = await env.services.stages.pendingApprovals(env.company.id);
    expect(approvals.customer_approvals.map((s) => s.id)).toEqual([customerStage.id]);
    expect(approvals.internal_approvals.map((s) => s.id)).toEqual([internal.id]);
    expect(await env.services.stages.pendingApprovals('other-company')).toEqual({
      customer_approvals: [],
      internal_approvals: [],
    });
  });

  it('lists the events a stage accepts', async () => {
    const { stages } = await newJob();
    const detail = await env.services.stages.getStage(env.company.id, stages[0].id);
    expect(detail.available_events).toEqual(['start', 'putOnHold', 'skip']);
  });
});

// ── Manual job changes ─────────────────────────────────────────────

describe('manual job changes', () => {
  it('overrides progress without changing status', async () => {
    const { job } = await newJob();
    const updated = await env.services.printJobs.updateProgress(env.ctx, job.id, 150, 'manual');
    expect(updated.completion_percentage).toBe(100);
    expect(updated.production_status).toBe('pending');
    expect(updated.production_notes).toBe('2025-06-15 09:00:00: Progress updated to 100%. manual');
  });

  it('does not write when a recompute changes nothing', async () => {
    const { job } = await newJob();
    const progress = await env.services.printJobs.recomputeJobProgress(env.ctx, job.id);
    expect(progress.completion_percentage).toBe(0);
    expect(progress.status_changed).toBe(false);
    const reloaded = await env.services.printJobs.getPrintJob(env.company.id, job.id);
    expect(reloaded.job.version).toBe(1);
  });

  it('restores stage-derived progress after a manual override', async () => {
    const { job } = await newJob();
    await env.services.printJobs.updateProgress(env.ctx, job.id, 80);
    const progress = await env.services.printJobs.recomputeJobProgress(env.ctx, job.id);
    expect(progress.completion_percentage).toBe(0);
    const reloaded = await env.services.printJobs.getPrintJob(env.company.id, job.id);
    expect(reloaded.job.completion_percentage).toBe(0);
  });

  it('stamps completion when a job is marked completed', async () => {
    const { job } = await newJob();
    const updated = await env.services.printJobs.updateJobStatus(env.ctx, job.id, 'completed', 'Delivered early');
    expect(updated.production_status).toBe('completed');
    expect(updated.completion_percentage).toBe(100);
    expect(updated.actual_completion).toEqual(new Date('2025-06-15T09:00:00.000Z'));
    expect(updated.production_notes).toBe('2025-06-15 09:00:00: Delivered early');
  });

  it('cancels once and then refuses further changes', async () => {
    const { job } = await newJob();
    const cancelled = await env.services.printJobs.cancel(env.ctx, job.id, 'Customer withdrew');
    expect(cancelled.production_status).toBe('cancelled');
    expect(cancelled.production_notes).toBe('2025-06-15 09:00:00: Cancelled: Customer withdrew');

    const again = await expectAppError(env.services.printJobs.cancel(env.ctx, job.id), 'VALIDATION_ERROR');
    expect(again.message).toBe('Cannot cancel a cancelled job');
    await expectAppError(env.services.printJobs.updateJobStatus(env.ctx, job.id, 'printing'), 'VALIDATION_ERROR');
  });
});
