// =============================================================
// File: server/domain/print-job-progress.ts
// Module: Production
// Description: Rolls stage completion up into the job's percentage
//              and production status, plus manual status / progress
//              changes with their timestamp side effects.
// =============================================================

import type { PrintJob, ProductionStage, ProductionStatus } from '../../shared/types';
import { PRODUCTION_STATUSES, STAGE_STATUSES } from '../../shared/constants';
import { appendNote, formatTimestamp } from '../lib/context';

export interface StageCounts {
  completed_stages: number;
  total_stages: number;
  completion_percentage: number;
}

export type JobPatch = Partial<
  Pick<PrintJob, 'production_status' | 'completion_percentage' | 'started_at' | 'actual_completion' | 'production_notes'>
>;

export interface ProgressOutcome extends StageCounts {
  production_status: ProductionStatus;
  patch: JobPatch;
  status_changed: boolean;
}

type JobState = Pick<
  PrintJob,
  'production_status' | 'completion_percentage' | 'started_at' | 'actual_completion' | 'production_notes'
>;

const STARTED_STATUSES: readonly ProductionStatus[] = [
  PRODUCTION_STATUSES.DESIGN_REVIEW,
  PRODUCTION_STATUSES.PRE_PRESS,
  PRODUCTION_STATUSES.PRINTING,
];

export function countStages(stages: readonly Pick<ProductionStage, 'stage_status'>[]): StageCounts {
  const total = stages.length;
  const completed = stages.filter((s) => s.stage_status === STAGE_STATUSES.COMPLETED).length;
  return {
    completed_stages: completed,
    total_stages: total,
    completion_percentage: total > 0 ? Math.floor((100 * completed) / total) : 0,
  };
}

/**
 * Status change with its side effects: design_review / pre_press / printing
 * stamp `started_at` once, completed stamps `actual_completion` and pins the
 * percentage at 100. A note line is appended when `notes` is given.
 */
export function applyJobStatus(job: JobState, status: ProductionStatus, now: Date, notes?: string | null): JobPatch {
  const patch: JobPatch = { production_status: status };

  if (STARTED_STATUSES.includes(status) && !job.started_at) {
    patch.started_at = now;
  }
  if (status === PRODUCTION_STATUSES.COMPLETED) {
    patch.actual_completion = job.production_status === PRODUCTION_STATUSES.COMPLETED && job.actual_completion
      ? job.actual_completion
      : now;
    patch.completion_percentage = 100;
  }
  if (notes) {
    patch.production_notes = appendNote(job.production_notes, `${formatTimestamp(now)}: ${notes}`);
  }
  return patch;
}

/** Recompute from stages. Re-running with unchanged stages yields an identical job. */
export function deriveJobProgress(
  job: JobState,
  stages: readonly Pick<ProductionStage, 'stage_status'>[],
  now: Date
): ProgressOutcome {
  const counts = countStages(stages);
  let patch: JobPatch = { completion_percentage: counts.completion_percentage };

  if (counts.completion_percentage === 100) {
    patch = { ...patch, ...applyJobStatus(job, PRODUCTION_STATUSES.COMPLETED, now) };
  } else if (counts.completion_percentage > 0 && job.production_status === PRODUCTION_STATUSES.PENDING) {
    patch = { ...patch, ...applyJobStatus(job, PRODUCTION_STATUSES.DESIGN_REVIEW, now) };
  }

  const status = patch.production_status ?? job.production_status;
  return {
    ...counts,
    production_status: status,
    patch,
    status_changed: status !== job.production_status,
  };
}

export function clampPercentage(percentage: number): number {
  if (!Number.isFinite(percentage)) return 0;
  return Math.min(100, Math.max(0, Math.round(percentage)));
}
