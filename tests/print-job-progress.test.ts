import { describe, it, expect } from 'vitest';
import type { StageStatus } from '../shared/types';
import { applyJobStatus, clampPercentage, countStages, deriveJobProgress } from '../server/domain/print-job-progress';

const NOW = new Date('2025-06-15T09:00:00.000Z');
const EARLIER = new Date('2025-06-14T10:00:00.000Z');

function stages(...statuses: StageStatus[]) {
  return statuses.map((stage_status) => ({ stage_status }));
}

const pendingJob = {
  production_status: 'pending' as const,
  completion_percentage: 0,
  started_at: null,
  actual_completion: null,
  production_notes: null,
};

describe('countStages', () => {
  it('floors the percentage', () => {
    expect(countStages(stages('completed', 'pending', 'pending'))).toEqual({
      completed_stages: 1,
      total_stages: 3,
      completion_percentage: 33,
    });
  });

  it('counts skipped stages as not completed', () => {
    expect(countStages(stages('completed', 'skipped')).completion_percentage).toBe(50);
  });

  it('reports zero for a job without stages', () => {
    expect(countStages([])).toEqual({ completed_stages: 0, total_stages: 0, completion_percentage: 0 });
  });
});

describe('deriveJobProgress', () => {
  it('moves a pending job with half its stages done into design review', () => {
    const progress = deriveJobProgress(pendingJob, stages('completed', 'completed', 'in_progress', 'pending'), NOW);
    expect(progress.completion_percentage).toBe(50);
    expect(progress.production_status).toBe('design_review');
    expect(progress.status_changed).toBe(true);
    expect(progress.patch).toEqual({ completion_percentage: 50, production_status: 'design_review', started_at: NOW });
  });

  it('leaves a job already past design review in its status', () => {
    const job = { ...pendingJob, production_status: 'printing' as const, started_at: EARLIER };
    const progress = deriveJobProgress(job, stages('completed', 'pending'), NOW);
    expect(progress.production_status).toBe('printing');
    expect(progress.status_changed).toBe(false);
    expect(progress.patch).toEqual({ completion_percentage: 50 });
  });

  it('completes the job when every stage is completed', () => {
    const job = { ...pendingJob, production_status: 'quality_check' as const, started_at: EARLIER };
    const progress = deriveJobProgress(job, stages('completed', 'completed'), NOW);
    expect(progress.patch).toEqual({ completion_percentage: 100, production_status: 'completed', actual_completion: NOW });
    expect(progress.status_changed).toBe(true);
  });

  it('keeps the original completion time on a repeated recompute', () => {
    const job = {
      ...pendingJob,
      production_status: 'completed' as const,
      completion_percentage: 100,
      started_at: EARLIER,
      actual_completion: EARLIER,
    };
    const progress = deriveJobProgress(job, stages('completed'), NOW);
    expect(progress.patch.actual_completion).toEqual(EARLIER);
    expect(progress.status_changed).toBe(false);
  });

  it('does not start a job with no completed stages', () => {
    const progress = deriveJobProgress(pendingJob, stages('in_progress', 'pending'), NOW);
    expect(progress.production_status).toBe('pending');
    expect(progress.patch).toEqual({ completion_percentage: 0 });
  });
});

describe('applyJobStatus', () => {
  it('stamps started_at once', () => {
    expect(applyJobStatus(pendingJob, 'pre_press', NOW)).toEqual({ production_status: 'pre_press', started_at: NOW });
    expect(applyJobStatus({ ...pendingJob, started_at: EARLIER }, 'printing', NOW)).toEqual({
      production_status: 'printing',
    });
  });

  it('appends a timestamped note', () => {
    const patch = applyJobStatus({ ...pendingJob, production_notes: 'Rush order' }, 'on_hold', NOW, 'Waiting for paper');
    expect(patch.production_notes).toBe('Rush order\n2025-06-15 09:00:00: Waiting for paper');
  });
});

describe('clampPercentage', () => {
  it.each([
    [150, 100],
    [-5, 0],
    [42.6, 43],
    [Number.NaN, 0],
  ])('%s → %s', (input, expected) => {
    expect(clampPercentage(input)).toBe(expected);
  });
});
