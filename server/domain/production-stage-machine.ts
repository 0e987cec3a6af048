// =============================================================
// File: server/domain/production-stage-machine.ts
// Module: Production
// Description: Per-stage state machine. Transitions are pure: they
//              return the next stage snapshot or a tagged failure and
//              leave persistence (and version bumps) to the caller.
// =============================================================

import type { ProductionStage, SpecificationMap, StageEvent, StageStatus } from '../../shared/types';
import { STAGE_EVENTS, STAGE_STATUSES } from '../../shared/constants';
import { InvalidTransitionError } from '../lib/errors';
import { appendNote, formatTimestamp } from '../lib/context';

export interface TransitionOptions {
  actorId: string;
  now: Date;
  notes?: string | null;
  stageData?: SpecificationMap;
}

export type StageResult =
  | { ok: true; stage: ProductionStage; from: StageStatus; event: StageEvent; triggersProgress: boolean }
  | { ok: false; error: InvalidTransitionError };

interface TransitionRule {
  from: readonly StageStatus[];
  verb: string;
  apply: (stage: ProductionStage, options: TransitionOptions) => Partial<ProductionStage>;
}

const { PENDING, IN_PROGRESS, COMPLETED, ON_HOLD, REQUIRES_APPROVAL, REJECTED, SKIPPED } = STAGE_STATUSES;

export const TERMINAL_STAGE_STATUSES: readonly StageStatus[] = [COMPLETED, REJECTED, SKIPPED];

function minutesBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 60000));
}

function completion(stage: ProductionStage, options: TransitionOptions): Partial<ProductionStage> {
  return {
    stage_status: COMPLETED,
    completed_at: options.now,
    actual_duration: stage.started_at ? minutesBetween(stage.started_at, options.now) : null,
    stage_data: options.stageData ? { ...stage.stage_data, ...options.stageData } : stage.stage_data,
  };
}

const TRANSITIONS: Record<StageEvent, TransitionRule> = {
  [STAGE_EVENTS.START]: {
    from: [PENDING],
    verb: 'Started',
    apply: (_stage, { now }) => ({ stage_status: IN_PROGRESS, started_at: now }),
  },
  [STAGE_EVENTS.COMPLETE]: {
    from: [IN_PROGRESS, REQUIRES_APPROVAL],
    verb: 'Completed',
    apply: completion,
  },
  [STAGE_EVENTS.PUT_ON_HOLD]: {
    from: [PENDING, IN_PROGRESS],
    verb: 'Put on hold',
    apply: () => ({ stage_status: ON_HOLD }),
  },
  [STAGE_EVENTS.RESUME]: {
    from: [ON_HOLD],
    verb: 'Resumed',
    apply: (stage) => ({ stage_status: stage.started_at ? IN_PROGRESS : PENDING }),
  },
  [STAGE_EVENTS.REJECT]: {
    from: [IN_PROGRESS, REQUIRES_APPROVAL],
    verb: 'Rejected',
    apply: (_stage, { notes }) => ({ stage_status: REJECTED, rejection_reason: notes ?? null }),
  },
  [STAGE_EVENTS.REQUIRE_APPROVAL]: {
    from: [IN_PROGRESS],
    verb: 'Requires approval',
    apply: () => ({ stage_status: REQUIRES_APPROVAL }),
  },
  [STAGE_EVENTS.APPROVE]: {
    from: [REQUIRES_APPROVAL],
    verb: 'Approved',
    apply: (stage, { actorId, now }) => ({
      stage_status: COMPLETED,
      completed_at: now,
      approved_by: actorId,
      approval_status: 'approved',
      customer_approved_at: stage.requires_customer_approval ? now : stage.customer_approved_at,
    }),
  },
  [STAGE_EVENTS.SKIP]: {
    from: [PENDING, ON_HOLD],
    verb: 'Skipped',
    apply: () => ({ stage_status: SKIPPED }),
  },
};

const ALL_EVENTS: readonly StageEvent[] = Object.values(STAGE_EVENTS);

export function canTransition(status: StageStatus, event: StageEvent): boolean {
  return TRANSITIONS[event].from.includes(status);
}

/** Events accepted from `status`, in declaration order. Empty for terminal states. */
export function availableEvents(status: StageStatus): StageEvent[] {
  return ALL_EVENTS.filter((event) => canTransition(status, event));
}

export function isTerminal(status: StageStatus): boolean {
  return TERMINAL_STAGE_STATUSES.includes(status);
}

export function isStageEvent(value: string): value is StageEvent {
  return ALL_EVENTS.some((event) => event === value);
}

export function transition(stage: ProductionStage, event: StageEvent, options: TransitionOptions): StageResult {
  const rule = TRANSITIONS[event];
  if (!rule.from.includes(stage.stage_status)) {
    return { ok: false, error: new InvalidTransitionError(stage.stage_status, event) };
  }

  const noteLine = options.notes
    ? `${formatTimestamp(options.now)}: ${rule.verb} - ${options.notes}`
    : `${formatTimestamp(options.now)}: ${rule.verb}`;

  const next: ProductionStage = {
    ...stage,
    ...rule.apply(stage, options),
    notes: appendNote(stage.notes, noteLine),
    updated_by: options.actorId,
    updated_at: options.now,
  };

  return {
    ok: true,
    stage: next,
    from: stage.stage_status,
    event,
    triggersProgress: event === STAGE_EVENTS.COMPLETE || event === STAGE_EVENTS.APPROVE,
  };
}
