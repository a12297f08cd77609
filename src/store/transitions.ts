import { InvalidTransitionError } from '../errors.js';
import {
  type Checkpoint,
  type Job,
  type JobStatus,
  type JobUpdate,
  type PartialResults,
  STAGE_NAMES,
  type StageName,
  isTerminal,
} from '../types/job.js';

export const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Validates `update` against the job state machine and record invariants and
 * returns the next record. The input record is never mutated.
 */
export function applyUpdate(job: Job, update: JobUpdate, now: Date): Job {
  const fail = (detail: string): never => {
    throw new InvalidTransitionError(job.id, detail);
  };

  if (isTerminal(job.status)) {
    fail(`job is already ${job.status}`);
  }

  const nextStatus = update.status ?? job.status;
  if (nextStatus !== job.status && !canTransition(job.status, nextStatus)) {
    fail(`cannot move from ${job.status} to ${nextStatus}`);
  }

  const recordsProgress = update.checkpoint !== undefined || update.partialResults !== undefined;
  if (recordsProgress && job.status !== 'running') {
    fail('progress can only be recorded while running');
  }

  if (update.finalResult !== undefined && nextStatus !== 'completed') {
    fail('a final result can only be set when completing');
  }
  if (update.error !== undefined && nextStatus !== 'failed') {
    fail('an error can only be set when failing');
  }
  if (nextStatus === 'completed' && update.finalResult === undefined) {
    fail('completing requires a final result');
  }
  if (nextStatus === 'failed' && update.error === undefined) {
    fail('failing requires an error');
  }

  const progress = update.checkpoint ? applyCheckpoint(job, update.checkpoint, fail) : job.progress;
  const partialResults = update.partialResults
    ? mergeResults(job.partialResults, update.partialResults, fail)
    : job.partialResults;

  const entersRunning = nextStatus === 'running' && job.status !== 'running';
  const terminal = isTerminal(nextStatus);

  return {
    ...job,
    status: nextStatus,
    message: update.message ?? job.message,
    progress,
    partialResults,
    finalResult: update.finalResult ?? job.finalResult,
    error: update.error ?? job.error,
    startedAt: update.startedAt ?? (entersRunning ? now : job.startedAt),
    finishedAt: update.finishedAt ?? (terminal ? now : job.finishedAt),
    // Never move backwards, even if the clock does
    updatedAt: now.getTime() >= job.updatedAt.getTime() ? now : job.updatedAt,
  };
}

function applyCheckpoint(job: Job, checkpoint: Checkpoint, fail: (detail: string) => never): Checkpoint[] {
  const planIndex = job.plan.indexOf(checkpoint.stageName);
  if (planIndex < 0) {
    fail(`stage ${checkpoint.stageName} is not part of the plan`);
  }

  const last = job.progress[job.progress.length - 1];

  if (last && last.stageName === checkpoint.stageName) {
    if (last.finishedAt !== null) {
      fail(`checkpoint for ${checkpoint.stageName} is already closed`);
    }
    return [...job.progress.slice(0, -1), { ...checkpoint, startedAt: last.startedAt }];
  }

  if (job.progress.some(cp => cp.stageName === checkpoint.stageName)) {
    fail(`checkpoint for ${checkpoint.stageName} was already recorded`);
  }
  if (last && last.finishedAt === null) {
    fail(`checkpoint for ${last.stageName} is still open`);
  }
  if (last && job.plan.indexOf(last.stageName) > planIndex) {
    fail(`stage ${checkpoint.stageName} runs before ${last.stageName}`);
  }

  return [...job.progress, checkpoint];
}

function mergeResults(current: PartialResults, incoming: PartialResults, fail: (detail: string) => never): PartialResults {
  const merged: PartialResults = { ...current };
  for (const name of STAGE_NAMES) {
    if (incoming[name] !== undefined && current[name] !== undefined) {
      fail(`result for stage ${name} is already recorded`);
    }
    copyStageResult(merged, incoming, name);
  }
  return merged;
}

function copyStageResult<K extends StageName>(target: PartialResults, source: PartialResults, name: K): void {
  const output = source[name];
  if (output !== undefined) {
    target[name] = output;
  }
}
