import type {
  Checkpoint,
  CheckpointOutcome,
  FinalResult,
  InputHandle,
  Job,
  JobConfig,
  JobError,
  JobStatus,
  PartialResults,
  StageName,
} from '../types/job.js';

export interface CheckpointView {
  stageName: StageName;
  startedAt: string;
  finishedAt: string | null;
  outcome: CheckpointOutcome | null;
}

export interface ProgressView {
  percent: number;
  completedStages: StageName[];
  currentStage: StageName | null;
  totalStages: number;
  checkpoints: CheckpointView[];
}

/** Client-facing view of a job. Dates are ISO strings. */
export interface JobProjection {
  id: string;
  status: JobStatus;
  message: string;
  input: InputHandle;
  config: JobConfig;
  progress: ProgressView;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  processingTimeSeconds: number | null;
  partialResults?: PartialResults;
  result?: FinalResult;
  error?: JobError;
}

export interface JobSummary {
  id: string;
  status: JobStatus;
  message: string;
  filename: string | null;
  percent: number;
  createdAt: string;
  updatedAt: string;
  error?: JobError;
}

export interface ProjectionOptions {
  includePartialResults?: boolean;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function viewCheckpoint(checkpoint: Checkpoint): CheckpointView {
  return {
    stageName: checkpoint.stageName,
    startedAt: checkpoint.startedAt.toISOString(),
    finishedAt: iso(checkpoint.finishedAt),
    outcome: checkpoint.outcome,
  };
}

function progressPercent(job: Readonly<Job>): number {
  if (job.status === 'completed') return 100;
  if (job.plan.length === 0) return 0;
  const done = job.progress.filter(cp => cp.outcome === 'succeeded' || cp.outcome === 'skipped').length;
  return Math.round((done / job.plan.length) * 100);
}

function processingTime(job: Readonly<Job>): number | null {
  if (!job.startedAt || !job.finishedAt) return null;
  return Math.round(job.finishedAt.getTime() - job.startedAt.getTime()) / 1000;
}

export function projectProgress(job: Readonly<Job>): ProgressView {
  const open = job.progress.find(cp => cp.finishedAt === null);
  return {
    percent: progressPercent(job),
    completedStages: job.progress.filter(cp => cp.outcome === 'succeeded').map(cp => cp.stageName),
    currentStage: job.status === 'running' && open ? open.stageName : null,
    totalStages: job.plan.length,
    checkpoints: job.progress.map(viewCheckpoint),
  };
}

/**
 * Pure view of a job record. The result appears only on completed jobs and
 * the error only on failed ones; partial results are opt-in.
 */
export function projectJob(job: Readonly<Job>, options: ProjectionOptions = {}): JobProjection {
  const view: JobProjection = {
    id: job.id,
    status: job.status,
    message: job.message,
    input: { ...job.input },
    config: structuredClone(job.config),
    progress: projectProgress(job),
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    startedAt: iso(job.startedAt),
    finishedAt: iso(job.finishedAt),
    processingTimeSeconds: processingTime(job),
  };

  if (options.includePartialResults) {
    view.partialResults = structuredClone(job.partialResults);
  }
  if (job.status === 'completed' && job.finalResult) {
    view.result = structuredClone(job.finalResult);
  }
  if (job.status === 'failed' && job.error) {
    view.error = { ...job.error };
  }

  return view;
}

export function summarizeJob(job: Readonly<Job>): JobSummary {
  const summary: JobSummary = {
    id: job.id,
    status: job.status,
    message: job.message,
    filename: job.input.filename ?? null,
    percent: progressPercent(job),
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
  if (job.status === 'failed' && job.error) {
    summary.error = { ...job.error };
  }
  return summary;
}
