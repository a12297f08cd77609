import type { Logger } from 'pino';
import {
  AppError,
  InvalidTransitionError,
  JobAlreadyRunningError,
  JobConflictError,
  JobNotFoundError,
  errorMessage,
} from '../errors.js';
import { fmt } from '../lib/error-messages.js';
import { assembleResult } from '../pipeline/assemble.js';
import { type PipelineOutcome, PipelineRunner, type RunHooks } from '../pipeline/runner.js';
import type { JobStore } from '../store/base.js';
import {
  type InputHandle,
  type Job,
  type JobConfig,
  type JobUpdate,
  type StageName,
  isTerminal,
} from '../types/job.js';

export interface SchedulerConfig {
  maxConcurrentRuns: number;
  jobMaxRunMs: number;
  /** How long stop() waits for aborted runs to settle. */
  stopGraceMs?: number;
}

export interface SchedulerStats {
  running: number;
  queued: number;
  processed: number;
  failed: number;
  cancelled: number;
}

type AbortReason = 'cancel' | 'deadline' | 'shutdown';

interface RunHandle {
  controller: AbortController;
  reason: AbortReason | null;
}

function stageMessage(stage: StageName, config: JobConfig): string {
  switch (stage) {
    case 'extract': return 'Extracting text from document';
    case 'extractEntities': return 'Extracting entities';
    case 'summarize': return `Generating summary using ${config.backend}`;
  }
}

/**
 * Owns job execution. Every run goes through `claim`, an atomic
 * pending -> running write, so a job can never execute twice. Async starts
 * queue FIFO behind `maxConcurrentRuns`; synchronous runs execute inline.
 */
export class JobScheduler {
  private runs = new Map<string, RunHandle>();
  private queue: string[] = [];
  private executing = 0;
  private stopping = false;
  private stats = {
    processed: 0,
    failed: 0,
    cancelled: 0,
  };

  constructor(
    private store: JobStore,
    private runner: PipelineRunner,
    private config: SchedulerConfig,
    private logger: Logger
  ) {}

  get plan(): StageName[] {
    return this.runner.stageNames;
  }

  /** Marks the job running and queues it. Resolves once the claim is stored. */
  async start(jobId: string): Promise<Job> {
    this.assertAccepting();
    const job = await this.claim(jobId);

    this.runs.set(jobId, { controller: new AbortController(), reason: null });
    this.queue.push(jobId);
    this.logger.info({ jobId, queued: this.queue.length }, 'job queued');

    this.pump();
    return job;
  }

  /** Creates a job and runs it to a terminal state before resolving. */
  async runSync(input: InputHandle, config: JobConfig): Promise<Job> {
    this.assertAccepting();
    const created = await this.store.create({ input, config, plan: this.plan });
    await this.claim(created.id);

    const handle: RunHandle = { controller: new AbortController(), reason: null };
    this.runs.set(created.id, handle);

    const finished = await this.execute(created.id, handle);
    if (!finished) throw new JobNotFoundError(created.id);
    return finished;
  }

  async cancel(jobId: string): Promise<Job> {
    const job = await this.store.update(jobId, current => {
      if (isTerminal(current.status)) throw new JobConflictError(jobId, 'finished');
      // Abort under the lock: a run that sees the cancelled status must already see the abort
      const handle = this.runs.get(jobId);
      if (handle) this.abort(handle, 'cancel');
      return { status: 'cancelled', message: 'Job cancelled' };
    });
    this.stats.cancelled++;

    this.logger.info({ jobId }, 'job cancelled');
    return job;
  }

  async delete(jobId: string): Promise<void> {
    const removed = await this.store.delete(jobId, job => {
      if (job.status === 'running') throw new JobConflictError(jobId, 'running');
    });
    if (!removed) throw new JobNotFoundError(jobId);
  }

  isActive(jobId: string): boolean {
    return this.runs.has(jobId);
  }

  getStats(): SchedulerStats {
    return {
      running: this.runs.size - this.queue.length,
      queued: this.queue.length,
      ...this.stats,
    };
  }

  /** Cancels queued jobs, aborts running ones and waits for them to settle. */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    for (const jobId of this.queue.splice(0)) {
      this.runs.delete(jobId);
      try {
        await this.store.update(jobId, { status: 'cancelled', message: 'Cancelled on shutdown' });
        this.stats.cancelled++;
      } catch (error) {
        this.logger.warn({ jobId, err: error }, 'could not cancel queued job on shutdown');
      }
    }

    for (const handle of this.runs.values()) {
      this.abort(handle, 'shutdown');
    }

    const gracePeriod = this.config.stopGraceMs ?? 5000;
    const start = Date.now();
    while (this.runs.size > 0 && Date.now() - start < gracePeriod) {
      await new Promise(resolve => setTimeout(resolve, 25));
    }

    if (this.runs.size > 0) {
      this.logger.warn({ remaining: this.runs.size }, 'runs still active after shutdown grace period');
    }
  }

  private assertAccepting(): void {
    if (this.stopping) {
      throw new AppError('CONFLICT', 'Scheduler is shutting down');
    }
  }

  private claim(jobId: string): Promise<Job> {
    return this.store.update(jobId, current => {
      if (current.status === 'running') throw new JobAlreadyRunningError(jobId);
      if (current.status !== 'pending') throw new JobConflictError(jobId, 'notStartable');
      return { status: 'running', message: 'Processing started' };
    });
  }

  private pump(): void {
    while (!this.stopping && this.executing < this.config.maxConcurrentRuns && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;

      const handle = this.runs.get(jobId);
      if (!handle) continue;

      this.executing++;
      void this.execute(jobId, handle)
        .catch(error => {
          this.logger.error({ jobId, err: error }, 'job run crashed');
        })
        .finally(() => {
          this.executing--;
          this.pump();
        });
    }
  }

  private async execute(jobId: string, handle: RunHandle): Promise<Job | null> {
    const log = this.logger.child({ jobId });

    try {
      const job = await this.store.get(jobId);
      // Cancelled while waiting in the queue
      if (!job || job.status !== 'running') return job;

      const deadline = setTimeout(() => this.abort(handle, 'deadline'), this.config.jobMaxRunMs);
      try {
        log.info({ plan: job.plan }, 'run started');
        const outcome = await this.runner.run({
          jobId,
          input: job.input,
          config: job.config,
          initialResults: job.partialResults,
          signal: handle.controller.signal,
          logger: log,
          hooks: this.progressHooks(jobId, job.config, handle),
        });
        return await this.finish(jobId, handle, outcome, log);
      } catch (error) {
        if (this.refusedAfterAbort(error, handle)) {
          return await this.store.get(jobId);
        }
        log.error({ err: error }, 'run failed outside a stage');
        this.stats.failed++;
        return await this.store.update(jobId, {
          status: 'failed',
          message: 'Processing failed',
          error: { stage: null, message: errorMessage(error) },
        });
      } finally {
        clearTimeout(deadline);
      }
    } finally {
      this.runs.delete(jobId);
    }
  }

  private async finish(jobId: string, handle: RunHandle, outcome: PipelineOutcome, log: Logger): Promise<Job | null> {
    switch (outcome.status) {
      case 'completed': {
        const finalResult = assembleResult(outcome.results);
        const job = await this.store.update(jobId, {
          status: 'completed',
          message: 'Processing completed successfully',
          finalResult,
        });
        this.stats.processed++;
        log.info('run completed');
        return job;
      }

      case 'failed': {
        const job = await this.store.update(jobId, {
          status: 'failed',
          message: `Processing failed at ${outcome.failure.stage}`,
          error: { stage: outcome.failure.stage, message: outcome.failure.message },
        });
        this.stats.failed++;
        log.warn({ stage: outcome.failure.stage, error: outcome.failure.message }, 'run failed');
        return job;
      }

      case 'cancelled': {
        if (handle.reason === 'deadline') {
          const message = fmt('RUN_DEADLINE', { ms: this.config.jobMaxRunMs });
          const job = await this.store.update(jobId, {
            status: 'failed',
            message: 'Processing timed out',
            error: { stage: outcome.stage, message },
          });
          this.stats.failed++;
          log.warn({ stage: outcome.stage }, message);
          return job;
        }

        const current = await this.store.get(jobId);
        if (current?.status === 'running') {
          // Aborted by shutdown; cancel() has already written its own state
          this.stats.cancelled++;
          return await this.store.update(jobId, { status: 'cancelled', message: 'Cancelled on shutdown' });
        }
        log.info('run stopped after cancellation');
        return current;
      }
    }
  }

  private progressHooks(jobId: string, config: JobConfig, handle: RunHandle): RunHooks {
    return {
      onStageStart: async (stage, startedAt) => {
        await this.record(jobId, handle, {
          message: stageMessage(stage, config),
          checkpoint: { stageName: stage, startedAt, finishedAt: null, outcome: null },
        });
      },
      onStageFinish: async event => {
        await this.record(jobId, handle, {
          checkpoint: {
            stageName: event.stage,
            startedAt: event.startedAt,
            finishedAt: event.finishedAt,
            outcome: event.outcome,
          },
          partialResults: event.output,
        });
      },
    };
  }

  private async record(jobId: string, handle: RunHandle, update: JobUpdate): Promise<void> {
    try {
      await this.store.update(jobId, update);
    } catch (error) {
      // After cancel() the job is terminal and refuses progress; the run stops at the next boundary
      if (this.refusedAfterAbort(error, handle)) {
        this.logger.debug({ jobId }, 'progress write refused after cancellation');
        return;
      }
      throw error;
    }
  }

  // A cancelled job may also have been deleted before the run noticed the abort
  private refusedAfterAbort(error: unknown, handle: RunHandle): boolean {
    return handle.controller.signal.aborted
      && (error instanceof InvalidTransitionError || error instanceof JobNotFoundError);
  }

  private abort(handle: RunHandle, reason: AbortReason): void {
    if (handle.controller.signal.aborted) return;
    handle.reason = reason;
    handle.controller.abort(reason);
  }
}
