import type { Logger } from 'pino';
import {
  JobAlreadyRunningError,
  JobConflictError,
  JobNotFoundError,
} from './errors.js';
import { type JobProjection, type JobSummary, type ProjectionOptions, projectJob, summarizeJob } from './projection/index.js';
import type { JobScheduler, SchedulerStats } from './scheduler/index.js';
import type { DocumentExtractor } from './stages/extract.js';
import { InputHandleSchema, type JobConfigInput, parseOrThrow, resolveJobConfig } from './schemas/job.js';
import type { JobStore } from './store/base.js';
import type { InputHandle, JobConfig, JobQuery, JobStats, SummarizerBackend } from './types/job.js';

export type StartResult =
  | { status: 'accepted'; job: JobProjection }
  | { status: 'rejected'; reason: 'alreadyRunning' | 'notFound' | 'notStartable' };

export type DeleteResult =
  | { status: 'deleted' }
  | { status: 'notFound' }
  | { status: 'conflict'; reason: 'running' };

export type CancelResult =
  | { status: 'cancelled'; job: JobProjection }
  | { status: 'notFound' }
  | { status: 'rejected'; reason: 'terminal' };

export interface ServiceStats {
  jobs: JobStats;
  scheduler: SchedulerStats;
  backends: SummarizerBackend[];
}

export interface PipelineServiceDeps {
  store: JobStore;
  scheduler: JobScheduler;
  extractor: DocumentExtractor;
  defaults: JobConfig;
  maxPagesLimit: number;
  backends: SummarizerBackend[];
  logger: Logger;
}

/**
 * Public operations of the document pipeline. Expected outcomes (unknown id,
 * job already running) come back as tagged results; input problems throw
 * ValidationError and store faults propagate.
 */
export class DocumentPipelineService {
  constructor(private deps: PipelineServiceDeps) {}

  async submit(input: InputHandle, config: JobConfigInput = {}): Promise<string> {
    const request = this.validate(input, config);
    const job = await this.deps.store.create({ ...request, plan: this.deps.scheduler.plan });
    this.deps.logger.info({ jobId: job.id, uri: job.input.uri }, 'job submitted');
    return job.id;
  }

  async start(jobId: string): Promise<StartResult> {
    try {
      const job = await this.deps.scheduler.start(jobId);
      return { status: 'accepted', job: projectJob(job) };
    } catch (error) {
      if (error instanceof JobNotFoundError) return { status: 'rejected', reason: 'notFound' };
      if (error instanceof JobAlreadyRunningError) return { status: 'rejected', reason: 'alreadyRunning' };
      if (error instanceof JobConflictError) return { status: 'rejected', reason: 'notStartable' };
      throw error;
    }
  }

  async status(jobId: string, options: ProjectionOptions = {}): Promise<JobProjection | null> {
    const job = await this.deps.store.get(jobId);
    return job ? projectJob(job, options) : null;
  }

  async runSynchronously(input: InputHandle, config: JobConfigInput = {}): Promise<JobProjection> {
    const request = this.validate(input, config);
    const job = await this.deps.scheduler.runSync(request.input, request.config);
    return projectJob(job);
  }

  async listJobs(query: JobQuery = {}): Promise<JobSummary[]> {
    const jobs = await this.deps.store.list(query);
    return jobs.map(summarizeJob);
  }

  async deleteJob(jobId: string): Promise<DeleteResult> {
    try {
      await this.deps.scheduler.delete(jobId);
      this.deps.logger.info({ jobId }, 'job deleted');
      return { status: 'deleted' };
    } catch (error) {
      if (error instanceof JobNotFoundError) return { status: 'notFound' };
      if (error instanceof JobConflictError) return { status: 'conflict', reason: 'running' };
      throw error;
    }
  }

  async cancelJob(jobId: string): Promise<CancelResult> {
    try {
      const job = await this.deps.scheduler.cancel(jobId);
      return { status: 'cancelled', job: projectJob(job) };
    } catch (error) {
      if (error instanceof JobNotFoundError) return { status: 'notFound' };
      if (error instanceof JobConflictError) return { status: 'rejected', reason: 'terminal' };
      throw error;
    }
  }

  async stats(): Promise<ServiceStats> {
    return {
      jobs: await this.deps.store.getStats(),
      scheduler: this.deps.scheduler.getStats(),
      backends: [...this.deps.backends],
    };
  }

  /** Stops accepting work and waits for in-flight runs to settle. */
  async shutdown(): Promise<void> {
    await this.deps.scheduler.stop();
  }

  private validate(input: InputHandle, config: JobConfigInput): { input: InputHandle; config: JobConfig } {
    const handle = parseOrThrow(InputHandleSchema, input, 'Invalid input handle');
    this.deps.extractor.validate?.(handle);
    return {
      input: handle,
      config: resolveJobConfig(config, this.deps.defaults, this.deps.maxPagesLimit),
    };
  }
}
