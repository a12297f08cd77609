import type { Job, CreateJobData, JobQuery, JobUpdate, JobMutation, JobStats } from '../types/job.js';

export interface JobStore {
  create(data: CreateJobData): Promise<Job>;
  get(id: string): Promise<Job | null>;
  /**
   * Atomically applies a change to one job. Writes for the same id never interleave.
   * Throws JobNotFoundError for unknown ids and InvalidTransitionError when the
   * change breaks the state machine.
   */
  update(id: string, change: JobUpdate | JobMutation): Promise<Job>;
  /** Newest first. */
  list(query?: JobQuery): Promise<Job[]>;
  /**
   * Resolves false when no such job exists. `guard` sees the record under the
   * job's lock and may throw to refuse the delete.
   */
  delete(id: string, guard?: (job: Readonly<Job>) => void): Promise<boolean>;
  getStats(): Promise<JobStats>;
}
