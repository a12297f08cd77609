import { monotonicFactory } from 'ulid';
import { JobNotFoundError } from '../errors.js';
import {
  type Job,
  type CreateJobData,
  type JobQuery,
  type JobUpdate,
  type JobMutation,
  type JobStats,
  type JobStatus,
} from '../types/job.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import type { JobStore } from './base.js';
import { applyUpdate } from './transitions.js';

/**
 * Process-local job store. Records are replaced wholesale on every write and
 * callers only ever receive deep copies, so a reader holds a consistent
 * snapshot no matter what writers do afterwards.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, Job>();
  private locks = new KeyedMutex();
  // Monotonic ULIDs keep creation order even within one millisecond
  private nextId = monotonicFactory();

  async create(data: CreateJobData): Promise<Job> {
    const now = new Date();
    const job: Job = {
      id: this.nextId(now.getTime()),
      status: 'pending',
      message: 'Job created, awaiting processing',
      input: structuredClone(data.input),
      config: structuredClone(data.config),
      plan: [...data.plan],
      progress: [],
      partialResults: {},
      finalResult: null,
      error: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    };

    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async update(id: string, change: JobUpdate | JobMutation): Promise<Job> {
    return this.locks.runExclusive(id, () => {
      const current = this.jobs.get(id);
      if (!current) throw new JobNotFoundError(id);

      const update = typeof change === 'function' ? change(structuredClone(current)) : change;
      // The stored record must not share objects with the writer
      const next = applyUpdate(current, structuredClone(update), new Date());

      this.jobs.set(id, next);
      return structuredClone(next);
    });
  }

  async list(query: JobQuery = {}): Promise<Job[]> {
    let jobs = Array.from(this.jobs.values());

    if (query.status) {
      jobs = jobs.filter(job => job.status === query.status);
    }

    // Sort by creation time (newest first), id breaks ties
    jobs.sort((a, b) => {
      const byTime = b.createdAt.getTime() - a.createdAt.getTime();
      if (byTime !== 0) return byTime;
      return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
    });

    if (query.limit !== undefined) {
      jobs = jobs.slice(0, query.limit);
    }

    return jobs.map(job => structuredClone(job));
  }

  async delete(id: string, guard?: (job: Readonly<Job>) => void): Promise<boolean> {
    return this.locks.runExclusive(id, () => {
      const current = this.jobs.get(id);
      if (!current) return false;
      guard?.(structuredClone(current));
      return this.jobs.delete(id);
    });
  }

  async getStats(): Promise<JobStats> {
    const byStatus: Record<JobStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };

    for (const job of this.jobs.values()) {
      byStatus[job.status]++;
    }

    return { total: this.jobs.size, byStatus };
  }
}
