import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryJobStore } from './memory.js';
import { InvalidTransitionError, JobConflictError, JobNotFoundError } from '../errors.js';
import { TEST_DEFAULTS } from '../testing/fakes.js';
import { type ExtractionOutput, type Job, STAGE_NAMES } from '../types/job.js';

describe('InMemoryJobStore', () => {
  let store: InMemoryJobStore;

  const createJob = (filename = 'report.txt') => store.create({
    input: { uri: `/docs/${filename}`, filename },
    config: TEST_DEFAULTS,
    plan: [...STAGE_NAMES],
  });

  beforeEach(() => {
    store = new InMemoryJobStore();
  });

  describe('create', () => {
    it('should create a pending job with empty progress', async () => {
      const job = await createJob();

      expect(job.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
      expect(job.status).toBe('pending');
      expect(job.message).toBe('Job created, awaiting processing');
      expect(job.plan).toEqual(['extract', 'extractEntities', 'summarize']);
      expect(job.progress).toEqual([]);
      expect(job.partialResults).toEqual({});
      expect(job.finalResult).toBeNull();
      expect(job.error).toBeNull();
      expect(job.startedAt).toBeNull();
      expect(job.updatedAt.getTime()).toBe(job.createdAt.getTime());
    });

    it('should never reuse ids', async () => {
      const ids = new Set<string>();
      for (let i = 0; i < 50; i++) {
        ids.add((await createJob()).id);
      }
      expect(ids.size).toBe(50);
    });
  });

  describe('get', () => {
    it('should return null for unknown ids', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('should hand out copies', async () => {
      const job = await createJob();
      const copy = await store.get(job.id);
      if (!copy) throw new Error('job missing');

      copy.status = 'failed';
      copy.config.maxPages = 99;

      const again = await store.get(job.id);
      expect(again?.status).toBe('pending');
      expect(again?.config.maxPages).toBe(3);
    });
  });

  describe('update', () => {
    it('should apply a change object', async () => {
      const job = await createJob();
      const updated = await store.update(job.id, { status: 'running', message: 'Processing started' });

      expect(updated.status).toBe('running');
      expect(updated.message).toBe('Processing started');
      expect(updated.startedAt).toBeInstanceOf(Date);
    });

    it('should not share stored outputs with the writer', async () => {
      const job = await createJob();
      await store.update(job.id, { status: 'running' });
      const extract: ExtractionOutput = { text: 'Hello.', tables: [], pageCount: 1, pagesProcessed: 1, metadata: { filename: 'report.txt' } };

      await store.update(job.id, { partialResults: { extract } });
      extract.tables.push({ page: 9, tableIndex: 0, rows: [['injected']] });
      extract.metadata.filename = 'rewritten';

      const stored = await store.get(job.id);
      expect(stored?.partialResults.extract).toEqual({
        text: 'Hello.',
        tables: [],
        pageCount: 1,
        pagesProcessed: 1,
        metadata: { filename: 'report.txt' },
      });
    });

    it('should throw JobNotFoundError for unknown ids', async () => {
      await expect(store.update('missing', { message: 'x' })).rejects.toBeInstanceOf(JobNotFoundError);
    });

    it('should reject transitions the state machine forbids', async () => {
      const job = await createJob();
      await expect(store.update(job.id, {
        status: 'completed',
        finalResult: {
          summary: 's',
          entities: { dates: [], money: [], people: [], organizations: [], locations: [] },
          metadata: {
            backend: 'extractive',
            model: 'm',
            summaryMode: 'brief',
            entityCount: 0,
            textLength: 1,
            pagesProcessed: 1,
            tablesExtracted: 0,
          },
        },
      })).rejects.toBeInstanceOf(InvalidTransitionError);

      expect((await store.get(job.id))?.status).toBe('pending');
    });

    it('should refuse any write to a terminal job', async () => {
      const job = await createJob();
      await store.update(job.id, { status: 'cancelled' });

      await expect(store.update(job.id, { message: 'late' })).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('should serialise read-modify-write mutations on the same job', async () => {
      const job = await createJob();

      await Promise.all(Array.from({ length: 20 }, () =>
        store.update(job.id, current => ({ message: `${current.message}+` }))
      ));

      const final = await store.get(job.id);
      expect(final?.message).toBe(`Job created, awaiting processing${'+'.repeat(20)}`);
    });

    it('should leave the record untouched when a mutation throws', async () => {
      const job = await createJob();

      await expect(store.update(job.id, () => {
        throw new JobConflictError(job.id, 'notStartable');
      })).rejects.toBeInstanceOf(JobConflictError);

      const again = await store.get(job.id);
      expect(again?.updatedAt.getTime()).toBe(job.updatedAt.getTime());
      expect(again?.message).toBe(job.message);
    });
  });

  describe('list', () => {
    it('should return jobs newest first', async () => {
      const a = await createJob('a.txt');
      const b = await createJob('b.txt');
      const c = await createJob('c.txt');

      const jobs = await store.list();
      expect(jobs.map(job => job.id)).toEqual([c.id, b.id, a.id]);
    });

    it('should filter by status and apply the limit', async () => {
      const a = await createJob('a.txt');
      const b = await createJob('b.txt');
      await createJob('c.txt');
      await store.update(a.id, { status: 'running' });
      await store.update(b.id, { status: 'running' });

      const running = await store.list({ status: 'running' });
      expect(running.map((job: Job) => job.id)).toEqual([b.id, a.id]);

      const limited = await store.list({ limit: 1 });
      expect(limited).toHaveLength(1);
    });
  });

  describe('delete', () => {
    it('should delete once and report absence afterwards', async () => {
      const job = await createJob();

      expect(await store.delete(job.id)).toBe(true);
      expect(await store.delete(job.id)).toBe(false);
      expect(await store.get(job.id)).toBeNull();
    });

    it('should keep the job when the guard refuses', async () => {
      const job = await createJob();
      await store.update(job.id, { status: 'running' });

      await expect(store.delete(job.id, current => {
        if (current.status === 'running') throw new JobConflictError(job.id, 'running');
      })).rejects.toBeInstanceOf(JobConflictError);

      expect((await store.get(job.id))?.status).toBe('running');
    });
  });

  describe('getStats', () => {
    it('should count jobs per status', async () => {
      const a = await createJob();
      await createJob();
      await store.update(a.id, { status: 'cancelled' });

      expect(await store.getStats()).toEqual({
        total: 2,
        byStatus: { pending: 1, running: 0, completed: 0, failed: 0, cancelled: 1 },
      });
    });
  });
});
