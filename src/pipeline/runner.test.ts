import { describe, it, expect, vi } from 'vitest';
import { PipelineRunner, type RunHooks, type StageFinishEvent } from './runner.js';
import { type Stage, type StageContext, type StageResult, failStage, requireResult, succeed } from '../stages/base.js';
import { TEST_DEFAULTS, silentLogger } from '../testing/fakes.js';
import type { EntityOutput, ExtractionOutput, JobConfig, StageName, StageOutputs } from '../types/job.js';

const extraction: ExtractionOutput = {
  text: 'Contract text',
  tables: [],
  pageCount: 1,
  pagesProcessed: 1,
  metadata: {},
};

const noEntities: EntityOutput = { dates: [], money: [], people: [], organizations: [], locations: [] };

function stage<K extends StageName>(
  name: K,
  run: (context: StageContext) => Promise<StageResult<StageOutputs[K]>> | StageResult<StageOutputs[K]>,
  isEnabled?: (config: JobConfig) => boolean
): Stage<K> {
  return { name, run: async context => run(context), isEnabled };
}

function recordingHooks() {
  const events: string[] = [];
  const finished: StageFinishEvent[] = [];
  const hooks: RunHooks = {
    onStageStart: (name) => {
      events.push(`start:${name}`);
    },
    onStageFinish: (event) => {
      events.push(`finish:${event.stage}:${event.outcome}`);
      finished.push(event);
    },
  };
  return { events, finished, hooks };
}

function runWith(runner: PipelineRunner, hooks: RunHooks, options: { signal?: AbortSignal; config?: JobConfig } = {}) {
  return runner.run({
    jobId: 'job-1',
    input: { uri: '/docs/a.txt' },
    config: options.config ?? TEST_DEFAULTS,
    signal: options.signal ?? new AbortController().signal,
    logger: silentLogger,
    hooks,
  });
}

describe('PipelineRunner', () => {
  it('should run stages in order and thread outputs forward', async () => {
    const runner = new PipelineRunner([
      stage('extract', () => succeed(extraction)),
      stage('extractEntities', () => succeed(noEntities)),
      stage('summarize', context => succeed({
        summary: `summary of ${requireResult(context, 'extract').text}`,
        mode: context.config.summaryMode,
        backend: 'extractive',
        model: 'test',
      })),
    ]);
    const { events, finished, hooks } = recordingHooks();

    const outcome = await runWith(runner, hooks);

    expect(outcome.status).toBe('completed');
    expect(outcome.results.summarize?.summary).toBe('summary of Contract text');
    expect(events).toEqual([
      'start:extract', 'finish:extract:succeeded',
      'start:extractEntities', 'finish:extractEntities:succeeded',
      'start:summarize', 'finish:summarize:succeeded',
    ]);
    expect(finished[0].output).toEqual({ extract: extraction });
    expect(runner.stageNames).toEqual(['extract', 'extractEntities', 'summarize']);
  });

  it('should stop at the first failure and keep earlier outputs', async () => {
    const summarize = vi.fn(async () => failStage('not reached'));
    const runner = new PipelineRunner([
      stage('extract', () => succeed(extraction)),
      stage('extractEntities', () => {
        throw new Error('bad-encoding');
      }),
      { name: 'summarize', run: summarize },
    ]);
    const { events, finished, hooks } = recordingHooks();

    const outcome = await runWith(runner, hooks);

    expect(outcome).toEqual({
      status: 'failed',
      results: { extract: extraction },
      failure: { stage: 'extractEntities', message: 'bad-encoding' },
    });
    expect(summarize).not.toHaveBeenCalled();
    expect(events).toEqual([
      'start:extract', 'finish:extract:succeeded',
      'start:extractEntities', 'finish:extractEntities:failed',
    ]);
    expect(finished[1].error).toBe('bad-encoding');
  });

  it('should treat a returned failure like a thrown one', async () => {
    const runner = new PipelineRunner([
      stage('extract', () => failStage('unreadable')),
    ]);

    const outcome = await runWith(runner, {});
    expect(outcome).toEqual({ status: 'failed', results: {}, failure: { stage: 'extract', message: 'unreadable' } });
  });

  it('should record disabled stages as skipped without starting them', async () => {
    const entities = vi.fn(async () => succeed(noEntities));
    const runner = new PipelineRunner([
      stage('extract', () => succeed(extraction)),
      { name: 'extractEntities', run: entities, isEnabled: config => config.extractEntities },
    ]);
    const { events, hooks } = recordingHooks();

    const outcome = await runWith(runner, hooks, { config: { ...TEST_DEFAULTS, extractEntities: false } });

    expect(outcome).toEqual({ status: 'completed', results: { extract: extraction } });
    expect(entities).not.toHaveBeenCalled();
    expect(events).toEqual(['start:extract', 'finish:extract:succeeded', 'finish:extractEntities:skipped']);
  });

  it('should not rerun stages whose output is already present', async () => {
    const extract = vi.fn(async () => succeed(extraction));
    const runner = new PipelineRunner([
      { name: 'extract', run: extract },
      stage('extractEntities', () => succeed(noEntities)),
    ]);
    const { events, hooks } = recordingHooks();

    const outcome = await runner.run({
      jobId: 'job-1',
      input: { uri: '/docs/a.txt' },
      config: TEST_DEFAULTS,
      initialResults: { extract: extraction },
      signal: new AbortController().signal,
      logger: silentLogger,
      hooks,
    });

    expect(outcome.status).toBe('completed');
    expect(extract).not.toHaveBeenCalled();
    expect(events).toEqual(['start:extractEntities', 'finish:extractEntities:succeeded']);
  });

  it('should not start anything when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { events, hooks } = recordingHooks();
    const runner = new PipelineRunner([stage('extract', () => succeed(extraction))]);

    const outcome = await runWith(runner, hooks, { signal: controller.signal });

    expect(outcome).toEqual({ status: 'cancelled', results: {}, stage: 'extract' });
    expect(events).toEqual([]);
  });

  it('should drop output produced after an abort', async () => {
    const controller = new AbortController();
    const runner = new PipelineRunner([
      stage('extract', () => {
        controller.abort();
        return succeed(extraction);
      }),
      stage('extractEntities', () => succeed(noEntities)),
    ]);
    const { events, hooks } = recordingHooks();

    const outcome = await runWith(runner, hooks, { signal: controller.signal });

    expect(outcome).toEqual({ status: 'cancelled', results: {}, stage: 'extract' });
    expect(events).toEqual(['start:extract', 'finish:extract:cancelled']);
  });

  it('should propagate hook errors instead of recording a stage failure', async () => {
    const runner = new PipelineRunner([stage('extract', () => succeed(extraction))]);

    await expect(runWith(runner, {
      onStageStart: () => {
        throw new Error('store unavailable');
      },
    })).rejects.toThrow('store unavailable');
  });
});
