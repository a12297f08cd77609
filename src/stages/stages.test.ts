import { describe, it, expect } from 'vitest';
import { StageFailure } from '../errors.js';
import {
  FakeRecognizer,
  ScriptedSummarizer,
  TEST_DEFAULTS,
  registryOf,
  silentLogger,
} from '../testing/fakes.js';
import type { Entity, JobConfig, PartialResults } from '../types/job.js';
import { createStages, requireResult, type StageContext } from './index.js';
import { EntityStage } from './entities.js';
import { SummarizeStage } from './summarize.js';

function context(results: PartialResults, config: Partial<JobConfig> = {}): StageContext {
  return {
    jobId: 'job-1',
    input: { uri: 'mem://doc' },
    config: { ...TEST_DEFAULTS, ...config },
    results,
    signal: new AbortController().signal,
    logger: silentLogger,
  };
}

const extracted = (text: string): PartialResults => ({
  extract: { text, tables: [], pageCount: 1, pagesProcessed: 1, metadata: {} },
});

describe('createStages', () => {
  it('should build the stages in execution order', () => {
    const stages = createStages({
      extractor: { extract: async () => ({ text: '', tables: [], pageCount: 0, pagesProcessed: 0, metadata: {} }) },
      recognizer: new FakeRecognizer(),
      summarizers: registryOf(),
    });

    expect(stages.map(stage => stage.name)).toEqual(['extract', 'extractEntities', 'summarize']);
  });
});

describe('requireResult', () => {
  it('should throw when an upstream output is missing', () => {
    expect(() => requireResult(context({}), 'extract')).toThrow(StageFailure);
    expect(() => requireResult(context({}), 'extract')).toThrow('Stage extract has not produced an output yet');
  });
});

describe('EntityStage', () => {
  it('should be disabled when entity extraction is off', () => {
    const stage = new EntityStage(new FakeRecognizer());

    expect(stage.isEnabled(TEST_DEFAULTS)).toBe(true);
    expect(stage.isEnabled({ ...TEST_DEFAULTS, extractEntities: false })).toBe(false);
  });

  it('should group recognised entities by type', async () => {
    const found: Entity[] = [
      { type: 'money', text: '$5', value: 5, confidence: 0.95 },
      { type: 'person', text: 'Ada Lovelace', value: 'Ada Lovelace', confidence: 0.85 },
    ];
    const stage = new EntityStage(new FakeRecognizer(() => found));

    const result = await stage.run(context(extracted('Ada Lovelace paid $5.')));

    expect(result).toEqual({
      ok: true,
      output: { dates: [], money: [found[0]], people: [found[1]], organizations: [], locations: [] },
    });
  });

  it('should ask for every type when none are configured', async () => {
    const requested: string[][] = [];
    const stage = new EntityStage({
      recognize: async (_text, types) => {
        requested.push([...types]);
        return [];
      },
    });

    await stage.run(context(extracted('text')));
    await stage.run(context(extracted('text'), { entityTypes: ['money'] }));

    expect(requested).toEqual([
      ['date', 'money', 'person', 'organization', 'location'],
      ['money'],
    ]);
  });
});

describe('SummarizeStage', () => {
  it('should summarize with the configured backend and mode', async () => {
    const stage = new SummarizeStage(registryOf(new ScriptedSummarizer()));

    const result = await stage.run(context(extracted('Some text.'), { summaryMode: 'bullets' }));

    expect(result).toEqual({
      ok: true,
      output: { summary: 'summary:bullets', mode: 'bullets', backend: 'extractive', model: 'scripted' },
    });
  });

  it('should fail on blank text', async () => {
    const summarizer = new ScriptedSummarizer();
    const stage = new SummarizeStage(registryOf(summarizer));

    const result = await stage.run(context(extracted('  \n ')));

    expect(result).toEqual({ ok: false, error: { message: 'Cannot summarize empty text' } });
    expect(summarizer.calls).toBe(0);
  });

  it('should fail when the backend is not configured', async () => {
    const stage = new SummarizeStage(registryOf(new ScriptedSummarizer()));

    const result = await stage.run(context(extracted('Some text.'), { backend: 'hf' }));

    expect(result).toEqual({ ok: false, error: { message: "Summarization backend 'hf' is not configured" } });
  });
});
