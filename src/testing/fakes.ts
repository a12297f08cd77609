import { pino } from 'pino';
import { loadConfig, type AppConfig } from '../config.js';
import type { DocumentLoader } from '../extractors/plain-text.js';
import type { EntityRecognizer } from '../stages/entities.js';
import type { Summarizer, SummarizeOptions, SummarizerRegistry } from '../summarizers/base.js';
import type { Entity, JobConfig, SummarizerBackend, SummaryMode } from '../types/job.js';

export const silentLogger = pino({ level: 'silent' });

export const TEST_DEFAULTS: JobConfig = {
  summaryMode: 'brief',
  backend: 'extractive',
  extractEntities: true,
  entityTypes: null,
  maxPages: 3,
  extractTables: true,
};

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ NODE_ENV: 'test', ...env });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Polls until `probe` returns something truthy. */
export async function waitFor<T>(probe: () => Promise<T | null | undefined | false> | T | null | undefined | false, timeoutMs = 2000): Promise<T> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    const value = await probe();
    if (value) return value;
    await new Promise(resolve => setTimeout(resolve, 5));
  }
  throw new Error(`Condition not met within ${timeoutMs} ms`);
}

/** Serves documents from memory instead of the filesystem. */
export function memoryLoader(documents: Record<string, string | Uint8Array>): DocumentLoader {
  return async (uri) => {
    const document = documents[uri];
    if (document === undefined) {
      throw new Error(`ENOENT: no such file '${uri}'`);
    }
    return typeof document === 'string' ? new TextEncoder().encode(document) : document;
  };
}

export class FakeRecognizer implements EntityRecognizer {
  calls = 0;

  constructor(private behaviour: (text: string) => Entity[] = () => []) {}

  async recognize(text: string): Promise<Entity[]> {
    this.calls++;
    return this.behaviour(text);
  }
}

/**
 * Summarizer whose replies are scripted. With a gate set, every call waits for
 * it (or for the run's abort signal) before answering.
 */
export class ScriptedSummarizer implements Summarizer {
  readonly backend = 'extractive' as const;
  readonly model = 'scripted';
  calls = 0;
  gate: Promise<void> | null = null;

  constructor(private reply: (text: string, mode: SummaryMode) => string = (_text, mode) => `summary:${mode}`) {}

  async summarize(text: string, mode: SummaryMode, options: SummarizeOptions = {}): Promise<string> {
    this.calls++;
    if (this.gate) {
      await waitForGate(this.gate, options.signal);
    }
    return this.reply(text, mode);
  }
}

function waitForGate(gate: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return gate;
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    gate.then(resolve, reject);
  });
}

export function registryOf(...summarizers: Summarizer[]): SummarizerRegistry {
  return new Map<SummarizerBackend, Summarizer>(summarizers.map(summarizer => [summarizer.backend, summarizer]));
}
