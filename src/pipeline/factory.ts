import type { Logger } from 'pino';
import type { AppConfig } from '../config.js';
import { HeuristicEntityTagger } from '../entities/tagger.js';
import { PatternEntityRecognizer } from '../entities/recognizer.js';
import { DocumentRoot, DocumentRouter } from '../extractors/index.js';
import { JobScheduler } from '../scheduler/index.js';
import { DocumentPipelineService } from '../service.js';
import { createStages } from '../stages/index.js';
import type { DocumentExtractor } from '../stages/extract.js';
import type { EntityRecognizer } from '../stages/entities.js';
import type { JobStore } from '../store/base.js';
import { InMemoryJobStore } from '../store/memory.js';
import { type SummarizerRegistry, createSummarizers } from '../summarizers/index.js';
import { PipelineRunner } from './runner.js';

/** Collaborators a caller may swap, mostly for tests. */
export interface PipelineOverrides {
  store?: JobStore;
  extractor?: DocumentExtractor;
  recognizer?: EntityRecognizer;
  summarizers?: SummarizerRegistry;
  stopGraceMs?: number;
}

export interface DocumentPipeline {
  service: DocumentPipelineService;
  scheduler: JobScheduler;
  store: JobStore;
}

export function createDocumentPipeline(config: AppConfig, logger: Logger, overrides: PipelineOverrides = {}): DocumentPipeline {
  const store = overrides.store ?? new InMemoryJobStore();
  const summarizers = overrides.summarizers ?? createSummarizers(config.backends);
  const extractor = overrides.extractor ?? new DocumentRouter(new DocumentRoot(config.documents.root));

  const runner = new PipelineRunner(createStages({
    extractor,
    recognizer: overrides.recognizer ?? new PatternEntityRecognizer(new HeuristicEntityTagger()),
    summarizers,
  }));

  const scheduler = new JobScheduler(store, runner, {
    maxConcurrentRuns: config.worker.maxConcurrentRuns,
    jobMaxRunMs: config.worker.jobMaxRunMs,
    stopGraceMs: overrides.stopGraceMs,
  }, logger);

  const service = new DocumentPipelineService({
    store,
    scheduler,
    extractor,
    defaults: config.pipeline.defaults,
    maxPagesLimit: config.pipeline.maxPagesLimit,
    backends: Array.from(summarizers.keys()),
    logger,
  });

  return { service, scheduler, store };
}
