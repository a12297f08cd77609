import type { SummarizerRegistry } from '../summarizers/base.js';
import type { Stage } from './base.js';
import { type DocumentExtractor, ExtractStage } from './extract.js';
import { type EntityRecognizer, EntityStage } from './entities.js';
import { SummarizeStage } from './summarize.js';

export * from './base.js';
export * from './extract.js';
export * from './entities.js';
export * from './summarize.js';

export interface StageDependencies {
  extractor: DocumentExtractor;
  recognizer: EntityRecognizer;
  summarizers: SummarizerRegistry;
}

/** Stages in execution order. */
export function createStages(deps: StageDependencies): Stage[] {
  return [
    new ExtractStage(deps.extractor),
    new EntityStage(deps.recognizer),
    new SummarizeStage(deps.summarizers),
  ];
}
