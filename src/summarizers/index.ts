import type { SummarizerBackend } from '../types/job.js';
import type { Summarizer, SummarizerRegistry } from './base.js';
import { ExtractiveSummarizer } from './extractive.js';
import { HuggingFaceSummarizer, type HuggingFaceSummarizerOptions } from './huggingface.js';
import { OpenAISummarizer, type OpenAISummarizerOptions } from './openai.js';

export * from './base.js';
export * from './extractive.js';
export * from './huggingface.js';
export * from './openai.js';

export interface BackendsConfig {
  openai: OpenAISummarizerOptions | null;
  hf: HuggingFaceSummarizerOptions | null;
}

/** Hosted backends are registered only when their credentials are present. */
export function createSummarizers(config: BackendsConfig): SummarizerRegistry {
  const registry = new Map<SummarizerBackend, Summarizer>();
  registry.set('extractive', new ExtractiveSummarizer());
  if (config.openai) registry.set('openai', new OpenAISummarizer(config.openai));
  if (config.hf) registry.set('hf', new HuggingFaceSummarizer(config.hf));
  return registry;
}
