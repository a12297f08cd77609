import { z } from 'zod';
import { StageFailure } from '../errors.js';
import type { SummaryMode } from '../types/job.js';
import { type SummarizeOptions, type Summarizer, postJson, trimBaseUrl } from './base.js';

export interface HuggingFaceSummarizerOptions {
  token: string;
  baseUrl: string;
  model: string;
}

// The hosted BART models reject long inputs
export const MAX_INPUT_CHARS = 4000;

const LENGTHS: Record<SummaryMode, { min: number; max: number }> = {
  brief: { min: 30, max: 60 },
  detailed: { min: 100, max: 200 },
  bullets: { min: 50, max: 100 },
};

const SummarizationSchema = z.array(z.object({ summary_text: z.string() })).min(1);

export function formatAsBullets(text: string): string {
  const sentences = text.split('.').map(part => part.trim()).filter(Boolean);
  if (sentences.length <= 1) {
    return `• ${text.trim()}`;
  }
  return sentences.map(sentence => `• ${sentence}.`).join('\n');
}

/** Hugging Face inference API, summarization task. */
export class HuggingFaceSummarizer implements Summarizer {
  readonly backend = 'hf' as const;
  readonly model: string;
  private token: string;
  private baseUrl: string;

  constructor(options: HuggingFaceSummarizerOptions) {
    this.token = options.token;
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.model = options.model;
  }

  async summarize(text: string, mode: SummaryMode, options: SummarizeOptions = {}): Promise<string> {
    const { min, max } = LENGTHS[mode];
    const result = await postJson(`${this.baseUrl}/models/${this.model}`, {
      inputs: text.slice(0, MAX_INPUT_CHARS),
      parameters: { min_length: min, max_length: max, do_sample: false },
    }, SummarizationSchema, {
      label: 'huggingface',
      headers: { Authorization: `Bearer ${this.token}` },
      signal: options.signal,
    });

    const summary = result[0].summary_text.trim();
    if (!summary) {
      throw new StageFailure('huggingface returned an empty summary');
    }
    return mode === 'bullets' ? formatAsBullets(summary) : summary;
  }
}
