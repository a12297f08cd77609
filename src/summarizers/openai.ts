import { z } from 'zod';
import { StageFailure } from '../errors.js';
import type { SummaryMode } from '../types/job.js';
import { type SummarizeOptions, type Summarizer, postJson, trimBaseUrl } from './base.js';

export interface OpenAISummarizerOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
}

const SYSTEM_PROMPT = 'You are a helpful assistant that summarizes documents accurately and concisely.';

const INSTRUCTIONS: Record<SummaryMode, string> = {
  brief: 'Provide a brief 2-3 sentence summary highlighting ONLY the key points.',
  detailed: 'Provide a detailed summary covering all important aspects of the document.',
  bullets: 'Provide a summary in bullet points, highlighting the main points.',
};

const MAX_TOKENS: Record<SummaryMode, number> = {
  brief: 150,
  detailed: 500,
  bullets: 300,
};

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

export function buildPrompt(text: string, mode: SummaryMode): string {
  return `Summarize the following document:\n\n${text}\n\n${INSTRUCTIONS[mode]}`;
}

/** Chat-completions client; works against any OpenAI-compatible endpoint. */
export class OpenAISummarizer implements Summarizer {
  readonly backend = 'openai' as const;
  readonly model: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(options: OpenAISummarizerOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.model = options.model;
  }

  async summarize(text: string, mode: SummaryMode, options: SummarizeOptions = {}): Promise<string> {
    const completion = await postJson(`${this.baseUrl}/chat/completions`, {
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildPrompt(text, mode) },
      ],
      temperature: 0.3,
      max_tokens: MAX_TOKENS[mode],
    }, ChatCompletionSchema, {
      label: 'openai',
      headers: { Authorization: `Bearer ${this.apiKey}` },
      signal: options.signal,
    });

    const summary = completion.choices[0].message.content?.trim() ?? '';
    if (!summary) {
      throw new StageFailure('openai returned an empty summary');
    }
    return summary;
  }
}
