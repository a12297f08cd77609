import { StageFailure } from '../errors.js';
import type { SummaryMode } from '../types/job.js';
import type { Summarizer } from './base.js';

const SENTENCE_COUNT: Record<SummaryMode, number> = {
  brief: 3,
  detailed: 8,
  bullets: 5,
};

const PAGE_MARKER = /^=== Page \d+ ===$/gm;

export function splitSentences(text: string): string[] {
  const flat = text.replace(PAGE_MARKER, ' ').replace(/\s+/g, ' ').trim();
  if (!flat) return [];
  const sentences = flat.match(/[^.!?]+[.!?]+|[^.!?]+$/g) ?? [];
  return sentences.map(sentence => sentence.trim()).filter(Boolean);
}

/**
 * Lead-sentence summary computed locally. Deterministic, needs no credentials,
 * and is the fallback backend when no hosted model is configured.
 */
export class ExtractiveSummarizer implements Summarizer {
  readonly backend = 'extractive' as const;
  readonly model = 'lead-sentences';

  async summarize(text: string, mode: SummaryMode): Promise<string> {
    const sentences = splitSentences(text);
    if (sentences.length === 0) {
      throw new StageFailure('Cannot summarize empty text');
    }

    const lead = sentences.slice(0, SENTENCE_COUNT[mode]);
    return mode === 'bullets'
      ? lead.map(sentence => `• ${sentence}`).join('\n')
      : lead.join(' ');
  }
}
