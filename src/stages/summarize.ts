import { fmt } from '../lib/error-messages.js';
import type { SummarizerRegistry } from '../summarizers/base.js';
import type { SummaryOutput } from '../types/job.js';
import { type Stage, type StageContext, type StageResult, failStage, requireResult, succeed } from './base.js';

export class SummarizeStage implements Stage<'summarize'> {
  readonly name = 'summarize' as const;

  constructor(private summarizers: SummarizerRegistry) {}

  async run(context: StageContext): Promise<StageResult<SummaryOutput>> {
    const { text } = requireResult(context, 'extract');
    const { backend, summaryMode } = context.config;

    if (!text.trim()) {
      return failStage('Cannot summarize empty text');
    }

    const summarizer = this.summarizers.get(backend);
    if (!summarizer) {
      return failStage(fmt('BACKEND_NOT_CONFIGURED', { backend }));
    }

    const summary = await summarizer.summarize(text, summaryMode, { signal: context.signal });

    context.logger.info({ backend, model: summarizer.model, chars: summary.length }, 'generated summary');
    return succeed({ summary, mode: summaryMode, backend: summarizer.backend, model: summarizer.model });
  }
}
