import type { ExtractionOutput, InputHandle } from '../types/job.js';
import { type Stage, type StageContext, type StageResult, succeed } from './base.js';

export interface ExtractOptions {
  maxPages: number;
  extractTables: boolean;
  signal: AbortSignal;
}

/** Text/table extraction backend. Page limits are applied here, not by the orchestrator. */
export interface DocumentExtractor {
  /** Rejects an input before a job is created for it. */
  validate?(input: InputHandle): void;
  extract(input: InputHandle, options: ExtractOptions): Promise<ExtractionOutput>;
}

export class ExtractStage implements Stage<'extract'> {
  readonly name = 'extract' as const;

  constructor(private extractor: DocumentExtractor) {}

  async run(context: StageContext): Promise<StageResult<ExtractionOutput>> {
    const { input, config, signal, logger } = context;

    const output = await this.extractor.extract(input, {
      maxPages: config.maxPages,
      extractTables: config.extractTables,
      signal,
    });

    logger.info({
      chars: output.text.length,
      pagesProcessed: output.pagesProcessed,
      tables: output.tables.length,
    }, 'extracted document text');

    return succeed(output);
  }
}
