import { countEntities, emptyEntityOutput } from '../entities/grouping.js';
import type { FinalResult, PartialResults } from '../types/job.js';

/** Builds the job's final result once every planned stage has finished. */
export function assembleResult(results: PartialResults): FinalResult {
  const extraction = results.extract;
  const summary = results.summarize;
  if (!extraction || !summary) {
    throw new Error('Pipeline finished without extraction and summary outputs');
  }

  // Entity extraction may have been switched off for this job
  const entities = results.extractEntities ?? emptyEntityOutput();

  return {
    summary: summary.summary,
    entities,
    metadata: {
      backend: summary.backend,
      model: summary.model,
      summaryMode: summary.mode,
      entityCount: countEntities(entities),
      textLength: extraction.text.length,
      pagesProcessed: extraction.pagesProcessed,
      tablesExtracted: extraction.tables.length,
    },
  };
}
