import { basename } from 'node:path';
import { StageFailure, errorMessage } from '../errors.js';
import type { DocumentExtractor, ExtractOptions } from '../stages/extract.js';
import type { ExtractedTable, ExtractionOutput, InputHandle } from '../types/job.js';

export type DocumentLoader = (uri: string, signal: AbortSignal) => Promise<Uint8Array>;

const PAGE_BREAK = '\f';

function splitPages(text: string): string[] {
  const pages = text.split(PAGE_BREAK);
  // A trailing form feed closes the last page rather than opening a new one
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') {
    pages.pop();
  }
  return pages;
}

function isTableRow(line: string): boolean {
  return line.includes('|') && line.split('|').filter(cell => cell.trim() !== '').length >= 2;
}

function isRuleRow(line: string): boolean {
  return /^\s*\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/.test(line);
}

function parseRow(line: string): string[] {
  const cells = line.trim().replace(/^\|/, '').replace(/\|$/, '').split('|');
  return cells.map(cell => cell.trim());
}

/** Pipe-delimited blocks of at least two rows. */
export function findTables(pageText: string, page: number): ExtractedTable[] {
  const tables: ExtractedTable[] = [];
  let rows: string[][] = [];

  const flush = () => {
    if (rows.length >= 2) {
      tables.push({ page, tableIndex: tables.length, rows });
    }
    rows = [];
  };

  for (const line of pageText.split(/\r?\n/)) {
    if (isRuleRow(line)) continue;
    if (isTableRow(line)) {
      rows.push(parseRow(line));
    } else {
      flush();
    }
  }
  flush();

  return tables;
}

/** Marks and joins the first `maxPages` pages and collects their tables. */
export function assemblePages(
  pages: string[],
  input: InputHandle,
  options: ExtractOptions,
  extraMetadata: Record<string, string> = {}
): ExtractionOutput {
  const kept = pages.slice(0, options.maxPages);

  const blank = kept.every(page => page.trim() === '');
  const text = blank
    ? ''
    : kept.map((page, index) => `=== Page ${index + 1} ===\n${page}`).join('\n\n');
  const tables = options.extractTables
    ? kept.flatMap((page, index) => findTables(page, index + 1))
    : [];

  const metadata: Record<string, string> = {
    filename: input.filename ?? basename(input.uri),
  };
  if (input.mediaType) metadata.mediaType = input.mediaType;

  return {
    text,
    tables,
    pageCount: pages.length,
    pagesProcessed: kept.length,
    metadata: { ...metadata, ...extraMetadata },
  };
}

/**
 * Extracts UTF-8 text documents. Form feeds separate pages; only the first
 * `maxPages` pages are kept and each is prefixed with a page marker.
 */
export class PlainTextExtractor implements DocumentExtractor {
  constructor(private load: DocumentLoader) {}

  async extract(input: InputHandle, options: ExtractOptions): Promise<ExtractionOutput> {
    let bytes: Uint8Array;
    try {
      bytes = await this.load(input.uri, options.signal);
    } catch (error) {
      throw new StageFailure(`Failed to read document: ${errorMessage(error)}`, { cause: error });
    }

    let raw: string;
    try {
      raw = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw new StageFailure('Document is not valid UTF-8 text', { cause: error });
    }

    return assemblePages(splitPages(raw), input, options);
  }
}
