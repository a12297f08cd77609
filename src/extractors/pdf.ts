import { extractText, getDocumentProxy, getMeta } from 'unpdf';
import { StageFailure, errorMessage } from '../errors.js';
import type { DocumentExtractor, ExtractOptions } from '../stages/extract.js';
import type { ExtractionOutput, InputHandle } from '../types/job.js';
import { type DocumentLoader, assemblePages } from './plain-text.js';

export interface PdfContent {
  pages: string[];
  /** The document information dictionary, keyed as in the file (`Title`, `Author`, ...) */
  info: Record<string, unknown>;
}

export type PdfParser = (bytes: Uint8Array) => Promise<PdfContent>;

export const parsePdf: PdfParser = async (bytes) => {
  const pdf = await getDocumentProxy(bytes);
  try {
    const { text } = await extractText(pdf, { mergePages: false });
    const { info } = await getMeta(pdf);
    return {
      pages: Array.isArray(text) ? text : [text],
      info: typeof info === 'object' && info !== null ? info : {},
    };
  } finally {
    await pdf.destroy();
  }
};

const INFO_FIELDS = {
  Title: 'title',
  Author: 'author',
  Subject: 'subject',
  Creator: 'creator',
  Producer: 'producer',
  CreationDate: 'creationDate',
} as const;

function infoMetadata(info: Record<string, unknown>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [field, key] of Object.entries(INFO_FIELDS)) {
    const value = info[field];
    if (typeof value === 'string' && value.trim() !== '') {
      metadata[key] = value.trim();
    }
  }
  return metadata;
}

/** Text layer of a PDF, one entry per page, with the information dictionary as metadata. */
export class PdfExtractor implements DocumentExtractor {
  constructor(private load: DocumentLoader, private parse: PdfParser = parsePdf) {}

  async extract(input: InputHandle, options: ExtractOptions): Promise<ExtractionOutput> {
    let bytes: Uint8Array;
    try {
      bytes = await this.load(input.uri, options.signal);
    } catch (error) {
      throw new StageFailure(`Failed to read document: ${errorMessage(error)}`, { cause: error });
    }

    let content: PdfContent;
    try {
      content = await this.parse(bytes);
    } catch (error) {
      throw new StageFailure(`Failed to parse PDF: ${errorMessage(error)}`, { cause: error });
    }

    return assemblePages(content.pages, input, options, infoMetadata(content.info));
  }
}
