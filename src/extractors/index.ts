import type { DocumentExtractor, ExtractOptions } from '../stages/extract.js';
import type { ExtractionOutput, InputHandle } from '../types/job.js';
import { DocumentRoot } from './document-root.js';
import { PdfExtractor } from './pdf.js';
import { PlainTextExtractor } from './plain-text.js';

export { DocumentRoot } from './document-root.js';
export { PdfExtractor, type PdfContent, type PdfParser } from './pdf.js';
export { PlainTextExtractor, type DocumentLoader } from './plain-text.js';

export function isPdf(input: InputHandle): boolean {
  if (input.mediaType) {
    return input.mediaType.toLowerCase() === 'application/pdf';
  }
  return /\.pdf$/i.test(input.filename ?? input.uri);
}

/** Picks the extractor by media type, falling back to the file extension. */
export class DocumentRouter implements DocumentExtractor {
  constructor(
    private root: DocumentRoot,
    private pdf: DocumentExtractor = new PdfExtractor(root.load),
    private text: DocumentExtractor = new PlainTextExtractor(root.load)
  ) {}

  validate(input: InputHandle): void {
    this.root.resolve(input.uri);
  }

  extract(input: InputHandle, options: ExtractOptions): Promise<ExtractionOutput> {
    return (isPdf(input) ? this.pdf : this.text).extract(input, options);
  }
}
