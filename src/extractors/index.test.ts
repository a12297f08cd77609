import { describe, it, expect } from 'vitest';
import { DocumentRoot, DocumentRouter, isPdf } from './index.js';
import type { DocumentExtractor } from '../stages/extract.js';
import type { InputHandle } from '../types/job.js';

const signal = new AbortController().signal;

function named(name: string): DocumentExtractor {
  return {
    extract: async () => ({ text: name, tables: [], pageCount: 1, pagesProcessed: 1, metadata: {} }),
  };
}

describe('isPdf', () => {
  it('should prefer the media type over the extension', () => {
    expect(isPdf({ uri: 'a.bin', mediaType: 'application/PDF' })).toBe(true);
    expect(isPdf({ uri: 'a.pdf', mediaType: 'text/plain' })).toBe(false);
    expect(isPdf({ uri: 'upload-17', filename: 'Scan.PDF' })).toBe(true);
    expect(isPdf({ uri: 'notes.txt' })).toBe(false);
  });
});

describe('DocumentRouter', () => {
  const router = new DocumentRouter(new DocumentRoot('/srv/docs'), named('pdf'), named('text'));

  it('should dispatch on the document type', async () => {
    const run = async (input: InputHandle) => (await router.extract(input, { maxPages: 3, extractTables: true, signal })).text;

    expect(await run({ uri: 'q1.pdf' })).toBe('pdf');
    expect(await run({ uri: 'q1.txt' })).toBe('text');
  });

  it('should validate uris against the root', () => {
    expect(() => router.validate({ uri: 'q1.pdf' })).not.toThrow();
    expect(() => router.validate({ uri: '/etc/passwd' })).toThrow('Document uri must resolve inside the document root');
  });
});
