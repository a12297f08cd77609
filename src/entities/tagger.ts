import type { EntityType } from '../types/job.js';

export type NamedEntityType = Extract<EntityType, 'person' | 'organization' | 'location'>;

export interface TaggedSpan {
  type: NamedEntityType;
  text: string;
}

/** Finds people, organisations and places. Backed by whatever NER model is available. */
export interface NamedEntityTagger {
  tag(text: string, signal: AbortSignal): Promise<TaggedSpan[]>;
}

const HONORIFICS = new Set(['Mr', 'Mrs', 'Ms', 'Dr', 'Prof', 'Sir']);

const ORGANIZATION_SUFFIXES = new Set([
  'Inc', 'Corp', 'Corporation', 'LLC', 'Ltd', 'Limited', 'Co', 'Company', 'Group',
  'Bank', 'University', 'Institute', 'Foundation', 'Association', 'Agency', 'Ministry',
]);

const LOCATION_WORDS = new Set([
  'City', 'County', 'Province', 'Governorate', 'Republic', 'Kingdom', 'Island', 'Islands',
  'River', 'Valley', 'Street', 'Avenue',
]);

// Sentence-initial words the capitalised run picks up
const LEADING_DETERMINER = /^(?:The|A|An|This|That)\s+/;

// Runs of capitalised words, optionally joined by "of"/"and"
const CAPITALISED_RUN = /\b[A-Z][a-zA-Z&'-]*\.?(?:\s+(?:of\s+|and\s+)?[A-Z][a-zA-Z&'-]*\.?)+/g;

function words(span: string): string[] {
  return span.split(/\s+/).map(word => word.replace(/\.$/, ''));
}

/**
 * Rule-based tagger for when no NER model is configured. It only reports spans
 * with a clear cue: an honorific, an organisation suffix or a place word.
 */
export class HeuristicEntityTagger implements NamedEntityTagger {
  async tag(text: string): Promise<TaggedSpan[]> {
    const spans: TaggedSpan[] = [];

    for (const match of text.matchAll(CAPITALISED_RUN)) {
      const span = match[0].replace(LEADING_DETERMINER, '');
      const parts = words(span);
      const first = parts[0];
      const last = parts[parts.length - 1];

      if (HONORIFICS.has(first) && parts.length > 1) {
        spans.push({ type: 'person', text: parts.slice(1).join(' ') });
      } else if (ORGANIZATION_SUFFIXES.has(last)) {
        spans.push({ type: 'organization', text: span });
      } else if (parts.some(part => LOCATION_WORDS.has(part))) {
        spans.push({ type: 'location', text: span });
      }
    }

    return spans;
  }
}
