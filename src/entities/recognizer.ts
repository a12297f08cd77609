import type { EntityRecognizer } from '../stages/entities.js';
import type { Entity, EntityType } from '../types/job.js';
import { reclassifyEntity, shouldKeepEntity } from './filters.js';
import { dedupeEntities } from './grouping.js';
import { extractDates, extractMoney } from './patterns.js';
import type { NamedEntityTagger, NamedEntityType } from './tagger.js';

export const NAMED_ENTITY_CONFIDENCE = 0.85;

function isNamedType(type: EntityType): type is NamedEntityType {
  return type === 'person' || type === 'organization' || type === 'location';
}

/**
 * Dates and amounts come from patterns; people, organisations and places from
 * the tagger, after noise filtering.
 */
export class PatternEntityRecognizer implements EntityRecognizer {
  constructor(private tagger: NamedEntityTagger | null = null) {}

  async recognize(text: string, types: readonly EntityType[], signal: AbortSignal): Promise<Entity[]> {
    if (!text.trim()) return [];

    const entities: Entity[] = [];
    if (types.includes('date')) entities.push(...extractDates(text));
    if (types.includes('money')) entities.push(...extractMoney(text));

    const namedTypes = types.filter(isNamedType);
    if (namedTypes.length > 0 && this.tagger) {
      const spans = await this.tagger.tag(text, signal);
      for (const span of spans) {
        if (!namedTypes.includes(span.type) || !shouldKeepEntity(span.text)) continue;
        entities.push({
          type: reclassifyEntity(span.text, span.type),
          text: span.text,
          value: span.text,
          confidence: NAMED_ENTITY_CONFIDENCE,
        });
      }
    }

    return dedupeEntities(entities);
  }
}
