import type { Entity, EntityOutput, EntityType } from '../types/job.js';

export const ALL_ENTITY_TYPES: readonly EntityType[] = ['date', 'money', 'person', 'organization', 'location'];

const GROUP_KEYS: Record<EntityType, keyof EntityOutput> = {
  date: 'dates',
  money: 'money',
  person: 'people',
  organization: 'organizations',
  location: 'locations',
};

export function emptyEntityOutput(): EntityOutput {
  return { dates: [], money: [], people: [], organizations: [], locations: [] };
}

export function groupEntities(entities: readonly Entity[]): EntityOutput {
  const output = emptyEntityOutput();
  for (const entity of entities) {
    output[GROUP_KEYS[entity.type]].push(entity);
  }
  return output;
}

export function countEntities(output: EntityOutput): number {
  return output.dates.length
    + output.money.length
    + output.people.length
    + output.organizations.length
    + output.locations.length;
}

/** One entity per (type, text); the highest confidence wins, first-seen order is kept. */
export function dedupeEntities(entities: readonly Entity[]): Entity[] {
  const seen = new Map<string, Entity>();
  for (const entity of entities) {
    const key = `${entity.type}\u0000${entity.text}`;
    const existing = seen.get(key);
    if (!existing || entity.confidence > existing.confidence) {
      seen.set(key, entity);
    }
  }
  return Array.from(seen.values());
}
