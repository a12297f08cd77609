import { ALL_ENTITY_TYPES, countEntities, groupEntities } from '../entities/grouping.js';
import type { Entity, EntityOutput, EntityType, JobConfig } from '../types/job.js';
import { type Stage, type StageContext, type StageResult, requireResult, succeed } from './base.js';

export interface EntityRecognizer {
  recognize(text: string, types: readonly EntityType[], signal: AbortSignal): Promise<Entity[]>;
}

export class EntityStage implements Stage<'extractEntities'> {
  readonly name = 'extractEntities' as const;

  constructor(private recognizer: EntityRecognizer) {}

  isEnabled(config: JobConfig): boolean {
    return config.extractEntities;
  }

  async run(context: StageContext): Promise<StageResult<EntityOutput>> {
    const { text } = requireResult(context, 'extract');
    const types = context.config.entityTypes ?? ALL_ENTITY_TYPES;

    const entities = await this.recognizer.recognize(text, types, context.signal);
    const output = groupEntities(entities);

    context.logger.info({ count: countEntities(output) }, 'extracted entities');
    return succeed(output);
  }
}
