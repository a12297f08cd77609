import type { Logger } from 'pino';
import { StageFailure } from '../errors.js';
import type {
  InputHandle,
  JobConfig,
  PartialResults,
  StageName,
  StageOutputs,
} from '../types/job.js';

export interface StageContext {
  jobId: string;
  input: InputHandle;
  config: JobConfig;
  /** Outputs of every stage that already ran, by stage name. */
  results: Readonly<PartialResults>;
  signal: AbortSignal;
  logger: Logger;
}

export interface StageErrorDetail {
  message: string;
}

export type StageResult<T> =
  | { ok: true; output: T }
  | { ok: false; error: StageErrorDetail };

/**
 * One pipeline step. Stages read the context and return an output or a failure;
 * they never write job state. Throwing is the same as returning a failure.
 */
export interface Stage<K extends StageName = StageName> {
  readonly name: K;
  /** Stages that opt out for a config are recorded as skipped. */
  isEnabled?(config: JobConfig): boolean;
  run(context: StageContext): Promise<StageResult<StageOutputs[K]>>;
}

export function succeed<T>(output: T): StageResult<T> {
  return { ok: true, output };
}

export function failStage(message: string): StageResult<never> {
  return { ok: false, error: { message } };
}

/** Output of an earlier stage this one depends on. */
export function requireResult<K extends StageName>(context: StageContext, name: K): StageOutputs[K] {
  const output = context.results[name];
  if (output === undefined) {
    throw new StageFailure(`Stage ${name} has not produced an output yet`);
  }
  return output;
}
