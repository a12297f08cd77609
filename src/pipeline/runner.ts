import type { Logger } from 'pino';
import { errorMessage } from '../errors.js';
import type { Stage, StageContext } from '../stages/base.js';
import type {
  CheckpointOutcome,
  InputHandle,
  JobConfig,
  PartialResults,
  StageName,
} from '../types/job.js';

export interface StageFinishEvent {
  stage: StageName;
  outcome: CheckpointOutcome;
  startedAt: Date;
  finishedAt: Date;
  /** Only the finished stage's own output, when it succeeded. */
  output?: PartialResults;
  error?: string;
}

/** Called at stage boundaries; a hook that throws aborts the run with that error. */
export interface RunHooks {
  onStageStart?(stage: StageName, startedAt: Date): Promise<void> | void;
  onStageFinish?(event: StageFinishEvent): Promise<void> | void;
}

export interface PipelineRun {
  jobId: string;
  input: InputHandle;
  config: JobConfig;
  /** Outputs from an earlier attempt; their stages are not run again. */
  initialResults?: PartialResults;
  signal: AbortSignal;
  logger: Logger;
  hooks?: RunHooks;
}

export type PipelineOutcome =
  | { status: 'completed'; results: PartialResults }
  | { status: 'failed'; results: PartialResults; failure: { stage: StageName; message: string } }
  | { status: 'cancelled'; results: PartialResults; stage: StageName | null };

type StageExecution =
  | { ok: true; output: PartialResults }
  | { ok: false; message: string };

/**
 * Runs stages in order. The runner never touches the job store: progress leaves
 * through the hooks and the outcome is returned to the caller. Cancellation is
 * checked at every stage boundary and output produced after an abort is dropped.
 */
export class PipelineRunner {
  constructor(private readonly stages: readonly Stage[]) {}

  get stageNames(): StageName[] {
    return this.stages.map(stage => stage.name);
  }

  async run(run: PipelineRun): Promise<PipelineOutcome> {
    const { signal, hooks } = run;
    const results: PartialResults = { ...run.initialResults };

    for (const stage of this.stages) {
      if (signal.aborted) {
        return { status: 'cancelled', results, stage: stage.name };
      }

      if (results[stage.name] !== undefined) {
        run.logger.debug({ stage: stage.name }, 'reusing stage output from earlier attempt');
        continue;
      }

      if (stage.isEnabled && !stage.isEnabled(run.config)) {
        const now = new Date();
        await hooks?.onStageFinish?.({ stage: stage.name, outcome: 'skipped', startedAt: now, finishedAt: now });
        continue;
      }

      const startedAt = new Date();
      await hooks?.onStageStart?.(stage.name, startedAt);

      const logger = run.logger.child({ stage: stage.name });
      const execution = await this.execute(stage, {
        jobId: run.jobId,
        input: run.input,
        config: run.config,
        results: { ...results },
        signal,
        logger,
      });
      const finishedAt = new Date();

      if (signal.aborted) {
        await hooks?.onStageFinish?.({ stage: stage.name, outcome: 'cancelled', startedAt, finishedAt });
        return { status: 'cancelled', results, stage: stage.name };
      }

      if (!execution.ok) {
        logger.warn({ error: execution.message }, 'stage failed');
        await hooks?.onStageFinish?.({
          stage: stage.name,
          outcome: 'failed',
          startedAt,
          finishedAt,
          error: execution.message,
        });
        return { status: 'failed', results, failure: { stage: stage.name, message: execution.message } };
      }

      Object.assign(results, execution.output);
      await hooks?.onStageFinish?.({
        stage: stage.name,
        outcome: 'succeeded',
        startedAt,
        finishedAt,
        output: execution.output,
      });
    }

    if (signal.aborted) {
      return { status: 'cancelled', results, stage: null };
    }
    return { status: 'completed', results };
  }

  private async execute<K extends StageName>(stage: Stage<K>, context: StageContext): Promise<StageExecution> {
    try {
      const result = await stage.run(context);
      if (!result.ok) {
        return { ok: false, message: result.error.message };
      }
      const output: PartialResults = {};
      output[stage.name] = result.output;
      return { ok: true, output };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }
}
