import { toPublicError } from './lib/error-normaliser.js';
import { msg, type ErrKey } from './lib/error-messages.js';

export type ErrorType =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'ALREADY_RUNNING'
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'STAGE_FAILURE'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export function errorResponse(type: ErrorType, message: string, hint?: string, fields?: Record<string, unknown>): ApiError {
  return { error: { type, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'NOT_FOUND': return 404;
    case 'ALREADY_RUNNING': return 409;
    case 'CONFLICT': return 409;
    case 'INVALID_TRANSITION': return 409;
    case 'STAGE_FAILURE': return 502;
    case 'INTERNAL':
    default: return 500;
  }
}

export class AppError extends Error {
  readonly type: ErrorType;
  readonly hint?: string;
  readonly fields?: Record<string, unknown>;

  constructor(type: ErrorType, message: string, options: { hint?: string; fields?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.type = type;
    this.hint = options.hint;
    this.fields = options.fields;
  }

  get statusCode(): number {
    return errorTypeToStatus(this.type);
  }
}

/** Bad config or input, rejected before a job exists. */
export class ValidationError extends AppError {
  constructor(message: string, fields?: Record<string, unknown>) {
    super('BAD_INPUT', message, { fields });
    this.name = 'ValidationError';
  }
}

export class JobNotFoundError extends AppError {
  constructor(readonly jobId: string) {
    super('NOT_FOUND', msg('JOB_NOT_FOUND'), { fields: { jobId } });
    this.name = 'JobNotFoundError';
  }
}

export class JobAlreadyRunningError extends AppError {
  constructor(readonly jobId: string) {
    super('ALREADY_RUNNING', msg('JOB_ALREADY_RUNNING'), { fields: { jobId } });
    this.name = 'JobAlreadyRunningError';
  }
}

export type ConflictReason = 'running' | 'notStartable' | 'finished';

const CONFLICT_KEYS: Record<ConflictReason, ErrKey> = {
  running: 'JOB_RUNNING_DELETE',
  notStartable: 'JOB_NOT_STARTABLE',
  finished: 'JOB_ALREADY_FINISHED',
};

export class JobConflictError extends AppError {
  constructor(readonly jobId: string, readonly reason: ConflictReason) {
    super('CONFLICT', msg(CONFLICT_KEYS[reason]), { fields: { jobId, reason } });
    this.name = 'JobConflictError';
  }
}

/**
 * A store write that would break a job invariant. Locking and the state machine
 * keep this from happening during normal operation; seeing one means a writer
 * raced or a caller wrote after the job finished.
 */
export class InvalidTransitionError extends AppError {
  constructor(readonly jobId: string, detail: string) {
    super('INVALID_TRANSITION', `Job ${jobId}: ${detail}`, { fields: { jobId } });
    this.name = 'InvalidTransitionError';
  }
}

/** Thrown by stage collaborators; the runner records it as the job's error. */
export class StageFailure extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('STAGE_FAILURE', message, options);
    this.name = 'StageFailure';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type ReplyLike = { code: (n: number) => { send: (payload: ApiError) => unknown } };

export interface ReplyAppErrorArgs {
  type: ErrorType;
  statusCode?: number;
  key?: ErrKey;            // optional catalogue key for specific phrases
  message?: string;        // optional explicit message
  hint?: string;
  fields?: Record<string, unknown>;
}

export function replyWithAppError(reply: ReplyLike, args: ReplyAppErrorArgs) {
  const publicMessage = args.message ?? toPublicError({ type: args.type, key: args.key }).message;
  const statusCode = args.statusCode ?? errorTypeToStatus(args.type);

  return reply.code(statusCode).send(
    errorResponse(args.type, publicMessage, args.hint, args.fields)
  );
}

/** Maps any thrown value onto the public error shape; unknown errors become INTERNAL. */
export function toReplyArgs(error: unknown): ReplyAppErrorArgs {
  if (!(error instanceof AppError)) {
    return { type: 'INTERNAL' };
  }
  // These carry internal detail; the catalogue phrase stands in for the message
  if (error.type === 'INVALID_TRANSITION' || error.type === 'INTERNAL') {
    return { type: error.type };
  }
  return { type: error.type, message: error.message, hint: error.hint, fields: error.fields };
}
