// src/lib/error-normaliser.ts
import { msg, type ErrKey } from './error-messages.js';

export interface PublicError {
  type: string;              // taxonomy code
  message: string;           // public phrase
}

interface NormaliserInput {
  type: string;              // taxonomy code e.g. BAD_INPUT, NOT_FOUND
  key?: ErrKey;              // optional specific catalogue key
}

export function toPublicError(input: NormaliserInput): PublicError {
  const { type, key } = input;

  // Prefer explicit mapping if key provided by the caller
  if (key) return { type, message: msg(key) };

  switch (type) {
    case 'BAD_INPUT':
      return { type, message: msg('BAD_INPUT_SCHEMA') };

    case 'NOT_FOUND':
      return { type, message: msg('JOB_NOT_FOUND') };

    case 'ALREADY_RUNNING':
      return { type, message: msg('JOB_ALREADY_RUNNING') };

    case 'INVALID_TRANSITION':
      return { type, message: msg('INVALID_TRANSITION') };

    case 'INTERNAL':
      return { type, message: msg('INTERNAL_UNEXPECTED') };

    default:
      // Preserve unknown types but don't leak internal details
      return { type, message: msg('INTERNAL_UNEXPECTED') };
  }
}
