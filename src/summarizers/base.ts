import { z } from 'zod';
import { StageFailure, errorMessage } from '../errors.js';
import type { SummarizerBackend, SummaryMode } from '../types/job.js';

export interface SummarizeOptions {
  signal?: AbortSignal;
}

export interface Summarizer {
  readonly backend: SummarizerBackend;
  readonly model: string;
  summarize(text: string, mode: SummaryMode, options?: SummarizeOptions): Promise<string>;
}

export type SummarizerRegistry = ReadonlyMap<SummarizerBackend, Summarizer>;

interface PostJsonOptions {
  label: string;
  headers: Record<string, string>;
  signal?: AbortSignal;
}

/** POSTs JSON and validates the reply; every failure surfaces as a StageFailure. */
export async function postJson<T>(url: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: PostJsonOptions): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        ...options.headers,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    throw new StageFailure(`${options.label} request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new StageFailure(`${options.label} API error: ${response.status} ${response.statusText}`);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new StageFailure(`${options.label} returned invalid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new StageFailure(`${options.label} returned an unexpected response`, { cause: parsed.error });
  }
  return parsed.data;
}

export function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}
