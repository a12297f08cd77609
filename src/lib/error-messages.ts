// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  BAD_QUERY_PARAMS: "Invalid query parameters",
  BAD_PATH_PARAMS: "Invalid path parameters",
  JOB_NOT_FOUND: "Job not found",
  JOB_ALREADY_RUNNING: "Job is already running",
  JOB_NOT_STARTABLE: "Only pending jobs can be started",
  JOB_RUNNING_DELETE: "Job is running, cancel it before deleting",
  JOB_ALREADY_FINISHED: "Job has already finished",
  INVALID_TRANSITION: "Job changed state while the request was applied",
  DOCUMENT_OUTSIDE_ROOT: "Document uri must resolve inside the document root",
  DOCUMENT_URI_UNSUPPORTED: "Document uri must be a path or a file: URL",
  RUN_DEADLINE: "Job exceeded maximum run time of {ms} ms",
  BACKEND_NOT_CONFIGURED: "Summarization backend '{backend}' is not configured",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Optional tiny templating for limits/caps
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}`, "g"), String(v));
  return s;
}
