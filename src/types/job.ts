export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export type SummaryMode = 'brief' | 'detailed' | 'bullets';
export type SummarizerBackend = 'openai' | 'hf' | 'extractive';
export type EntityType = 'date' | 'money' | 'person' | 'organization' | 'location';

/** Reference to the source document. The core never reads the bytes itself. */
export interface InputHandle {
  uri: string;
  filename?: string;
  sizeBytes?: number;
  mediaType?: string;
}

/** Parameters fixed at submission and passed untouched to every stage. */
export interface JobConfig {
  summaryMode: SummaryMode;
  backend: SummarizerBackend;
  extractEntities: boolean;
  entityTypes: EntityType[] | null; // null = all types
  maxPages: number;
  extractTables: boolean;
}

export interface Entity {
  type: EntityType;
  text: string;
  value: string | number | null; // normalised: ISO date, parsed amount, or the text
  confidence: number; // 0..1
}

export interface ExtractedTable {
  page: number;
  tableIndex: number;
  rows: string[][];
}

export interface ExtractionOutput {
  text: string;
  tables: ExtractedTable[];
  pageCount: number;
  pagesProcessed: number;
  metadata: Record<string, string>;
}

export interface EntityOutput {
  dates: Entity[];
  money: Entity[];
  people: Entity[];
  organizations: Entity[];
  locations: Entity[];
}

export interface SummaryOutput {
  summary: string;
  mode: SummaryMode;
  backend: SummarizerBackend;
  model: string;
}

/** Output type of every stage, keyed by stage name. */
export interface StageOutputs {
  extract: ExtractionOutput;
  extractEntities: EntityOutput;
  summarize: SummaryOutput;
}

export type StageName = keyof StageOutputs;

export type PartialResults = { [K in StageName]?: StageOutputs[K] };

export type CheckpointOutcome = 'succeeded' | 'failed' | 'skipped' | 'cancelled';

export interface Checkpoint {
  stageName: StageName;
  startedAt: Date;
  finishedAt: Date | null;
  outcome: CheckpointOutcome | null;
}

export interface JobError {
  stage: StageName | null; // null when the run broke outside a stage
  message: string;
}

export interface ResultMetadata {
  backend: SummarizerBackend;
  model: string;
  summaryMode: SummaryMode;
  entityCount: number;
  textLength: number;
  pagesProcessed: number;
  tablesExtracted: number;
}

export interface FinalResult {
  summary: string;
  entities: EntityOutput;
  metadata: ResultMetadata;
}

export interface Job {
  id: string; // ULID
  status: JobStatus;
  message: string;
  input: InputHandle;
  config: JobConfig;
  plan: StageName[];
  progress: Checkpoint[];
  partialResults: PartialResults;
  finalResult: FinalResult | null;
  error: JobError | null;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export interface CreateJobData {
  input: InputHandle;
  config: JobConfig;
  plan: StageName[];
}

export interface JobQuery {
  status?: JobStatus;
  limit?: number;
}

export interface JobUpdate {
  status?: JobStatus;
  message?: string;
  /** Appends a new checkpoint, or finishes the open checkpoint of the same stage. */
  checkpoint?: Checkpoint;
  partialResults?: PartialResults;
  finalResult?: FinalResult;
  error?: JobError;
  startedAt?: Date;
  finishedAt?: Date;
}

export type JobMutation = (job: Readonly<Job>) => JobUpdate;

export interface JobStats {
  total: number;
  byStatus: Record<JobStatus, number>;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const STAGE_NAMES: readonly StageName[] = ['extract', 'extractEntities', 'summarize'];
