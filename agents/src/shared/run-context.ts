/**
 * Run context shared by the orchestrator and the stages.
 */

import type { StageName } from '@exitready/schemas';
import type { TextGenerator } from '@exitready/llm';
import type { IntakeResult, IntakeSink, PiiRedactor, PiiStore } from '../intake/types.js';
import type { ResearchClient, ResearchResult } from '../research/types.js';
import type { ScoringResult } from '../scoring/types.js';
import type { SummaryResult } from '../summary/types.js';
import type { QaResult } from '../qa/types.js';
import type { FinalOutput } from '../finalize/types.js';
import type { StageLogger } from './logger.js';
import type { StageLogEntry } from './types.js';

export interface StageResults {
  intake: IntakeResult;
  research: ResearchResult;
  scoring: ScoringResult;
  summary: SummaryResult;
  qa: QaResult;
  finalize: FinalOutput;
}

export type StageSlots = { readonly [K in StageName]?: Readonly<StageResults[K]> };

export type RunErrorKind =
  | 'ValidationError'
  | 'CollaboratorUnavailable'
  | 'StructuredOutputError'
  | 'MissingContextError'
  | 'Cancelled'
  | 'UnexpectedError';

export interface RunError {
  kind: RunErrorKind;
  stage: StageName;
  message: string;
}

export interface RunContext {
  readonly runId: string;
  readonly submission: Readonly<Record<string, unknown>>;
  readonly results: StageSlots;
  readonly currentStage: StageName | 'pending';
  readonly error?: RunError;
  readonly durations: Readonly<Partial<Record<StageName, number>>>;
  readonly log: readonly string[];
  /** Structured entries from the pipeline logger and every stage logger. */
  readonly logEntries?: readonly StageLogEntry[];
  readonly industry?: string;
  readonly region?: string;
  readonly revenueBand?: string;
  readonly exitTimeline?: string;
  readonly startedAt: string;
  readonly completedAt?: string;
}

/** A context whose listed slots are guaranteed to be written. */
export type ContextWith<K extends StageName> = RunContext & {
  readonly results: { readonly [P in K]: Readonly<StageResults[P]> };
};

export function hasSlots<K extends StageName>(
  context: RunContext,
  slots: readonly K[],
): context is ContextWith<K> {
  return slots.every((slot) => context.results[slot] !== undefined);
}

export function missingSlots(context: RunContext, slots: readonly StageName[]): StageName[] {
  return slots.filter((slot) => context.results[slot] === undefined);
}

/** Collaborators injected into every run. */
export interface PipelineDeps {
  generator: TextGenerator;
  research: ResearchClient;
  piiStore: PiiStore;
  redactor?: PiiRedactor;
  sinks?: IntakeSink[];
  now?: () => Date;
}

export interface StageEnv {
  deps: PipelineDeps;
  logger: StageLogger;
  signal?: AbortSignal;
  now: () => Date;
  /** Coercion-layer retries for this run. */
  maxRetries: number;
}

export interface StageFailure {
  kind: Exclude<RunErrorKind, 'Cancelled' | 'UnexpectedError'>;
  message: string;
}

/** What a stage body returns: its slot value, or a failure as a value. */
export type StageBodyResult<R> =
  | { ok: true; result: R; status: string; warnings?: string[] }
  | { ok: false; failure: StageFailure };

/** Result of running one stage against a context. */
export type StageOutcome =
  | { ok: true; context: RunContext }
  | { ok: false; stage: StageName; failure: StageFailure; context: RunContext };

export interface StageDefinition<N extends StageName, K extends StageName> {
  name: N;
  requires: readonly K[];
  run(context: ContextWith<K>, env: StageEnv): Promise<StageBodyResult<StageResults[N]>>;
}
