/**
 * Pipeline orchestrator: runs the stages in order over an immutable run
 * context and converts every failure into the context's `error` field.
 */

import { DEFAULT_MAX_RETRIES, StructuredOutputError } from '@exitready/llm';
import type { StageName } from '@exitready/schemas';
import { errorMessage, PipelineError } from '../shared/errors.js';
import { StageLogger } from '../shared/logger.js';
import type {
  PipelineDeps,
  RunContext,
  RunError,
  RunErrorKind,
  StageEnv,
  StageOutcome,
} from '../shared/run-context.js';
import { PIPELINE_STAGES, type RegisteredStage } from './registry.js';

export interface PipelineInput {
  runId: string;
  submission: Record<string, unknown>;
}

export interface PipelineOptions {
  signal?: AbortSignal;
  /** Coercion-layer retries per structured call (default 2). */
  maxRetries?: number;
  /** Override the stage list; defaults to the six registered stages. */
  stages?: readonly RegisteredStage[];
}

function createContext(input: PipelineInput, startedAt: Date): RunContext {
  return {
    runId: input.runId,
    submission: Object.freeze({ ...input.submission }),
    results: {},
    currentStage: 'pending',
    durations: {},
    log: [],
    startedAt: startedAt.toISOString(),
  };
}

/** Copy the business descriptors onto the context once intake has run. */
function withDescriptors(context: RunContext): RunContext {
  const intake = context.results.intake;
  if (!intake || context.industry !== undefined) return context;
  const { anonymized } = intake;
  return {
    ...context,
    industry: anonymized.industry,
    region: anonymized.location,
    revenueBand: anonymized.revenueRange,
    exitTimeline: anonymized.exitTimeline,
  };
}

function classify(err: unknown, signal: AbortSignal | undefined): RunErrorKind {
  if (signal?.aborted) return 'Cancelled';
  if (err instanceof PipelineError) return err.kind;
  if (err instanceof StructuredOutputError) return err.kind;
  return 'UnexpectedError';
}

function fail(context: RunContext, error: RunError): RunContext {
  return {
    ...context,
    error,
    log: [...context.log, `ERROR [${error.stage}] ${error.kind}: ${error.message}`],
  };
}

/**
 * Run one assessment through every stage. Never throws: failures, cancellation
 * and unexpected exceptions all come back as `context.error`.
 */
export async function runPipeline(
  input: PipelineInput,
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<RunContext> {
  const now = deps.now ?? (() => new Date());
  const { signal } = options;
  const logger = new StageLogger(`pipeline:${input.runId}`, now);
  const stages = options.stages ?? PIPELINE_STAGES;

  let context = createContext(input, now());
  logger.info('Run started', { stages: stages.map((s) => s.name) });

  for (const stage of stages) {
    if (signal?.aborted) {
      context = fail(context, { kind: 'Cancelled', stage: stage.name, message: 'Run cancelled before stage started' });
      break;
    }

    context = { ...context, currentStage: stage.name };
    const started = now().getTime();
    const env: StageEnv = {
      deps,
      logger: logger.child(stage.name),
      signal,
      now,
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    };

    let outcome: StageOutcome | undefined;
    let thrown: unknown;
    try {
      outcome = await stage.execute(context, env);
    } catch (err) {
      thrown = err;
    }

    const duration = now().getTime() - started;
    context = { ...context, durations: { ...context.durations, [stage.name]: duration } };

    const error = stageError(stage.name, outcome, thrown, signal);
    if (error) {
      logger.error(`Stage ${stage.name} failed`, error);
      context = fail(context, error);
      break;
    }
    if (outcome?.ok) {
      context = withDescriptors({ ...outcome.context, durations: context.durations });
      logger.info(`Stage ${stage.name} complete`, { durationMs: duration });
    }
  }

  const completedAt = now().toISOString();
  logger.info('Run finished', { error: context.error?.kind ?? null });
  return { ...context, completedAt, logEntries: logger.getLogs() };
}

function stageError(
  stage: StageName,
  outcome: StageOutcome | undefined,
  thrown: unknown,
  signal: AbortSignal | undefined,
): RunError | undefined {
  // A stage that finished after cancellation still has its result discarded.
  if (signal?.aborted) {
    return { kind: 'Cancelled', stage, message: 'Run cancelled' };
  }
  if (outcome === undefined) {
    return { kind: classify(thrown, signal), stage, message: errorMessage(thrown) };
  }
  if (!outcome.ok) {
    return { kind: outcome.failure.kind, stage: outcome.stage, message: outcome.failure.message };
  }
  return undefined;
}
