/**
 * Stage registry: the fixed stage order and the adapter that checks a stage's
 * required slots and commits its result.
 */

import { stageNameEnum, type StageName } from '@exitready/schemas';
import { finalizeStage } from '../finalize/finalize-agent.js';
import { intakeStage } from '../intake/intake-agent.js';
import { qaStage } from '../qa/qa-agent.js';
import { researchStage } from '../research/research-agent.js';
import { scoringStage } from '../scoring/scoring-agent.js';
import { MissingContextError } from '../shared/errors.js';
import {
  hasSlots,
  missingSlots,
  type RunContext,
  type StageDefinition,
  type StageEnv,
  type StageOutcome,
  type StageResults,
} from '../shared/run-context.js';
import { summaryStage } from '../summary/summary-agent.js';

export const STAGE_ORDER: readonly StageName[] = stageNameEnum.options;

export interface RegisteredStage {
  name: StageName;
  requires: readonly StageName[];
  execute(context: RunContext, env: StageEnv): Promise<StageOutcome>;
}

type WritableSlots = { [K in StageName]?: StageResults[K] };

function setSlot<N extends StageName>(slots: WritableSlots, name: N, value: StageResults[N]): void {
  slots[name] = value;
}

/** Freeze a stage result and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function defineStage<N extends StageName, K extends StageName>(
  definition: StageDefinition<N, K>,
): RegisteredStage {
  const { name, requires } = definition;

  return {
    name,
    requires,
    async execute(context, env) {
      if (!hasSlots(context, requires)) {
        const error = new MissingContextError(name, missingSlots(context, requires));
        return { ok: false, stage: name, failure: { kind: error.kind, message: error.message }, context };
      }
      if (context.results[name] !== undefined) {
        throw new Error(`Result slot "${name}" has already been written`);
      }

      const body = await definition.run(context, env);
      if (!body.ok) {
        return { ok: false, stage: name, failure: body.failure, context };
      }

      const results: WritableSlots = { ...context.results };
      setSlot(results, name, deepFreeze(body.result));
      const log = [
        ...context.log,
        `[${name}] ${body.status}`,
        ...(body.warnings ?? []).map((warning) => `WARN [${name}] ${warning}`),
      ];
      return { ok: true, context: { ...context, results, log } };
    },
  };
}

export const PIPELINE_STAGES: readonly RegisteredStage[] = [
  defineStage(intakeStage),
  defineStage(researchStage),
  defineStage(scoringStage),
  defineStage(summaryStage),
  defineStage(qaStage),
  defineStage(finalizeStage),
];
