/**
 * Intake stage: validate the submission, redact PII, store the mapping and
 * notify the intake sinks.
 */

import { ValidationError } from '../shared/errors.js';
import type { StageDefinition } from '../shared/run-context.js';
import { validateSubmission } from './form-validator.js';
import { PatternPiiRedactor } from './pii-redactor.js';
import { recordToSinks } from './sinks.js';
import type { IntakeEvent } from './types.js';

const defaultRedactor = new PatternPiiRedactor();

export const intakeStage: StageDefinition<'intake', never> = {
  name: 'intake',
  requires: [],

  async run(context, env) {
    const { logger } = env;
    const validation = validateSubmission(context.submission);

    if (!validation.valid) {
      const error = new ValidationError(validation.issues);
      logger.warn('Submission failed validation', { issues: error.issues });
      return { ok: false, failure: { kind: error.kind, message: error.message } };
    }

    const { questionnaire } = validation;
    const redactor = env.deps.redactor ?? defaultRedactor;
    const { anonymized, mapping } = redactor.redact(questionnaire);

    await env.deps.piiStore.put(context.runId, mapping);
    logger.info('Stored PII mapping', { placeholders: Object.keys(mapping).length });

    const event: IntakeEvent = {
      runId: context.runId,
      receivedAt: env.now().toISOString(),
      contact: {
        name: questionnaire.name,
        email: questionnaire.email,
        companyName: questionnaire.companyName,
        industry: questionnaire.industry,
        location: questionnaire.location,
        exitTimeline: questionnaire.exitTimeline,
      },
      anonymized,
    };
    const sinks = await recordToSinks(env.deps.sinks ?? [], event);

    const warnings = [
      ...validation.warnings,
      ...sinks
        .filter((report) => !report.ok)
        .map((report) => `Intake sink ${report.sink} failed: ${report.error ?? 'unknown error'}`),
    ];
    for (const warning of warnings) logger.warn(warning);

    return {
      ok: true,
      result: {
        anonymized,
        placeholders: Object.keys(mapping),
        validationWarnings: validation.warnings,
        sinks,
      },
      status: `Intake complete: ${questionnaire.industry}, ${Object.keys(mapping).length} PII value(s) redacted`,
      warnings,
    };
  },
};
