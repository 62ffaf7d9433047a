import type { StageName } from '@exitready/schemas';

export type PipelineErrorKind =
  | 'ValidationError'
  | 'CollaboratorUnavailable'
  | 'StructuredOutputError'
  | 'MissingContextError';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** Submission failed schema validation. */
export class ValidationError extends PipelineError {
  readonly kind = 'ValidationError';

  constructor(readonly issues: string[]) {
    super(`Invalid submission: ${issues.join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class CollaboratorUnavailable extends PipelineError {
  readonly kind = 'CollaboratorUnavailable';

  constructor(
    readonly collaborator: string,
    reason: string,
  ) {
    super(`${collaborator} unavailable: ${reason}`);
    this.name = 'CollaboratorUnavailable';
  }
}

/** A stage needed a slot or stored value that an earlier step should have produced. */
export class MissingContextError extends PipelineError {
  readonly kind = 'MissingContextError';

  constructor(
    readonly stage: StageName,
    readonly missing: string[],
  ) {
    super(`${stage} is missing required context: ${missing.join(', ')}`);
    this.name = 'MissingContextError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
