import type { Questionnaire } from '@exitready/schemas';

/** Placeholder token (e.g. `[OWNER_NAME]`) to the original value. */
export type PiiMapping = Record<string, string>;

export interface RedactionResult {
  anonymized: Questionnaire;
  mapping: PiiMapping;
}

export interface PiiRedactor {
  redact(questionnaire: Questionnaire): RedactionResult;
}

export interface PiiStore {
  put(runId: string, mapping: PiiMapping): Promise<void>;
  get(runId: string): Promise<PiiMapping | undefined>;
  delete(runId: string): Promise<void>;
}

export interface IntakeContact {
  name: string;
  email: string;
  companyName?: string;
  industry: string;
  location: string;
  exitTimeline: string;
}

export interface IntakeEvent {
  runId: string;
  receivedAt: string;
  contact: IntakeContact;
  anonymized: Questionnaire;
}

/** Side-channel recorder (CRM log, response log). Failures never stop a run. */
export interface IntakeSink {
  name: string;
  record(event: IntakeEvent): Promise<void>;
}

export interface SinkReport {
  sink: string;
  ok: boolean;
  error?: string;
}

export interface IntakeResult {
  /** Validated questionnaire with personal data replaced by placeholders. */
  anonymized: Questionnaire;
  placeholders: string[];
  validationWarnings: string[];
  sinks: SinkReport[];
}
