import { isValidEmail, questionnaireSchema, type Questionnaire } from '@exitready/schemas';

export type SubmissionValidation =
  | { valid: true; questionnaire: Questionnaire; warnings: string[] }
  | { valid: false; issues: string[] };

/**
 * Validate a raw submission. A malformed email is reported as a warning only.
 */
export function validateSubmission(submission: unknown): SubmissionValidation {
  const parsed = questionnaireSchema.safeParse(submission);
  if (!parsed.success) {
    return {
      valid: false,
      issues: parsed.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
      ),
    };
  }

  const warnings: string[] = [];
  if (!isValidEmail(parsed.data.email)) {
    warnings.push(`Email format looks invalid: ${parsed.data.email}`);
  }

  return { valid: true, questionnaire: parsed.data, warnings };
}
