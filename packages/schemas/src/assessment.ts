import { z } from 'zod';

export const QUESTION_IDS = ['q1', 'q2', 'q3', 'q4', 'q5', 'q6', 'q7', 'q8', 'q9', 'q10'] as const;
export type QuestionId = (typeof QUESTION_IDS)[number];

/** Questionnaire answers arrive as text or as 0-10 scale numbers; both are kept as trimmed text. */
const answerSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'Response is required'));

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const questionnaireResponsesSchema = z.object({
  q1: answerSchema,
  q2: answerSchema,
  q3: answerSchema,
  q4: answerSchema,
  q5: answerSchema,
  q6: answerSchema,
  q7: answerSchema,
  q8: answerSchema,
  q9: answerSchema,
  q10: answerSchema,
});
export type QuestionnaireResponses = z.infer<typeof questionnaireResponsesSchema>;

// Form tools post snake_case field names.
const FIELD_ALIASES: Record<string, string> = {
  years_in_business: 'yearsInBusiness',
  exit_timeline: 'exitTimeline',
  age_range: 'ageRange',
  revenue_range: 'revenueRange',
  company_name: 'companyName',
};

function normalizeFieldNames(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return input;
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const target = FIELD_ALIASES[key] ?? key;
    if (!(target in normalized) || key === target) normalized[target] = value;
  }
  return normalized;
}

export const questionnaireSchema = z.preprocess(
  normalizeFieldNames,
  z.object({
    name: requiredText('Name'),
    email: requiredText('Email'),
    industry: requiredText('Industry'),
    yearsInBusiness: requiredText('Years in business'),
    exitTimeline: requiredText('Exit timeline'),
    location: requiredText('Location'),
    ageRange: optionalText,
    revenueRange: optionalText,
    companyName: optionalText,
    responses: questionnaireResponsesSchema,
  }),
);
export type Questionnaire = z.infer<typeof questionnaireSchema>;

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}
