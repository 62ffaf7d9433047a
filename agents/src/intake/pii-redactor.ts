import type { Questionnaire, QuestionnaireResponses } from '@exitready/schemas';
import type { PiiMapping, PiiRedactor, RedactionResult } from './types.js';

export const OWNER_NAME_TOKEN = '[OWNER_NAME]';
export const EMAIL_TOKEN = '[EMAIL]';
export const COMPANY_NAME_TOKEN = '[COMPANY_NAME]';

/** Any placeholder this redactor can emit. */
export const PII_TOKEN_PATTERN = /\[(?:OWNER_NAME|EMAIL|COMPANY_NAME|EMAIL_\d+|PHONE_\d+)\]/g;

export function piiTokensIn(text: string): string[] {
  return [...new Set(text.match(PII_TOKEN_PATTERN) ?? [])];
}

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function replaceLiteral(text: string, value: string, token: string): string {
  if (value.length < 3) return text;
  return text.replace(new RegExp(`(?<![\\w])${escapeRegExp(value)}(?![\\w])`, 'gi'), token);
}

/**
 * Default redactor: owner name, owner email and company name become fixed
 * tokens; other emails and phone numbers in free-text answers become numbered
 * `[EMAIL_n]` / `[PHONE_n]` tokens.
 */
export class PatternPiiRedactor implements PiiRedactor {
  redact(questionnaire: Questionnaire): RedactionResult {
    const mapping: PiiMapping = {
      [OWNER_NAME_TOKEN]: questionnaire.name,
      [EMAIL_TOKEN]: questionnaire.email,
    };
    if (questionnaire.companyName) {
      mapping[COMPANY_NAME_TOKEN] = questionnaire.companyName;
    }

    let emailCount = 0;
    let phoneCount = 0;

    const scrub = (text: string): string => {
      let result = replaceLiteral(text, questionnaire.email, EMAIL_TOKEN);
      result = result.replace(EMAIL_PATTERN, (found) => {
        emailCount += 1;
        const token = `[EMAIL_${emailCount}]`;
        mapping[token] = found;
        return token;
      });
      result = result.replace(PHONE_PATTERN, (found) => {
        phoneCount += 1;
        const token = `[PHONE_${phoneCount}]`;
        mapping[token] = found;
        return token;
      });
      result = replaceLiteral(result, questionnaire.name, OWNER_NAME_TOKEN);
      if (questionnaire.companyName) {
        result = replaceLiteral(result, questionnaire.companyName, COMPANY_NAME_TOKEN);
      }
      return result;
    };

    const responses: QuestionnaireResponses = {
      q1: scrub(questionnaire.responses.q1),
      q2: scrub(questionnaire.responses.q2),
      q3: scrub(questionnaire.responses.q3),
      q4: scrub(questionnaire.responses.q4),
      q5: scrub(questionnaire.responses.q5),
      q6: scrub(questionnaire.responses.q6),
      q7: scrub(questionnaire.responses.q7),
      q8: scrub(questionnaire.responses.q8),
      q9: scrub(questionnaire.responses.q9),
      q10: scrub(questionnaire.responses.q10),
    };

    return {
      anonymized: {
        ...questionnaire,
        name: OWNER_NAME_TOKEN,
        email: EMAIL_TOKEN,
        companyName: questionnaire.companyName ? COMPANY_NAME_TOKEN : undefined,
        responses,
      },
      mapping,
    };
  }
}
