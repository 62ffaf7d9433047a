/**
 * @exitready/schemas - questionnaire schema and shared enums
 */

export * from './enums.js';
export * from './assessment.js';
