/**
 * Prompt template utilities for consistent LLM interactions.
 */

/**
 * Build a prompt by substituting `{name}` variables into a template.
 * Unknown placeholders are left as they are.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(variables)) {
    result = result.split(`{${key}}`).join(value);
  }
  return result;
}

/**
 * Structured output mode needs the word JSON in the system prompt.
 */
export function withJsonInstruction(system: string): string {
  if (/json/i.test(system)) return system;
  const base = system.trim();
  return `${base}${base ? '\n\n' : ''}Always respond with a single valid JSON object.`;
}

/**
 * Cap a block of report text for inclusion in a prompt.
 */
export function truncateForPrompt(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n[truncated]`;
}
