/**
 * Small text and number helpers shared by the scoring and research code.
 */

export function round1(value: number): number {
  const rounded = Math.round(value * 10) / 10;
  return rounded === 0 ? 0 : rounded;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** First run of digits in the text, or null. */
export function firstInteger(text: string): number | null {
  const match = text.match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : null;
}

export function allIntegers(text: string): number[] {
  return (text.match(/\d+/g) ?? []).map((n) => Number.parseInt(n, 10));
}

export function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+(?:'[a-z]+)?/g) ?? [];
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
