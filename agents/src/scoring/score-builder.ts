import type { ScoringCategory } from '@exitready/schemas';
import { clamp, round1 } from '../shared/text.js';
import { CATEGORY_TABLE } from './categories.js';
import type { CategoryScore, ScoreAdjustment } from './types.js';

export const MIN_SCORE = 1.0;
export const MAX_SCORE = 10.0;

/**
 * Accumulates one category's adjustments, then produces a frozen CategoryScore
 * clamped to [1, 10] at one decimal.
 */
export class ScoreBuilder {
  private running: number;
  private readonly adjustments: ScoreAdjustment[] = [];
  private readonly strengths: string[] = [];
  private readonly gaps: string[] = [];

  constructor(readonly category: ScoringCategory) {
    this.running = CATEGORY_TABLE[category].baseScore;
  }

  adjust(delta: number, reason: string): this {
    const rounded = round1(delta);
    this.running += rounded;
    this.adjustments.push({ delta: rounded, reason });
    return this;
  }

  strength(text: string): this {
    this.strengths.push(text);
    return this;
  }

  gap(text: string): this {
    this.gaps.push(text);
    return this;
  }

  build(industryContext: CategoryScore['industryContext']): CategoryScore {
    const { weight, baseScore } = CATEGORY_TABLE[this.category];
    return Object.freeze({
      category: this.category,
      score: round1(clamp(this.running, MIN_SCORE, MAX_SCORE)),
      weight,
      baseScore,
      strengths: [...this.strengths],
      gaps: [...this.gaps],
      adjustments: this.adjustments.map((a) => ({ ...a })),
      industryContext: { ...industryContext },
    });
  }
}
