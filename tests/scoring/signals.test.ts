import { describe, it, expect } from 'vitest';
import {
  classifyMarginTrend,
  concentrationMidpoint,
  countRevenueStreams,
  firstPersonDensity,
  ownerIndependenceDelta,
  parseDaysWithoutOwner,
  parseScale,
} from '@exitready/agents';

describe('parseDaysWithoutOwner', () => {
  it('maps form buckets to days', () => {
    expect(parseDaysWithoutOwner('Less than 3 days')).toBe(2);
    expect(parseDaysWithoutOwner('3-7 days')).toBe(5);
    expect(parseDaysWithoutOwner('1-2 weeks')).toBe(10);
    expect(parseDaysWithoutOwner('2-4 weeks')).toBe(21);
    expect(parseDaysWithoutOwner('More than a month')).toBe(45);
  });

  it('reads free text with units', () => {
    expect(parseDaysWithoutOwner('about 3 weeks')).toBe(21);
    expect(parseDaysWithoutOwner('2 months')).toBe(60);
    expect(parseDaysWithoutOwner('10')).toBe(10);
  });

  it('treats a business that cannot run without the owner as zero days', () => {
    expect(parseDaysWithoutOwner("None - it can't run without me")).toBe(0);
  });

  it('returns null when nothing usable is present', () => {
    expect(parseDaysWithoutOwner('')).toBeNull();
    expect(parseDaysWithoutOwner('hard to say')).toBeNull();
  });
});

describe('answer signals', () => {
  it('measures first-person density', () => {
    expect(firstPersonDensity('I run it myself')).toBe(0.5);
    expect(firstPersonDensity('')).toBe(0);
  });

  it('counts revenue streams by separator', () => {
    expect(countRevenueStreams('Project consulting')).toBe(1);
    expect(countRevenueStreams('Installs, maintenance; repairs\nsupplies')).toBe(4);
  });

  it('takes the midpoint of a concentration answer', () => {
    expect(concentrationMidpoint('10-20%')).toBe(15);
    expect(concentrationMidpoint('Less than 10%')).toBe(5);
    expect(concentrationMidpoint('30%')).toBe(30);
    expect(concentrationMidpoint('not sure')).toBeNull();
  });

  it('clamps scale answers to 0-10', () => {
    expect(parseScale('7')).toBe(7);
    expect(parseScale('15')).toBe(10);
    expect(parseScale('n/a')).toBeNull();
  });

  it('classifies margin trends', () => {
    expect(classifyMarginTrend('Declined significantly')).toBe('DECLINED_SIGNIFICANTLY');
    expect(classifyMarginTrend('Decreased a bit')).toBe('DECLINED_SLIGHTLY');
    expect(classifyMarginTrend('Improved significantly')).toBe('IMPROVED_SIGNIFICANTLY');
    expect(classifyMarginTrend('Improved slightly')).toBe('IMPROVED_SLIGHTLY');
    expect(classifyMarginTrend('Stayed flat')).toBe('FLAT');
    expect(classifyMarginTrend("I don't know")).toBe('UNKNOWN');
    expect(classifyMarginTrend('Seasonal')).toBeNull();
  });
});

describe('ownerIndependenceDelta', () => {
  it('runs from -2.0 at zero days to +3.5 at twice the threshold', () => {
    expect(ownerIndependenceDelta(0, 14)).toBe(-2);
    expect(ownerIndependenceDelta(14, 14)).toBe(0.8);
    expect(ownerIndependenceDelta(28, 14)).toBe(3.5);
    expect(ownerIndependenceDelta(90, 14)).toBe(3.5);
  });
});
