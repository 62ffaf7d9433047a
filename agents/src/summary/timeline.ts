import { NO_EXIT_PLANS } from '../scoring/aggregate.js';
import type { TimelineProfile } from './types.js';

const TIMELINE_PROFILES: ReadonlyArray<{ match: RegExp; profile: TimelineProfile }> = [
  {
    match: /\balready\b|\bactively (selling|marketing|looking|seeking|in)\b|\b6 months|less than (1|one|a) year/i,
    profile: { level: 'CRITICAL', monthsRemaining: '0-6', focus: 'Immediate value optimization', header: 'CRITICAL TIMELINE: 0-6 MONTHS' },
  },
  {
    match: /within (1|one|a) year|\b1 year|12 months/i,
    profile: { level: 'URGENT', monthsRemaining: '6-12', focus: 'Rapid improvement execution', header: 'URGENT TIMELINE: 6-12 MONTHS' },
  },
  {
    match: /1\s*-\s*2 years|18 months/i,
    profile: { level: 'HIGH', monthsRemaining: '12-24', focus: 'Systematic improvements', header: 'FOCUSED TIMELINE: 1-2 YEARS' },
  },
  {
    match: /2\s*-\s*3 years/i,
    profile: { level: 'MODERATE', monthsRemaining: '24-36', focus: 'Balanced value enhancement', header: 'STRATEGIC TIMELINE: 2-3 YEARS' },
  },
  {
    match: /3\s*-\s*5 years/i,
    profile: { level: 'MODERATE', monthsRemaining: '36-60', focus: 'Comprehensive transformation', header: 'BUILDING PHASE: 3-5 YEARS' },
  },
  {
    match: /5\s*-\s*10 years|more than 10/i,
    profile: { level: 'LOW', monthsRemaining: '60+', focus: 'Long-term value building', header: 'FOUNDATION BUILDING: 5+ YEARS' },
  },
];

const EXPLORATION: TimelineProfile = {
  level: 'LOW',
  monthsRemaining: 'undefined',
  focus: 'Education and strategic planning',
  header: 'EXPLORATION PHASE',
};

/** Narrative timeline profile used to pitch the report's recommendations. */
export function timelineProfile(exitTimeline: string): TimelineProfile {
  if (NO_EXIT_PLANS.test(exitTimeline)) return EXPLORATION;
  return TIMELINE_PROFILES.find((entry) => entry.match.test(exitTimeline))?.profile ?? EXPLORATION;
}

export interface SectionTitles {
  quickWins: string;
  strategic: string;
  focus: string;
  immediate: string;
  month: string;
  quarter: string;
}

export function sectionTitles(profile: TimelineProfile): SectionTitles {
  if (profile.level === 'CRITICAL') {
    return {
      quickWins: 'DEAL SAVERS (Must Fix Now)',
      strategic: 'NEGOTIATION LEVERAGE (Next 30 Days)',
      focus: 'RED FLAG ELIMINATION',
      immediate: 'THIS WEEK (Pre-Due Diligence)',
      month: 'NEXT 30 DAYS (During Negotiations)',
      quarter: 'DEAL OPTIMIZATION (If Time Allows)',
    };
  }
  if (profile.level === 'URGENT') {
    return {
      quickWins: 'HIGH-IMPACT QUICK WINS (30 Days)',
      strategic: 'VALUE BUILDERS (3-6 Months)',
      focus: 'CRITICAL VALUE DRIVER',
      immediate: 'IMMEDIATE ACTIONS (This Week)',
      month: '30-DAY SPRINT',
      quarter: '90-DAY VALUE MAXIMIZATION',
    };
  }
  return {
    quickWins: 'QUICK WINS (Next 30 Days)',
    strategic: 'STRATEGIC PRIORITIES (3-6 Months)',
    focus: 'YOUR CRITICAL FOCUS AREA',
    immediate: 'IMMEDIATE ACTIONS (This Week)',
    month: '30-DAY ROADMAP',
    quarter: '90-DAY TRANSFORMATION',
  };
}
