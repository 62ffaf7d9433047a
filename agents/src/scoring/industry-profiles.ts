import { readFileSync } from 'node:fs';
import type { DocumentationRigor } from '@exitready/schemas';
import { industryProfilesFileSchema, type IndustryProfile, type IndustryProfilesFile } from './types.js';

let cached: IndustryProfilesFile | undefined;

export function loadIndustryProfiles(): IndustryProfilesFile {
  if (!cached) {
    const raw = readFileSync(new URL('./industry-profiles.json', import.meta.url), 'utf8');
    cached = industryProfilesFileSchema.parse(JSON.parse(raw));
  }
  return cached;
}

/**
 * Profile for an industry: exact case-insensitive match first, then an
 * industry name containing a known key ("Healthcare Services"), else the
 * default profile.
 */
export function getIndustryProfile(industry: string): IndustryProfile {
  const { industries, defaultProfile } = loadIndustryProfiles();
  const wanted = industry.trim().toLowerCase();
  const keys = Object.keys(industries).sort();

  const exact = keys.find((k) => k.toLowerCase() === wanted);
  if (exact) return industries[exact];

  const partial = keys.find((k) => wanted.includes(k.toLowerCase()));
  return partial ? industries[partial] : defaultProfile;
}

/** Documentation score cutoffs for +2.5 / +1.5 / +0.5, below the last is -1.0. */
export const DOCUMENTATION_CUTOFFS: Readonly<Record<DocumentationRigor, readonly [number, number, number]>> = {
  STANDARD: [9, 7, 5],
  HIGH: [10, 8, 6],
  VERY_HIGH: [10, 9, 7],
};
