/**
 * Fuzzy organization-name matching used when research picks a candidate
 * from search results, plus the name quality filter applied to scraped
 * listings
 */

import { nameIdentity } from './normalize.js';

export const DEFAULT_MATCH_THRESHOLD = 0.6;

// Score given when one name contains the other
const CONTAINMENT_SCORE = 0.95;

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b[i - 1] === a[j - 1]) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1, // insertion
          matrix[i - 1][j] + 1 // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}

/**
 * Similarity ratio between two names (0-1), compared on their identities
 */
export function stringSimilarity(a: string, b: string): number {
  const aNorm = nameIdentity(a);
  const bNorm = nameIdentity(b);

  if (aNorm === bNorm) return aNorm.length > 0 ? 1 : 0;
  if (aNorm.length === 0 || bNorm.length === 0) return 0;

  const distance = levenshteinDistance(aNorm, bNorm);
  const maxLength = Math.max(aNorm.length, bNorm.length);

  return 1 - distance / maxLength;
}

/**
 * Score a candidate name against the name being researched.
 * Containment in either direction scores 0.95, otherwise the similarity ratio.
 */
export function nameMatchScore(target: string, candidate: string): number {
  const targetNorm = nameIdentity(target);
  const candidateNorm = nameIdentity(candidate);
  if (!targetNorm || !candidateNorm) return 0;
  if (targetNorm === candidateNorm) return 1;

  if (candidateNorm.includes(targetNorm) || targetNorm.includes(candidateNorm)) {
    return CONTAINMENT_SCORE;
  }

  return stringSimilarity(targetNorm, candidateNorm);
}

/**
 * Pick the candidate whose name best matches the target. Returns null when
 * no candidate reaches the threshold; ties keep the earlier candidate.
 */
export function selectBestMatch<T extends { name: string }>(
  target: string,
  candidates: T[],
  threshold: number = DEFAULT_MATCH_THRESHOLD
): { candidate: T; score: number } | null {
  let best: { candidate: T; score: number } | null = null;

  for (const candidate of candidates) {
    const score = nameMatchScore(target, candidate.name);
    if (score >= threshold && (!best || score > best.score)) {
      best = { candidate, score };
    }
  }

  return best;
}

const NAME_MIN_LENGTH = 4;
const NAME_MAX_WORDS = 10;

// Page headings and document titles that directory pages mix in with listings
const NON_NAME_PHRASES = [
  'guide',
  'policy',
  'system',
  'registration',
  'register',
  'usajili',
  'mwongozo',
  'utoaji',
  'kuanzisha',
  'uhamisho',
  'taarifa',
  'mwanafunzi',
  'mradi',
  'assessment',
  'we are',
  'registered',
];

const SCHOOL_WORDS = ['school', 'academy', 'shule', 'primary', 'secondary', 'college', 'institute'];

/**
 * Reject scraped strings that are not plausibly an organization name.
 * With `requireSchoolWord`, the name must also name an educational institution.
 */
export function isValidOrgName(name: string, requireSchoolWord: boolean = false): boolean {
  const trimmed = name.replace(/\s+/g, ' ').trim();
  if (trimmed.length < NAME_MIN_LENGTH) return false;
  if (trimmed.split(' ').length > NAME_MAX_WORDS) return false;

  const lowered = trimmed.toLowerCase();
  if (NON_NAME_PHRASES.some((phrase) => lowered.includes(phrase))) return false;

  if (requireSchoolWord) {
    return SCHOOL_WORDS.some((word) => lowered.includes(word));
  }
  return true;
}
