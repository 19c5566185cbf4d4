import { KEY_FIELDS, type FieldComparison, type KeyField, type SubjectFields } from '../domain/entities';

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export interface FieldSimilarityResult {
  /** Mean credit over compared fields; undefined when nothing was comparable. */
  fieldConfidence: number | undefined;
  comparisons: FieldComparison[];
  discrepancies: KeyField[];
}

export function normalizeField(value: string): string {
  return value.trim().toLowerCase();
}

/** Levenshtein distance with unit insert, delete and substitute costs. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }
  return previous[b.length];
}

/** Similarity of two already-normalized strings in [0, 1]. */
export function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  return 1 - editDistance(a, b) / longest;
}

export function compareFields(
  stored: SubjectFields,
  presented: SubjectFields,
  matchThreshold: number = DEFAULT_MATCH_THRESHOLD
): FieldSimilarityResult {
  const comparisons: FieldComparison[] = [];
  for (const field of KEY_FIELDS) {
    const expected = stored[field];
    const given = presented[field];
    if (expected === undefined || given === undefined) continue;

    const similarity = stringSimilarity(normalizeField(expected), normalizeField(given));
    const credit = similarity === 1 || similarity > matchThreshold ? similarity : 0;
    comparisons.push({ field, expected, presented: given, similarity, credit });
  }

  if (comparisons.length === 0) {
    return { fieldConfidence: undefined, comparisons, discrepancies: [] };
  }
  const total = comparisons.reduce((sum, comparison) => sum + comparison.credit, 0);
  return {
    fieldConfidence: total / comparisons.length,
    comparisons,
    discrepancies: comparisons.filter((comparison) => comparison.credit === 0).map((comparison) => comparison.field)
  };
}
