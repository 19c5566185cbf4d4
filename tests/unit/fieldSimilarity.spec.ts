import { describe, it, expect } from 'vitest';
import { compareFields, editDistance, normalizeField, stringSimilarity } from '../../src/services/fieldSimilarity';

describe('editDistance', () => {
  it('counts single-character edits', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('abc', 'abc')).toBe(0);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('abc', '')).toBe(3);
  });
});

describe('stringSimilarity', () => {
  it('treats two empty strings as identical', () => {
    expect(stringSimilarity('', '')).toBe(1);
  });

  it('scores an empty string against a non-empty one as zero', () => {
    expect(stringSimilarity('', 'abc')).toBe(0);
  });

  it('scales by the longer string', () => {
    expect(stringSimilarity('jonathan smith', 'jonathon smith')).toBeCloseTo(1 - 1 / 14, 10);
  });
});

describe('compareFields', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(normalizeField('  JANE Doe ')).toBe('jane doe');
    const result = compareFields({ studentName: 'Jane Doe' }, { studentName: '  JANE DOE ' });
    expect(result.fieldConfidence).toBe(1);
    expect(result.discrepancies).toEqual([]);
    expect(result.comparisons).toEqual([
      { field: 'studentName', expected: 'Jane Doe', presented: '  JANE DOE ', similarity: 1, credit: 1 }
    ]);
  });

  it('credits near matches with their similarity', () => {
    const result = compareFields({ studentName: 'Jonathan Smith' }, { studentName: 'Jonathon Smith' });
    expect(result.fieldConfidence).toBeCloseTo(13 / 14, 10);
    expect(result.discrepancies).toEqual([]);
  });

  it('gives no credit at or below the match threshold', () => {
    const atThreshold = compareFields({ certificateNumber: 'abcde' }, { certificateNumber: 'abcdx' });
    expect(atThreshold.comparisons[0].similarity).toBe(0.8);
    expect(atThreshold.comparisons[0].credit).toBe(0);
    expect(atThreshold.discrepancies).toEqual(['certificateNumber']);

    const below = compareFields({ studentName: 'Jane Doe' }, { studentName: 'John Roe' });
    expect(below.comparisons[0].similarity).toBe(0.5);
    expect(below.fieldConfidence).toBe(0);
  });

  it('honours a custom threshold', () => {
    const result = compareFields({ studentName: 'Jane Doe' }, { studentName: 'John Roe' }, 0.4);
    expect(result.fieldConfidence).toBe(0.5);
  });

  it('only compares fields present on both sides', () => {
    const result = compareFields(
      { studentName: 'Jane Doe', degreeName: 'Bachelor of Science' },
      { degreeName: 'bachelor of science', institutionName: 'Somewhere College' }
    );
    expect(result.comparisons.map((comparison) => comparison.field)).toEqual(['degreeName']);
    expect(result.fieldConfidence).toBe(1);
  });

  it('averages credit across fields', () => {
    const result = compareFields(
      { studentName: 'Jane Doe', degreeName: 'Bachelor of Science' },
      { studentName: 'jane doe', degreeName: 'Xylophone' }
    );
    expect(result.fieldConfidence).toBe(0.5);
    expect(result.discrepancies).toEqual(['degreeName']);
  });

  it('reports no field confidence when nothing overlaps', () => {
    const result = compareFields({ studentName: 'Jane Doe' }, { issuanceDate: '2024-06-01' });
    expect(result.fieldConfidence).toBeUndefined();
    expect(result.comparisons).toEqual([]);
    expect(result.discrepancies).toEqual([]);
  });

  it('scores a blank presented value as a mismatch', () => {
    const result = compareFields({ studentName: 'Jane Doe' }, { studentName: '   ' });
    expect(result.fieldConfidence).toBe(0);
    expect(result.discrepancies).toEqual(['studentName']);
  });
});
