import { ConsistencyViolationError } from '../src/errors';
import { compare, formatRecall } from '../src/metrics';
import { ExpectedSet } from '../src/types';

function expectedOf(ids: string[]): ExpectedSet {
  const identifiers = new Set(ids);
  return { identifiers, count: identifiers.size, scopes: ['compile', 'runtime'] };
}

describe('metrics engine', () => {
  it('computes TP, FN and recall', () => {
    const res = compare(expectedOf(['A', 'B', 'C']), new Set(['B', 'C', 'D']));
    expect(res.truePositives).toEqual(['B', 'C']);
    expect(res.falseNegatives).toEqual(['A']);
    expect(res.truePositiveCount).toBe(2);
    expect(res.falseNegativeCount).toBe(1);
    expect(res.observedCount).toBe(3);
    expect(res.expectedCount).toBe(3);
    expect(res.recall).toBeCloseTo(0.667, 3);
    expect(res.truePositiveCount + res.falseNegativeCount).toBe(res.expectedCount);
  });

  it('reports recall as undefined for an empty expected set', () => {
    const res = compare(expectedOf([]), new Set(['A']));
    expect(res.recall).toBeUndefined();
    expect(res.truePositiveCount).toBe(0);
    expect(res.falseNegativeCount).toBe(0);
    expect(formatRecall(res.recall)).toBe('n/a');
  });

  it('handles perfect and empty observations', () => {
    expect(compare(expectedOf(['A', 'B']), new Set(['A', 'B'])).recall).toBe(1);
    const none = compare(expectedOf(['A', 'B']), new Set());
    expect(none.recall).toBe(0);
    expect(none.falseNegatives).toEqual(['A', 'B']);
  });

  it('halts on an inconsistent expected set', () => {
    const corrupt: ExpectedSet = { identifiers: new Set(['A']), count: 2, scopes: [] };
    expect(() => compare(corrupt, new Set(['A']))).toThrow(ConsistencyViolationError);
    expect(() => compare(corrupt, new Set(['A']))).toThrow('1 TP + 0 FN are not equal to 2 expected deps');
  });

  it('formats recall with two decimals', () => {
    expect(formatRecall(2 / 3)).toBe('0.67');
    expect(formatRecall(0)).toBe('0.00');
  });
});
