import { ConsistencyViolationError } from './errors';
import { ExpectedSet, IdentifierSet, MetricsResult } from './types';

// TP, FN and recall of one observed set against the expected set.
// False positives and precision are not computed: an SBOM may legitimately
// list components outside the expected scopes (shaded jars, the JDK, OS packages).
export function compare(expected: ExpectedSet, observed: IdentifierSet): MetricsResult {
  const truePositives: string[] = [];
  const falseNegatives: string[] = [];
  for (const id of expected.identifiers) {
    if (observed.has(id)) truePositives.push(id);
    else falseNegatives.push(id);
  }
  truePositives.sort();
  falseNegatives.sort();

  const tp = truePositives.length;
  const fn = falseNegatives.length;
  // Make sure numbers add up
  if (tp + fn !== expected.count || expected.identifiers.size !== expected.count) {
    throw new ConsistencyViolationError(tp, fn, expected.count);
  }

  return {
    observedCount: observed.size,
    expectedCount: expected.count,
    truePositives,
    falseNegatives,
    truePositiveCount: tp,
    falseNegativeCount: fn,
    recall: expected.count === 0 ? undefined : tp / expected.count
  };
}

export function formatRecall(recall: number | undefined): string {
  return recall === undefined ? 'n/a' : recall.toFixed(2);
}
