import { DEFAULT_EXPECTED_SCOPES } from '../constants';
import { ConfigurationError } from '../errors';
import { canonicalize } from '../purl';
import { DependencyRecord, ExpectedSet, Identifier } from '../types';

// Accepts "compile,runtime" or ['compile', ' Runtime ']; order kept, duplicates dropped.
export function normalizeScopes(input: string | readonly string[]): string[] {
  const parts = typeof input === 'string' ? input.split(',') : input;
  const scopes: string[] = [];
  for (const p of parts) {
    const s = p.trim().toLowerCase();
    if (s && !scopes.includes(s)) scopes.push(s);
  }
  if (!scopes.length) throw new ConfigurationError('at least one expected scope is required');
  return scopes;
}

export function buildExpectedSet(
  records: Iterable<DependencyRecord>,
  acceptedScopes: readonly string[] = DEFAULT_EXPECTED_SCOPES
): ExpectedSet {
  const accepted = new Set(acceptedScopes);
  const identifiers = new Set<Identifier>();
  for (const r of records) {
    if (!r.scope || !accepted.has(r.scope)) continue;
    identifiers.add(canonicalize(r.namespace, r.name, r.version));
  }
  return Object.freeze({
    identifiers,
    count: identifiers.size,
    scopes: Object.freeze([...acceptedScopes])
  });
}
