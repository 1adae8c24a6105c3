import { MAVEN_PURL_TYPE, PURL_SCHEME } from './constants';
import { Identifier, IdentifierSet } from './types';

// Builds the canonical identifier for a Maven coordinate. No case folding;
// only surrounding whitespace left over from text parsing is trimmed.
export function canonicalize(namespace: string, name: string, version: string): Identifier {
  return `${PURL_SCHEME}:${MAVEN_PURL_TYPE}/${namespace.trim()}/${name.trim()}@${version.trim()}`;
}

// Canonical form of a PURL read from an SBOM: qualifiers (?...) and subpath (#...) are dropped.
export function canonicalizeRaw(raw: string): Identifier {
  return raw.trim().split('?')[0].split('#')[0].trim();
}

export function toSortedList(set: Iterable<Identifier>): Identifier[] {
  return Array.from(new Set(set)).sort();
}

// Newline-delimited, sorted; suitable for comm(1) and friends.
export function serializeIdentifiers(set: IdentifierSet | Identifier[]): string {
  const list = toSortedList(set);
  return list.length ? list.join('\n') + '\n' : '';
}
