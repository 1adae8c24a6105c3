// Parser for the text output of `mvn dependency:tree -DoutputType=text`.
//
//   org.example:app:jar:1.0
//   +- org.eclipse.steady:shared:jar:3.2.6-SNAPSHOT:compile
//   |  \- org.eclipse.steady:shared:jar:tests:3.2.6-SNAPSHOT:test
//
// Lines may carry a `[INFO] ` prefix when captured from the console. Anything
// that isn't a dependency line (headers, blank lines, the root coordinate,
// tree art) is skipped.

import { ALL_MAVEN_SCOPES } from '../constants';
import { MalformedInputError } from '../errors';
import { DependencyRecord, ScopeCounts } from '../types';

const LOG_PREFIX = /^\[[A-Z]+\]\s?/;
// Tree prefix up to and including the `+- ` / `\- ` marker, then the coordinate, then optional annotations.
const TREE_LINE = /^([|\s]*)[+\\]-\s+(\S+)(?:\s+\(.*\))?\s*$/;
// Maven indents each nesting level by three characters ("|  " or "   ").
const INDENT_WIDTH = 3;

const FIELD = '([^:\\s]+)';
const SIX_FIELDS = new RegExp(`^${Array(6).fill(FIELD).join(':')}$`);
const FIVE_FIELDS = new RegExp(`^${Array(5).fill(FIELD).join(':')}$`);

// Parses a single coordinate token. The classifier form is strictly more
// specific, so it is tried first and a token never yields two records.
export function parseCoordinate(token: string, depth = 1): DependencyRecord | undefined {
  const six = SIX_FIELDS.exec(token);
  if (six) {
    const [, namespace, name, packaging, classifier, version, scope] = six;
    return { namespace, name, packaging, classifier, version, scope, depth };
  }
  const five = FIVE_FIELDS.exec(token);
  if (five) {
    const [, namespace, name, packaging, version, scope] = five;
    return { namespace, name, packaging, version, scope, depth };
  }
  return undefined;
}

export function parseDependencyLine(line: string): DependencyRecord | undefined {
  const stripped = line.replace(LOG_PREFIX, '').replace(/\s+$/, '');
  const m = TREE_LINE.exec(stripped);
  if (!m) return undefined;
  const depth = Math.floor(m[1].length / INDENT_WIDTH) + 1;
  return parseCoordinate(m[2], depth);
}

function* scan(text: string): Generator<DependencyRecord> {
  for (const line of text.split(/\r?\n/)) {
    const record = parseDependencyLine(line);
    if (record) yield record;
  }
}

// Lazy and restartable: every iteration re-scans the report from the top.
export function parseDependencyTree(text: unknown, source?: string): Iterable<DependencyRecord> {
  if (typeof text !== 'string') {
    throw new MalformedInputError('dependency report is not text', source);
  }
  if (!text.trim().length) {
    throw new MalformedInputError('dependency report is empty', source);
  }
  return { [Symbol.iterator]: () => scan(text) };
}

// Counts per scope; every known Maven scope is present (possibly 0), unknown scopes are appended.
export function countByScope(records: Iterable<DependencyRecord>): ScopeCounts {
  const counts: ScopeCounts = {};
  for (const s of ALL_MAVEN_SCOPES) counts[s] = 0;
  for (const r of records) {
    counts[r.scope] = (counts[r.scope] || 0) + 1;
  }
  return counts;
}
