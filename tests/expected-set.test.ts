import * as fs from 'fs';
import * as path from 'path';
import { ALL_MAVEN_SCOPES } from '../src/constants';
import { parseDependencyTree } from '../src/deptree/deptree-parser';
import { buildExpectedSet, normalizeScopes } from '../src/deptree/expected-set';
import { ConfigurationError } from '../src/errors';
import { DependencyRecord } from '../src/types';

const report = fs.readFileSync(path.join(__dirname, 'fixtures', 'deptree.txt'), 'utf8');

function record(name: string, scope: string, version = '1.0'): DependencyRecord {
  return { namespace: 'org.x', name, packaging: 'jar', version, scope, depth: 1 };
}

describe('expected set builder', () => {
  it('keeps compile and runtime dependencies by default', () => {
    const expected = buildExpectedSet(parseDependencyTree(report));
    expect(expected.count).toBe(4);
    expect([...expected.identifiers].sort()).toEqual([
      'pkg:maven/com.fasterxml.jackson.core/jackson-databind@2.13.3',
      'pkg:maven/org.postgresql/postgresql@42.3.6',
      'pkg:maven/org.springframework.boot/spring-boot-starter-web@2.7.1',
      'pkg:maven/org.springframework/spring-web@5.3.21'
    ]);
    expect(expected.scopes).toEqual(['compile', 'runtime']);
  });

  it('honours configured scopes', () => {
    const expected = buildExpectedSet(parseDependencyTree(report), ['test']);
    expect(expected.count).toBe(3);
    expect(expected.identifiers.has('pkg:maven/org.example/petstore-common@1.4.0')).toBe(true);
  });

  it('collapses duplicates and drops empty or unknown scopes', () => {
    const expected = buildExpectedSet([record('a', 'compile'), record('a', 'runtime'), record('b', ''), record('c', 'weird')]);
    expect(expected.count).toBe(1);
    expect([...expected.identifiers]).toEqual(['pkg:maven/org.x/a@1.0']);
  });

  it('covers every parsed record when filtering by the full scope list', () => {
    const records = [...parseDependencyTree(report)];
    const expected = buildExpectedSet(records, ALL_MAVEN_SCOPES);
    expect(expected.count).toBe(records.length);
  });

  it('returns a frozen value', () => {
    const expected = buildExpectedSet([record('a', 'compile')]);
    expect(Object.isFrozen(expected)).toBe(true);
    expect(Object.isFrozen(expected.scopes)).toBe(true);
  });

  it('normalizes scope lists', () => {
    expect(normalizeScopes('compile, Runtime,compile')).toEqual(['compile', 'runtime']);
    expect(normalizeScopes([' test '])).toEqual(['test']);
    expect(() => normalizeScopes(' , ')).toThrow(ConfigurationError);
  });
});
