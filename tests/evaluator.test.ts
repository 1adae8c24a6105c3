import * as fs from 'fs';
import * as path from 'path';
import { SbomEvaluator } from '../src/evaluator';
import { MalformedInputError, ToolFailedError } from '../src/errors';
import { SbomSource } from '../src/collaborators/sources';
import { EvaluationOutcome, SbomInput } from '../src/types';

const fixture = (name: string) => fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');

function ok(outcome: EvaluationOutcome) {
  if (outcome.status !== 'ok') throw new Error(`expected ok outcome, got ${outcome.kind}: ${outcome.message}`);
  return outcome;
}

describe('SbomEvaluator', () => {
  const evaluator = new SbomEvaluator(fixture('deptree.txt'));

  it('builds the expected set once from the dependency report', () => {
    expect(evaluator.expected.count).toBe(4);
    expect(evaluator.dependencyCount).toBe(8);
    expect(evaluator.scopeCounts.compile).toBe(3);
  });

  it('evaluates a JSON SBOM given as text', async () => {
    const outcome = ok(await evaluator.evaluate({ label: 'syft', text: fixture('sbom-syft.json') }));
    expect(outcome.metrics.observedCount).toBe(4);
    expect(outcome.metrics.truePositiveCount).toBe(2);
    expect(outcome.metrics.falseNegatives).toEqual([
      'pkg:maven/com.fasterxml.jackson.core/jackson-databind@2.13.3',
      'pkg:maven/org.postgresql/postgresql@42.3.6'
    ]);
    expect(outcome.metrics.recall).toBe(0.5);
    expect(outcome.observed[0]).toBe('pkg:maven/javax.servlet/javax.servlet-api@4.0.1');
    expect(outcome.warnings).toEqual([]);
  });

  it('evaluates a parsed document and an XML SBOM', async () => {
    const parsed = ok(await evaluator.evaluate({ label: 'doc', document: { components: [{ purl: 'pkg:maven/org.postgresql/postgresql@42.3.6' }] } }));
    expect(parsed.metrics.truePositives).toEqual(['pkg:maven/org.postgresql/postgresql@42.3.6']);
    expect(parsed.warnings).toEqual(['bomFormat missing', 'specVersion missing']);
    const xml = ok(await evaluator.evaluate({ label: 'xml', text: fixture('sbom-cyclonedx.xml') }));
    expect(xml.metrics.truePositiveCount).toBe(2);
  });

  it('honours nested extraction and custom scopes', async () => {
    const nested = new SbomEvaluator(fixture('deptree.txt'), { extract: { includeNested: true } });
    const outcome = ok(await nested.evaluate({ label: 'xml', text: fixture('sbom-cyclonedx.xml') }));
    expect(outcome.metrics.recall).toBe(0.75);
    const runtimeOnly = new SbomEvaluator(fixture('deptree.txt'), { scopes: ['runtime'] });
    expect([...runtimeOnly.expected.identifiers]).toEqual(['pkg:maven/org.postgresql/postgresql@42.3.6']);
  });

  it('reports malformed documents as failed outcomes', async () => {
    const outcome = await evaluator.evaluate({ label: 'broken', text: '{"components": [' });
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.kind).toBe('malformed-input');
      expect(outcome.message.startsWith('broken: SBOM is not valid JSON')).toBe(true);
    }
  });

  it('keeps input order when evaluating many documents', async () => {
    const inputs: SbomInput[] = [
      { label: 'a', document: { components: [] } },
      { label: 'b', text: 'not json' },
      { label: 'c', document: {} }
    ];
    const outcomes = await evaluator.evaluateAll(inputs);
    expect(outcomes.map(o => `${o.label}:${o.status}`)).toEqual(['a:ok', 'b:failed', 'c:ok']);
  });

  it('maps source failures to outcomes', async () => {
    const failing: SbomSource = { label: 'trivy', load: () => Promise.reject(new ToolFailedError('trivy', 'timeout')) };
    const unreadable: SbomSource = { label: 'gone', load: () => Promise.reject(new MalformedInputError('cannot read file (ENOENT)', 'gone.json')) };
    const [a, b] = await evaluator.evaluateSources([failing, unreadable]);
    expect(a).toEqual({ status: 'failed', label: 'trivy', kind: 'generator-failed', message: 'trivy: timeout' });
    expect(b).toEqual({ status: 'failed', label: 'gone', kind: 'malformed-input', message: 'gone.json: cannot read file (ENOENT)' });
  });

  it('reports undefined recall when nothing is expected', async () => {
    const empty = new SbomEvaluator('org.example:app:jar:1.0\n+- g:a:jar:1.0:test\n');
    expect(empty.expected.count).toBe(0);
    const outcome = ok(await empty.evaluate({ label: 'x', document: { components: [{ purl: 'pkg:maven/g/a@1.0' }] } }));
    expect(outcome.metrics.recall).toBeUndefined();
  });

  it('rejects an unreadable dependency report', () => {
    expect(() => new SbomEvaluator('', { source: 'deptree.txt' })).toThrow('deptree.txt: dependency report is empty');
  });
});
