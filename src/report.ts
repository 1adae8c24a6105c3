import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { EXPECTED_PURLS_FILE, METRICS_FILE, REPORT_SCHEMA_VERSION, sanitizeLabel } from './constants';
import { SbomEvaluator } from './evaluator';
import { formatRecall } from './metrics';
import { serializeIdentifiers, toSortedList } from './purl';
import { EvaluationOutcome, EvaluationReport, ReportFormat } from './types';

// Undefined recall is written as null so it stays visible in JSON output.
export function reportToJson(report: EvaluationReport): string {
  return JSON.stringify(report, (key, value: unknown) => (key === 'recall' && value === undefined ? null : value), 2);
}

export function buildReport(
  evaluator: SbomEvaluator,
  outcomes: EvaluationOutcome[],
  project?: { name?: string; version?: string },
  now: Date = new Date()
): EvaluationReport {
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    generated: now.toISOString(),
    project,
    expectedScopes: [...evaluator.expected.scopes],
    scopeCounts: { ...evaluator.scopeCounts },
    expectedCount: evaluator.expected.count,
    expected: toSortedList(evaluator.expected.identifiers),
    outcomes
  };
}

// File names are derived from labels; two labels that sanitize to the same name get a numeric suffix.
// `exp` is taken by the expected set, so an SBOM labelled `exp` starts at `exp-2`.
export function purlFileNames(outcomes: EvaluationOutcome[]): string[] {
  const seen = new Map<string, number>([[EXPECTED_PURLS_FILE.replace(/-purls\.txt$/, ''), 1]]);
  return outcomes.map(o => {
    const base = sanitizeLabel(o.label);
    const n = (seen.get(base) || 0) + 1;
    seen.set(base, n);
    return n === 1 ? `${base}-purls.txt` : `${base}-${n}-purls.txt`;
  });
}

// Writes exp-purls.txt, <label>-purls.txt per evaluated SBOM and metrics.json.
export async function writeArtifacts(outDir: string, report: EvaluationReport): Promise<string[]> {
  await fs.ensureDir(outDir);
  const written: string[] = [];
  const expectedPath = path.join(outDir, EXPECTED_PURLS_FILE);
  await fs.writeFile(expectedPath, serializeIdentifiers(report.expected));
  written.push(expectedPath);
  const names = purlFileNames(report.outcomes);
  for (let i = 0; i < report.outcomes.length; i++) {
    const outcome = report.outcomes[i];
    if (outcome.status !== 'ok') continue;
    const file = path.join(outDir, names[i]);
    await fs.writeFile(file, serializeIdentifiers(outcome.observed));
    written.push(file);
  }
  const metricsPath = path.join(outDir, METRICS_FILE);
  await fs.writeFile(metricsPath, reportToJson(report));
  written.push(metricsPath);
  return written;
}

export function renderOutcomeLine(outcome: EvaluationOutcome): string {
  if (outcome.status === 'failed') {
    return `❌ ${outcome.label} - ${outcome.kind}: ${outcome.message}`;
  }
  const m = outcome.metrics;
  return `✅ ${outcome.label} - Contains ${String(m.observedCount).padStart(3)} component PURLs (TP = ${String(m.truePositiveCount).padStart(3)}, FN = ${String(m.falseNegativeCount).padStart(3)}, recall = ${formatRecall(m.recall)})`;
}

function renderTable(report: EvaluationReport): string {
  const lines: string[] = [];
  lines.push('='.repeat(60));
  lines.push('SBOM RECALL REPORT');
  lines.push('='.repeat(60));
  if (report.project?.name) lines.push(`Project: ${report.project.name}${report.project.version ? ' ' + report.project.version : ''}`);
  lines.push(`Timestamp: ${report.generated}`);
  lines.push('Dependencies in report:');
  for (const [scope, count] of Object.entries(report.scopeCounts)) {
    lines.push(` - ${String(count).padStart(3)} ${scope}`);
  }
  lines.push(`Expected PURLs (scopes ${report.expectedScopes.join(', ')}): ${report.expectedCount}`);
  lines.push('-'.repeat(60));
  for (const outcome of report.outcomes) {
    lines.push(renderOutcomeLine(outcome));
    if (outcome.status === 'ok') outcome.warnings.forEach(w => lines.push(`   ⚠️  ${w}`));
  }
  lines.push('-'.repeat(60));
  return lines.join('\n');
}

export function renderReport(report: EvaluationReport, format: ReportFormat = 'table'): string {
  if (format === 'json') return reportToJson(report);
  if (format === 'yaml') return yaml.dump(JSON.parse(reportToJson(report)), { lineWidth: -1, noRefs: true });
  return renderTable(report);
}
