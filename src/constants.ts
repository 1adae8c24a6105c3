// Centralized constants for scopes, PURL layout and tool defaults.

export const PURL_SCHEME = 'pkg';
export const MAVEN_PURL_TYPE = 'maven';

// Full Maven scope enumeration, in the order the report lists them.
export const ALL_MAVEN_SCOPES = ['compile', 'runtime', 'provided', 'system', 'test'] as const;

// Scopes a generated SBOM is expected to contain; used for TP, FN and recall.
export const DEFAULT_EXPECTED_SCOPES: readonly string[] = ['compile', 'runtime'];

// CycloneDX component scopes counted as "present". Absent scope counts too.
export const INCLUDED_COMPONENT_SCOPES: readonly string[] = ['required', 'optional'];

export const REPORT_SCHEMA_VERSION = 1;
export const EXPECTED_PURLS_FILE = 'exp-purls.txt';
export const METRICS_FILE = 'metrics.json';

export const DEFAULT_TOOL_TIMEOUT_MS = (() => {
  const env = process.env.SBOM_EVAL_TOOL_TIMEOUT_MS;
  const parsed = env ? parseInt(env, 10) : NaN;
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return 10 * 60 * 1000; // generators resolve whole dependency graphs; allow 10 minutes
})();

// Output label sanitization, used for <label>-purls.txt file names.
// Allow alphanumerics, dot, underscore and hyphen; collapse everything else to '-'.
export const LABEL_MAX_LENGTH = 96;
export function sanitizeLabel(label: string): string {
  if (!label) return 'sbom';
  let cleaned = label.normalize('NFC').replace(/[^A-Za-z0-9._-]+/g, '-');
  cleaned = cleaned.replace(/-+/g, '-');
  cleaned = cleaned.replace(/^[\-.]+/, '').replace(/[\-.]+$/, '');
  if (!cleaned.length) cleaned = 'sbom';
  if (cleaned.length > LABEL_MAX_LENGTH) {
    cleaned = cleaned.slice(0, LABEL_MAX_LENGTH);
  }
  return cleaned;
}
