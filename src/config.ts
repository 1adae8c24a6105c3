import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { DEFAULT_EXPECTED_SCOPES } from './constants';
import { normalizeScopes } from './deptree/expected-set';
import { ConfigurationError, errorMessage } from './errors';
import { isRecord } from './sbom/sbom-validators';
import { EvaluatorConfig, GeneratorSpec, ReportFormat, SbomSpec } from './types';

const REPORT_FORMATS: readonly ReportFormat[] = ['table', 'json', 'yaml'];

export function defaultConfig(): EvaluatorConfig {
  return { expectedScopes: [...DEFAULT_EXPECTED_SCOPES], sboms: [], generators: [], format: 'table' };
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string' || !v.trim()) throw new ConfigurationError(`${where}.${key} must be a non-empty string`);
  return v;
}

function requiredString(obj: Record<string, unknown>, key: string, where: string): string {
  const v = optionalString(obj, key, where);
  if (v === undefined) throw new ConfigurationError(`${where}.${key} is required`);
  return v;
}

function list(value: unknown, where: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ConfigurationError(`${where} must be a list`);
  return value;
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

// Relative paths in a config file are relative to the file itself.
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): EvaluatorConfig {
  const config = defaultConfig();
  if (raw === undefined || raw === null) return config;
  if (!isRecord(raw)) throw new ConfigurationError('config must be a mapping');
  const resolve = (p: string) => path.resolve(baseDir, p);

  const project = raw.project;
  if (project !== undefined && project !== null) {
    if (!isRecord(project)) throw new ConfigurationError('project must be a mapping');
    const pomPath = optionalString(project, 'pomPath', 'project');
    config.project = {
      name: optionalString(project, 'name', 'project'),
      version: optionalString(project, 'version', 'project'),
      pomPath: pomPath ? resolve(pomPath) : undefined
    };
  }

  const scopes = raw.expectedScopes;
  if (scopes !== undefined && scopes !== null) {
    if (typeof scopes === 'string') config.expectedScopes = normalizeScopes(scopes);
    else if (Array.isArray(scopes) && scopes.every((s): s is string => typeof s === 'string')) config.expectedScopes = normalizeScopes(scopes);
    else throw new ConfigurationError('expectedScopes must be a list of strings');
  }

  const tree = optionalString(raw, 'dependencyTree', 'config');
  if (tree) config.dependencyTree = resolve(tree);

  config.sboms = list(raw.sboms, 'sboms').map((entry, i): SbomSpec => {
    const where = `sboms[${i}]`;
    if (!isRecord(entry)) throw new ConfigurationError(`${where} must be a mapping`);
    return { label: requiredString(entry, 'label', where), path: resolve(requiredString(entry, 'path', where)) };
  });

  config.generators = list(raw.generators, 'generators').map((entry, i): GeneratorSpec => {
    const where = `generators[${i}]`;
    if (!isRecord(entry)) throw new ConfigurationError(`${where} must be a mapping`);
    const args = list(entry.args, `${where}.args`).map(a => {
      if (typeof a !== 'string' && typeof a !== 'number') throw new ConfigurationError(`${where}.args must contain strings`);
      return String(a);
    });
    const rawTimeout = entry.timeoutMs;
    let timeoutMs: number | undefined;
    if (rawTimeout !== undefined && rawTimeout !== null) {
      if (typeof rawTimeout !== 'number' || rawTimeout <= 0) throw new ConfigurationError(`${where}.timeoutMs must be a positive number`);
      timeoutMs = rawTimeout;
    }
    return {
      label: requiredString(entry, 'label', where),
      command: requiredString(entry, 'command', where),
      args,
      output: resolve(requiredString(entry, 'output', where)),
      timeoutMs
    };
  });

  const outputDir = optionalString(raw, 'outputDir', 'config');
  if (outputDir) config.outputDir = resolve(outputDir);

  const format = optionalString(raw, 'format', 'config');
  if (format) {
    if (!isReportFormat(format)) throw new ConfigurationError(`format must be one of ${REPORT_FORMATS.join(', ')}`);
    config.format = format;
  }
  return config;
}

// SBOM_EVAL_SCOPES=compile,runtime,provided overrides the configured scopes.
export function applyEnvironment(config: EvaluatorConfig, env: NodeJS.ProcessEnv = process.env): EvaluatorConfig {
  const scopes = env.SBOM_EVAL_SCOPES;
  if (scopes && scopes.trim()) return { ...config, expectedScopes: normalizeScopes(scopes) };
  return config;
}

export async function loadConfig(file?: string, env: NodeJS.ProcessEnv = process.env): Promise<EvaluatorConfig> {
  if (!file) return applyEnvironment(defaultConfig(), env);
  let raw: unknown;
  try {
    raw = yaml.load(await fs.readFile(file, 'utf8'));
  } catch (e: unknown) {
    throw new ConfigurationError(`cannot load config ${file}: ${errorMessage(e)}`);
  }
  return applyEnvironment(parseConfig(raw, path.dirname(path.resolve(file))), env);
}
