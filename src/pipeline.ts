import { Exec, safeExec } from './collaborators/safe-exec';
import {
  DependencyTreeSource,
  FileDependencyTreeSource,
  FileSbomSource,
  GeneratorSbomSource,
  MavenDependencyTreeSource,
  SbomSource
} from './collaborators/sources';
import { ConfigurationError } from './errors';
import { SbomEvaluator } from './evaluator';
import { Logger, silentLogger } from './logger';
import { buildReport, writeArtifacts } from './report';
import { EvaluationOutcome, EvaluationReport, EvaluatorConfig } from './types';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_PARTIAL = 2;

export interface PipelineOptions {
  exec?: Exec;
  logger?: Logger;
  includeNested?: boolean;
  now?: Date;
}

export interface PipelineResult {
  report: EvaluationReport;
  written: string[];
  exitCode: number;
}

export function dependencyTreeSource(config: EvaluatorConfig, exec: Exec): DependencyTreeSource {
  if (config.dependencyTree) return new FileDependencyTreeSource(config.dependencyTree);
  if (config.project?.pomPath) return new MavenDependencyTreeSource(config.project.pomPath, undefined, exec);
  throw new ConfigurationError('either dependencyTree or project.pomPath must be configured');
}

export function sbomSources(config: EvaluatorConfig, exec: Exec): SbomSource[] {
  return [
    ...config.generators.map(g => new GeneratorSbomSource(g, exec)),
    ...config.sboms.map(s => new FileSbomSource(s.label, s.path))
  ];
}

// Consistency violations are defects, malformed or missing SBOMs only make the run partial.
export function exitCodeFor(outcomes: EvaluationOutcome[]): number {
  if (outcomes.some(o => o.status === 'failed' && o.kind === 'consistency-violation')) return EXIT_ERROR;
  if (outcomes.some(o => o.status === 'failed')) return EXIT_PARTIAL;
  return EXIT_OK;
}

export async function runPipeline(config: EvaluatorConfig, options: PipelineOptions = {}): Promise<PipelineResult> {
  const exec = options.exec || safeExec;
  const logger = options.logger || silentLogger;
  const treeSource = dependencyTreeSource(config, exec);
  const sources = sbomSources(config, exec);
  if (!sources.length) throw new ConfigurationError('no SBOMs or generators configured');

  logger.debug(`Resolving dependencies from ${treeSource.description}`);
  const report = await treeSource.read();
  const evaluator = new SbomEvaluator(report, {
    scopes: config.expectedScopes,
    extract: { includeNested: options.includeNested },
    logger,
    source: treeSource.description
  });

  const outcomes = await evaluator.evaluateSources(sources);
  const result = buildReport(evaluator, outcomes, config.project && { name: config.project.name, version: config.project.version }, options.now);
  const written = config.outputDir ? await writeArtifacts(config.outputDir, result) : [];
  written.forEach(f => logger.debug(`wrote ${f}`));
  return { report: result, written, exitCode: exitCodeFor(outcomes) };
}
