export * from './types';
export * from './errors';
export { canonicalize, canonicalizeRaw, serializeIdentifiers, toSortedList } from './purl';
export { parseDependencyTree, parseDependencyLine, parseCoordinate, countByScope } from './deptree/deptree-parser';
export { buildExpectedSet, normalizeScopes } from './deptree/expected-set';
export {
  extractObservedSet,
  extractObserved,
  readComponents,
  isIncluded,
  parseSbomDocument,
  parseSbomXml,
  loadSbomDocument,
  ExtractOptions,
  ExtractionResult
} from './sbom/sbom-extractor';
export { validateCycloneDXShape, ValidationResult } from './sbom/sbom-validators';
export { compare, formatRecall } from './metrics';
export { SbomEvaluator, EvaluatorOptions } from './evaluator';
export { buildReport, renderReport, writeArtifacts, reportToJson } from './report';
export { loadConfig, parseConfig, applyEnvironment, defaultConfig } from './config';
export { runPipeline, exitCodeFor, EXIT_OK, EXIT_ERROR, EXIT_PARTIAL, PipelineOptions, PipelineResult } from './pipeline';
export { safeExec, SafeExecResult, Exec } from './collaborators/safe-exec';
export * from './collaborators/sources';
export { createLogger, silentLogger, Logger } from './logger';
export { DEFAULT_EXPECTED_SCOPES, ALL_MAVEN_SCOPES, INCLUDED_COMPONENT_SCOPES } from './constants';
