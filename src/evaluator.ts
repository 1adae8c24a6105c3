import { DEFAULT_EXPECTED_SCOPES } from './constants';
import { countByScope, parseDependencyTree } from './deptree/deptree-parser';
import { buildExpectedSet } from './deptree/expected-set';
import { ConsistencyViolationError, errorMessage, MalformedInputError, ToolFailedError } from './errors';
import { Logger, silentLogger } from './logger';
import { compare, formatRecall } from './metrics';
import { toSortedList } from './purl';
import { SbomSource } from './collaborators/sources';
import { ExtractOptions, extractObserved, loadSbomDocument } from './sbom/sbom-extractor';
import { EvaluationOutcome, ExpectedSet, SbomInput, ScopeCounts } from './types';

export interface EvaluatorOptions {
  scopes?: readonly string[];
  extract?: ExtractOptions;
  logger?: Logger;
  source?: string; // name of the dependency report, for error messages
}

// Holds the expected set for one evaluation run and compares SBOMs against it.
// The expected set is built once in the constructor and never changes afterwards,
// so evaluations may run concurrently.
export class SbomEvaluator {
  readonly expected: ExpectedSet;
  readonly scopeCounts: ScopeCounts;
  readonly dependencyCount: number;
  private readonly extract: ExtractOptions;
  private readonly logger: Logger;

  constructor(dependencyReport: string, options: EvaluatorOptions = {}) {
    this.logger = options.logger || silentLogger;
    this.extract = options.extract || {};
    const records = parseDependencyTree(dependencyReport, options.source);
    this.scopeCounts = countByScope(records);
    this.dependencyCount = Object.values(this.scopeCounts).reduce((a, b) => a + b, 0);
    this.expected = buildExpectedSet(records, options.scopes || DEFAULT_EXPECTED_SCOPES);
    if (!this.dependencyCount) this.logger.warn(`No dependency lines found in ${options.source || 'dependency report'}`);
    this.logger.debug(`${this.expected.count} expected PURLs with scope(s) ${this.expected.scopes.join(', ')}`);
  }

  async evaluate(input: SbomInput): Promise<EvaluationOutcome> {
    const { label } = input;
    try {
      const document = 'text' in input ? await loadSbomDocument(input.text, label) : input.document;
      const extraction = extractObserved(document, this.extract, label);
      const metrics = compare(this.expected, extraction.identifiers);
      this.logger.debug(`${label}: ${metrics.observedCount} PURLs (TP = ${metrics.truePositiveCount}, FN = ${metrics.falseNegativeCount}, recall = ${formatRecall(metrics.recall)})`);
      return { status: 'ok', label, observed: toSortedList(extraction.identifiers), metrics, warnings: extraction.warnings };
    } catch (e: unknown) {
      if (e instanceof MalformedInputError) {
        return { status: 'failed', label, kind: 'malformed-input', message: e.message };
      }
      if (e instanceof ConsistencyViolationError) {
        this.logger.error(`${label}: ${e.message}`);
        return { status: 'failed', label, kind: 'consistency-violation', message: e.message };
      }
      throw e;
    }
  }

  // Either the loaded input or the outcome explaining why there is none.
  private async load(source: SbomSource): Promise<SbomInput | EvaluationOutcome> {
    try {
      return await source.load();
    } catch (e: unknown) {
      if (e instanceof ToolFailedError) {
        this.logger.warn(`${source.label}: ${e.message}`);
        return { status: 'failed', label: source.label, kind: 'generator-failed', message: e.message };
      }
      if (e instanceof MalformedInputError) {
        return { status: 'failed', label: source.label, kind: 'malformed-input', message: errorMessage(e) };
      }
      throw e;
    }
  }

  async evaluateSource(source: SbomSource): Promise<EvaluationOutcome> {
    const loaded = await this.load(source);
    return 'status' in loaded ? loaded : this.evaluate(loaded);
  }

  // One comparison per document, all reading the same expected set. Results keep input order.
  evaluateAll(inputs: SbomInput[]): Promise<EvaluationOutcome[]> {
    return Promise.all(inputs.map(i => this.evaluate(i)));
  }

  // Sources are loaded one at a time: generators may share the project's build
  // directory and caches. Only the in-memory comparisons run together.
  async evaluateSources(sources: SbomSource[]): Promise<EvaluationOutcome[]> {
    const loaded: (SbomInput | EvaluationOutcome)[] = [];
    for (const source of sources) {
      loaded.push(await this.load(source));
    }
    return Promise.all(loaded.map(l => ('status' in l ? l : this.evaluate(l))));
  }
}
