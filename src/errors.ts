// Failure taxonomy shared by the pipeline. Lines or components that simply
// don't match the expected shape are skipped and never become errors.

export type SbomEvalErrorCode = 'MALFORMED_INPUT' | 'CONSISTENCY_VIOLATION' | 'CONFIGURATION' | 'TOOL_FAILED';

export class SbomEvalError extends Error {
  readonly code: SbomEvalErrorCode;

  constructor(code: SbomEvalErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

// SBOM that is not valid JSON/XML, or a dependency report with nothing readable in it.
export class MalformedInputError extends SbomEvalError {
  readonly source?: string;

  constructor(message: string, source?: string) {
    super('MALFORMED_INPUT', source ? `${source}: ${message}` : message);
    this.source = source;
  }
}

// TP + FN did not add up to the expected count. Indicates a logic defect.
export class ConsistencyViolationError extends SbomEvalError {
  readonly truePositiveCount: number;
  readonly falseNegativeCount: number;
  readonly expectedCount: number;

  constructor(truePositiveCount: number, falseNegativeCount: number, expectedCount: number) {
    super('CONSISTENCY_VIOLATION', `${truePositiveCount} TP + ${falseNegativeCount} FN are not equal to ${expectedCount} expected deps`);
    this.truePositiveCount = truePositiveCount;
    this.falseNegativeCount = falseNegativeCount;
    this.expectedCount = expectedCount;
  }
}

export class ConfigurationError extends SbomEvalError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

// An external collaborator (mvn, a generator) failed or produced no output.
export class ToolFailedError extends SbomEvalError {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super('TOOL_FAILED', `${tool}: ${message}`);
    this.tool = tool;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
