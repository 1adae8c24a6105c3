// Seams to the outside world. The core only ever sees the text and documents
// these hand back; how they were produced (a file, mvn, a generator) stays here.

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { MalformedInputError, ToolFailedError } from '../errors';
import { GeneratorSpec, SbomInput } from '../types';
import { Exec, safeExec } from './safe-exec';

export interface DependencyTreeSource {
  readonly description: string;
  read(): Promise<string>;
}

export interface SbomSource {
  readonly label: string;
  load(): Promise<SbomInput>;
}

async function readText(file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (e: unknown) {
    const code = e instanceof Error && 'code' in e ? String(e.code) : 'read-error';
    throw new MalformedInputError(`cannot read file (${code})`, file);
  }
}

export class FileDependencyTreeSource implements DependencyTreeSource {
  constructor(private readonly file: string) {}

  get description(): string {
    return this.file;
  }

  read(): Promise<string> {
    return readText(this.file);
  }
}

// Resolves dependencies with `mvn dependency:tree`. The report goes to `outputFile`
// when one is given; otherwise to a private temp directory removed after reading.
export class MavenDependencyTreeSource implements DependencyTreeSource {
  private readonly outputFile?: string;

  constructor(private readonly pomPath: string, outputFile?: string, private readonly exec: Exec = safeExec) {
    this.outputFile = outputFile && path.resolve(outputFile);
  }

  get description(): string {
    return `mvn dependency:tree -f ${this.pomPath}`;
  }

  private async run(outputFile: string): Promise<string> {
    const res = await this.exec('mvn', ['-q', 'dependency:tree', '-DoutputType=text', `-DoutputFile=${outputFile}`, '-f', this.pomPath]);
    if (res.failed) throw new ToolFailedError('mvn', res.errorMessage || 'dependency:tree failed');
    return readText(outputFile);
  }

  async read(): Promise<string> {
    if (this.outputFile) {
      await fs.ensureDir(path.dirname(this.outputFile));
      return this.run(this.outputFile);
    }
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sbom-eval-deptree-'));
    try {
      return await this.run(path.join(dir, 'deptree.txt'));
    } finally {
      await fs.remove(dir);
    }
  }
}

export class FileSbomSource implements SbomSource {
  constructor(readonly label: string, private readonly file: string) {}

  async load(): Promise<SbomInput> {
    return { label: this.label, text: await readText(this.file) };
  }
}

// `{output}` in a generator's arguments is replaced by its configured output path.
export function expandArgs(args: string[], output: string): string[] {
  return args.map(a => a.split('{output}').join(output));
}

export class GeneratorSbomSource implements SbomSource {
  constructor(private readonly spec: GeneratorSpec, private readonly exec: Exec = safeExec) {}

  get label(): string {
    return this.spec.label;
  }

  async load(): Promise<SbomInput> {
    await fs.ensureDir(path.dirname(path.resolve(this.spec.output)));
    const res = await this.exec(this.spec.command, expandArgs(this.spec.args, this.spec.output), { timeoutMs: this.spec.timeoutMs });
    if (res.failed) throw new ToolFailedError(this.spec.command, res.errorMessage || 'generator failed');
    if (!(await fs.pathExists(this.spec.output))) {
      throw new ToolFailedError(this.spec.command, `no SBOM written to ${this.spec.output}`);
    }
    return { label: this.spec.label, text: await readText(this.spec.output) };
  }
}
