#!/usr/bin/env node
import * as path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { Exec, safeExec } from './collaborators/safe-exec';
import { defaultConfig, isReportFormat, loadConfig } from './config';
import { normalizeScopes } from './deptree/expected-set';
import { ConfigurationError, SbomEvalError } from './errors';
import { createLogger, Logger } from './logger';
import { EXIT_ERROR, runPipeline } from './pipeline';
import { renderReport } from './report';
import { EvaluatorConfig, ReportFormat, SbomSpec } from './types';

// "syft=out/syft.json" or just "out/syft.json" (label taken from the file name).
export function parseSbomArg(arg: string): SbomSpec {
  const eq = arg.indexOf('=');
  if (eq > 0) return { label: arg.slice(0, eq), path: path.resolve(arg.slice(eq + 1)) };
  return { label: path.basename(arg, path.extname(arg)), path: path.resolve(arg) };
}

interface CommonArgs {
  scopes?: string;
  out?: string;
  format?: string;
  nested: boolean;
  verbose: boolean;
}

function applyArgs(config: EvaluatorConfig, args: CommonArgs): EvaluatorConfig {
  const next = { ...config };
  if (args.scopes) next.expectedScopes = normalizeScopes(args.scopes);
  if (args.out) next.outputDir = path.resolve(args.out);
  if (args.format && isReportFormat(args.format)) next.format = args.format;
  return next;
}

async function execute(config: EvaluatorConfig, args: CommonArgs, logger: Logger, exec: Exec): Promise<number> {
  const { report, exitCode } = await runPipeline(config, { exec, logger, includeNested: args.nested });
  logger.info(renderReport(report, config.format));
  return exitCode;
}

const FORMATS: ReportFormat[] = ['table', 'json', 'yaml'];

export async function main(argv: string[], exec: Exec = safeExec): Promise<number> {
  let exitCode = 0;
  let logger = createLogger(false);
  const run = async (work: () => Promise<number>) => {
    try {
      exitCode = await work();
    } catch (e: unknown) {
      if (!(e instanceof SbomEvalError)) throw e;
      logger.error(e.message);
      exitCode = EXIT_ERROR;
    }
  };

  const parser = yargs(argv)
    .scriptName('sbom-eval')
    .usage('$0 <command> [options]')
    .option('scopes', { type: 'string', describe: 'Comma separated Maven scopes expected in the SBOMs (default: compile,runtime)', global: true })
    .option('out', { type: 'string', describe: 'Directory for exp-purls.txt, <label>-purls.txt and metrics.json', global: true })
    .option('format', { type: 'string', choices: FORMATS, describe: 'Report format', global: true })
    .option('nested', { type: 'boolean', default: false, describe: 'Also count nested CycloneDX components', global: true })
    .option('verbose', { type: 'boolean', default: false, describe: 'Print progress details to stderr', global: true })
    .middleware(args => { logger = createLogger(args.verbose); })
    .command(
      'evaluate',
      'Compare SBOM documents with a mvn dependency:tree report',
      y => y
        .option('deptree', { type: 'string', demandOption: true, describe: 'Text output of mvn dependency:tree' })
        .option('sbom', { type: 'string', array: true, demandOption: true, describe: 'CycloneDX SBOM as [label=]path, repeatable' }),
      args => run(async () => {
        const config = applyArgs({
          ...defaultConfig(),
          dependencyTree: path.resolve(args.deptree),
          sboms: args.sbom.map(parseSbomArg)
        }, args);
        return execute(config, args, logger, exec);
      })
    )
    .command(
      'run',
      'Run configured generators and evaluate every SBOM listed in a config file',
      y => y.option('config', { type: 'string', demandOption: true, describe: 'YAML or JSON config file' }),
      args => run(async () => {
        const config = applyArgs(await loadConfig(args.config), args);
        return execute(config, args, logger, exec);
      })
    )
    .demandCommand(1)
    .strict()
    .help()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err || new ConfigurationError(msg);
    });

  try {
    await parser.parseAsync();
  } catch (e: unknown) {
    if (!(e instanceof SbomEvalError)) throw e;
    logger.error(e.message);
    return EXIT_ERROR;
  }
  return exitCode;
}

if (require.main === module) {
  main(hideBin(process.argv))
    .then(code => { process.exitCode = code; })
    .catch((e: unknown) => {
      console.error(e);
      process.exitCode = EXIT_ERROR;
    });
}
