#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { Command } from 'commander';

import {
  ConfigurationError,
  ErrorCode,
  EXIT_CODES,
  createStderrLogger,
  getBuiltinTestPlan,
  isPortbenchError,
  loadTestPlan,
  toError,
  type Logger,
  type TestPlan,
} from '@portbench/core';

import { ReportOrchestrator, type ReportOutcome } from './engine/orchestrator.js';

export const DEFAULT_RESULTS_DIR = 'benchmark_results';
export const DEFAULT_PRESET = 'digest';

export interface GenerateCommandOptions {
  resultsDir: string;
  outDir?: string;
  manifest?: string;
  plan?: string;
  preset?: string;
  quiet?: boolean;
}

export function exitCodeFor(outcome: ReportOutcome): number {
  switch (outcome.status) {
    case 'success':
      return 0;
    case 'partial':
      return EXIT_CODES[ErrorCode.WRITE_FAILED];
    case 'failed':
      return EXIT_CODES[ErrorCode.MISSING_MANDATORY_INPUT];
  }
}

async function resolvePlan(options: GenerateCommandOptions): Promise<TestPlan> {
  if (options.plan && options.preset) {
    throw new ConfigurationError('--plan and --preset cannot be combined.');
  }
  return options.plan
    ? loadTestPlan(path.resolve(options.plan))
    : getBuiltinTestPlan(options.preset ?? DEFAULT_PRESET);
}

export async function runGenerateCommand(
  options: GenerateCommandOptions,
  logger: Logger
): Promise<ReportOutcome> {
  const resultsDir = path.resolve(options.resultsDir);
  const plan = await resolvePlan(options);
  const orchestrator = new ReportOrchestrator({
    resultsDir,
    outDir: options.outDir ? path.resolve(options.outDir) : resultsDir,
    manifestPath: options.manifest ? path.resolve(options.manifest) : undefined,
    plan,
    logger,
  });
  return orchestrator.run();
}

function isCommanderHelpDisplayed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
  );
}

function createProgram(setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('portbench-report')
    .description('Build comparison tables, charts and diagrams from port-scanner benchmark artifacts')
    .exitOverride();

  program
    .command('generate')
    .description('Aggregate benchmark artifacts and write the report package.')
    .option('--results-dir <dir>', 'Directory holding the benchmark artifacts', DEFAULT_RESULTS_DIR)
    .option('--out-dir <dir>', 'Directory where report files are written (defaults to the results directory)')
    .option('--manifest <path>', 'Manifest JSON (defaults to <results-dir>/summary.json)')
    .option('--plan <path>', 'Test plan JSON replacing the built-in plan')
    .option('--preset <name>', `Built-in test plan: digest or profile (default: ${DEFAULT_PRESET})`)
    .option('--quiet', 'Only print warnings and errors', false)
    .action(async (cmdOptions: GenerateCommandOptions) => {
      const logger = createStderrLogger({ quiet: cmdOptions.quiet });
      const outcome = await runGenerateCommand(cmdOptions, logger);
      const written = outcome.artifacts.filter((artifact) => artifact.written).length;
      logger.info(
        `Report ${outcome.status}: ${written}/${outcome.artifacts.length} artifacts, ${outcome.warnings.length} warnings`
      );
      setExitCode(exitCodeFor(outcome));
    });

  return program;
}

/**
 * Parse argv and run. Resolves to the process exit code; never rejects.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (error) {
    if (isCommanderHelpDisplayed(error)) {
      return 0;
    }
    const failure = toError(error);
    if (isPortbenchError(failure)) {
      process.stderr.write(`[portbench] error: ${failure.message}\n`);
      return failure.getExitCode();
    }
    if (typeof error === 'object' && error !== null && 'exitCode' in error) {
      // commander already printed its usage error
      return typeof error.exitCode === 'number' ? error.exitCode : 1;
    }
    process.stderr.write(`[portbench] error: ${failure.message}\n`);
    return EXIT_CODES[ErrorCode.INTERNAL_ERROR];
  }
}

const entryUrl = process.argv[1] ? pathToFileURL(process.argv[1]).href : undefined;
if (entryUrl && import.meta.url === entryUrl) {
  void runCli(process.argv).then((code) => {
    process.exitCode = code;
  });
}
