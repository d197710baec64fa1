#!/usr/bin/env tsx

// CLI entry point
// - `routeforge compile <definition>` builds one route-definition document and
//   prints the pattern summary (or its template).
// - `routeforge combine <group> <route>` builds both documents and combines
//   them, group first.
// - `--debug-passes` writes merge notes and the effective configuration to
//   stderr; errors go through ErrorPresenter and exit with the mapped code.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorCode,
  ErrorPresenter,
  RoutePatternError,
  combinePatterns,
  compileRouteDefinition,
  isErr,
  isRoutePatternError,
  parseRouteDefinition,
  resolveOptions,
  summarizePattern,
  type PatternBuildResult,
  type PatternOptions,
  type RoutePattern,
} from '@routeforge/core';
import { renderCLIView } from './render.js';
import {
  parsePatternOptions,
  resolveOutputFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { printEffectiveConfig, printNotes } from './debug.js';

/**
 * Fresh command tree per run; commander keeps parsed option values on the
 * command instance.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('routeforge')
    .description('Compile and combine route patterns')
    .version('0.1.0');

  program
    .command('compile')
    .description('Build a route pattern from a route-definition document')
    .argument('<definition>', 'Route-definition JSON file')
    .option('--out <format>', 'Output format: json|template', 'json')
    .option('--no-notes', 'Do not collect merge notes')
    .option('--debug-passes', 'Print merge notes and configuration to stderr')
    .action((definitionPath: string, options: CliOptions) => {
      const outFormat = resolveOutputFormat(options.out);
      const patternOptions = prepareOptions(options);
      const result = compileFile(definitionPath, patternOptions);
      if (options.debugPasses) {
        printNotes(path.basename(definitionPath), result.notes);
      }
      writePattern(result.pattern, outFormat);
    });

  program
    .command('combine')
    .description('Combine a group pattern with a route nested inside it')
    .argument('<group>', 'Route-definition JSON file for the group prefix')
    .argument('<route>', 'Route-definition JSON file for the nested route')
    .option('--out <format>', 'Output format: json|template', 'json')
    .option('--no-notes', 'Do not collect merge notes')
    .option('--debug-passes', 'Print merge notes and configuration to stderr')
    .action((groupPath: string, routePath: string, options: CliOptions) => {
      const outFormat = resolveOutputFormat(options.out);
      const patternOptions = prepareOptions(options);
      const group = compileFile(groupPath, patternOptions);
      const route = compileFile(routePath, patternOptions);
      if (options.debugPasses) {
        printNotes(path.basename(groupPath), group.notes);
        printNotes(path.basename(routePath), route.notes);
      }
      writePattern(combinePatterns(group.pattern, route.pattern), outFormat);
    });

  return program;
}

function prepareOptions(options: CliOptions): PatternOptions {
  const patternOptions = parsePatternOptions(options);
  if (options.debugPasses) {
    printEffectiveConfig(resolveOptions(patternOptions));
  }
  return patternOptions;
}

function compileFile(
  filePath: string,
  options: PatternOptions
): PatternBuildResult {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Definition file not found: ${abs}`,
      errorCode: ErrorCode.INVALID_DEFINITION,
      context: { setting: 'definition', value: filePath },
    });
  }

  const parsed = parseRouteDefinition(fs.readFileSync(abs, 'utf8'));
  if (isErr(parsed)) throw parsed.error;
  return compileRouteDefinition(parsed.value, options);
}

function writePattern(pattern: RoutePattern, outFormat: OutputFormat): void {
  if (outFormat === 'template') {
    process.stdout.write(`${pattern.toTemplate()}\n`);
    return;
  }
  process.stdout.write(
    `${JSON.stringify(summarizePattern(pattern), null, 2)}\n`
  );
}

class UnexpectedCliError extends RoutePatternError {}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: RoutePatternError;
  if (isRoutePatternError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new UnexpectedCliError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
