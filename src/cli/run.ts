import { resolve } from 'path';
import type { CliConfig, CliIO } from '../types/index.js';
import { tryEvaluate } from '../expression/evaluator.js';
import type { TraceStep } from '../expression/parser.js';
import { OPERATOR_SYMBOLS, tokenToString } from '../expression/types.js';
import { formatTree } from '../expression/tree.js';
import { writeDot } from '../render/graphviz.js';
import { createLogger, Logger } from '../logger.js';
import { resolveConfig, UsageError } from './config.js';
import { loadStatements, StatementSource } from './sources.js';

export const VERSION = '0.1.0';

export const HELP = `proplogic v${VERSION}

Usage:
  proplogic [options] <pattern...>   Evaluate the statement in each matching file
  proplogic -e "<statement>"         Evaluate an inline statement

Options:
  -e, --expr <statement>   Inline statement (repeatable)
  --dot <file>             Write the expression tree as a Graphviz graph
                           (exactly one statement)
  --tree                   Print the parsed tree and bindings
  --debug                  Debug logging with parser trace (or PROPLOGIC_DEBUG=1)
  -h, --help               Show this help
  -v, --version            Show version

Examples:
  proplogic -e "p := 1 q := 0 p => q"
  proplogic --tree "statements/*.logic"
  proplogic --dot tree.dot problem.logic
`;

/**
 * Exit codes returned by {@link run}
 */
export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

function formatStep(step: TraceStep): string {
  const operators = step.operators.map((operator) => OPERATOR_SYMBOLS[operator]).join(' ');
  return `  token "${tokenToString(step.token)}" operators [${operators}] nodes ${step.depth}`;
}

async function evaluateSource(
  source: StatementSource,
  config: CliConfig,
  io: CliIO,
  logger: Logger
): Promise<boolean> {
  logger.debug(`Evaluating ${source.label}`);

  const outcome = tryEvaluate(
    source.text,
    logger.debugEnabled ? { trace: (step) => logger.debug(formatStep(step)) } : undefined
  );

  if (!outcome.ok) {
    io.stderr(`${source.label}: ${outcome.error.name}: ${outcome.error.message}`);
    return false;
  }

  const { value, statement } = outcome;
  io.stdout(`${source.label}: ${value}`);

  if (config.printTree) {
    io.stdout(`  tree: ${formatTree(statement.tree)}`);
    io.stdout(`  bindings: ${JSON.stringify(statement.bindings)}`);
  }

  if (config.dotPath !== null) {
    try {
      await writeDot(statement.tree, resolve(io.cwd, config.dotPath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${source.label}: cannot write ${config.dotPath}: ${message}`);
      return false;
    }
    logger.debug(`Wrote graph to ${config.dotPath}`);
  }

  return true;
}

/**
 * Run the command line interface and return its exit code.
 *
 * Every statement is evaluated even if an earlier one fails; the exit code
 * is 1 when any statement failed and 2 for usage errors.
 */
export async function run(args: readonly string[], io: CliIO): Promise<number> {
  let config: CliConfig;
  try {
    config = resolveConfig(args, io.env);
  } catch (error) {
    if (error instanceof UsageError) {
      createLogger({ sink: io.stderr }).error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = createLogger({ debug: config.debug, sink: io.stderr });

  if (config.help) {
    io.stdout(HELP);
    return EXIT_OK;
  }
  if (config.version) {
    io.stdout(VERSION);
    return EXIT_OK;
  }

  logger.debug(
    `Config: expressions=${config.expressions.length}, patterns=${JSON.stringify(config.patterns)}, ` +
      `dot=${config.dotPath ?? 'none'}, tree=${config.printTree}`
  );

  let sources: StatementSource[];
  try {
    sources = await loadStatements(config, io.cwd);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (sources.length === 0) {
    logger.error('Error: no statements given');
    io.stdout(HELP);
    return EXIT_USAGE;
  }
  if (config.dotPath !== null && sources.length !== 1) {
    logger.error(`Error: --dot needs exactly one statement, got ${sources.length}`);
    return EXIT_USAGE;
  }

  logger.debug(`Evaluating ${sources.length} statement(s)`);

  let failed = 0;
  for (const source of sources) {
    if (!(await evaluateSource(source, config, io, logger))) {
      failed++;
    }
  }

  logger.debug(`${sources.length - failed} succeeded, ${failed} failed`);
  return failed > 0 ? EXIT_FAILED : EXIT_OK;
}
