import type { CliConfig } from '../types/index.js';

/**
 * Error raised for invalid command line usage
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_OPTIONS: Readonly<Record<string, 'expressions' | 'dotPath'>> = {
  '-e': 'expressions',
  '--expr': 'expressions',
  '--dot': 'dotPath',
};

function isEnabled(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

/**
 * Resolve CLI configuration from arguments, falling back to the
 * environment (PROPLOGIC_DEBUG) for debug logging.
 *
 * @throws UsageError for unknown options or options missing their value
 *
 * @example
 * ```ts
 * resolveConfig(['-e', '1 ^ 0', '--tree'], {});
 * // { expressions: ['1 ^ 0'], patterns: [], dotPath: null, printTree: true, ... }
 * ```
 */
export function resolveConfig(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>>
): CliConfig {
  const config: CliConfig = {
    expressions: [],
    patterns: [],
    dotPath: null,
    printTree: false,
    debug: isEnabled(env.PROPLOGIC_DEBUG),
    help: false,
    version: false,
  };

  let optionsEnded = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (optionsEnded || !arg.startsWith('-') || arg === '-') {
      config.patterns.push(arg);
      continue;
    }

    if (arg === '--') {
      optionsEnded = true;
      continue;
    }

    // --name=value form
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const target = VALUE_OPTIONS[name];

    if (target !== undefined) {
      let value: string;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else if (i + 1 < args.length) {
        value = args[++i];
      } else {
        throw new UsageError(`Option "${name}" requires a value`);
      }

      if (target === 'expressions') {
        config.expressions.push(value);
      } else {
        config.dotPath = value;
      }
      continue;
    }

    switch (arg) {
      case '--tree':
        config.printTree = true;
        break;
      case '--debug':
        config.debug = true;
        break;
      case '-h':
      case '--help':
        config.help = true;
        break;
      case '-v':
      case '--version':
        config.version = true;
        break;
      default:
        throw new UsageError(`Unknown option "${arg}"`);
    }
  }

  return config;
}
