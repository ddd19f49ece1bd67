/**
 * Options resolved from the command line and environment
 */
export interface CliConfig {
  /**
   * Statements given inline with -e/--expr, in order
   * Example: 'p := 1 q := 0 p => q'
   */
  expressions: string[];

  /**
   * Glob patterns of files holding one statement each
   * Example: 'statements/*.logic'
   */
  patterns: string[];

  /**
   * Write the Graphviz rendering of the tree to this file.
   * Only valid when exactly one statement is evaluated.
   */
  dotPath: string | null;

  /**
   * Print the parsed tree and bindings below each result
   */
  printTree: boolean;

  /**
   * Enable debug logging, including the parser trace
   */
  debug: boolean;

  help: boolean;
  version: boolean;
}

/**
 * Process bindings the CLI runs against
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
}
