// Main entry point for proplogic

// Re-export the lexer, parser and evaluator
export {
  Scanner,
  tokenize,
  Parser,
  parse,
  Bindings,
  compile,
  evaluate,
  evaluateStatement,
  tryEvaluate,
  literal,
  variable,
  unary,
  binary,
  isLeaf,
  nodeLabel,
  formatTree,
  TokenType,
  Operator,
  PRECEDENCE,
  OPERATOR_SYMBOLS,
  tokenToString,
  StatementError,
  LexError,
  ParseError,
  EvalError,
} from './expression/index.js';
export type {
  Token,
  ExpressionNode,
  LiteralNode,
  VariableNode,
  OperatorNode,
  BinaryOperator,
  TreeOperator,
  ParseResult,
  ParserOptions,
  TraceStep,
  Statement,
  Outcome,
  ErrorStage,
  LexErrorKind,
  ParseErrorKind,
  EvalErrorKind,
} from './expression/index.js';

// Graphviz rendering
export { toDot, writeDot } from './render/graphviz.js';

// Logging and CLI helpers for embedding
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions, LogSink } from './logger.js';
export { run } from './cli/run.js';
export { resolveConfig, UsageError } from './cli/config.js';
export type { CliConfig, CliIO } from './types/index.js';
