export {
  TokenType,
  Operator,
  PRECEDENCE,
  OPERATOR_SYMBOLS,
  StatementError,
  LexError,
  ParseError,
  EvalError,
  tokenToString,
} from './types.js';
export type {
  Token,
  LiteralToken,
  VariableToken,
  OperatorToken,
  BinaryOperator,
  TreeOperator,
  ASTNode,
  LiteralNode,
  VariableNode,
  OperatorNode,
  ExpressionNode,
  ErrorStage,
  LexErrorKind,
  ParseErrorKind,
  EvalErrorKind,
} from './types.js';

export { Scanner, tokenize } from './scanner.js';
export { Bindings } from './bindings.js';
export { literal, variable, unary, binary, isLeaf, nodeLabel, formatTree } from './tree.js';
export { Parser, parse } from './parser.js';
export type { ParseResult, ParserOptions, TraceStep } from './parser.js';
export { compile, evaluate, evaluateStatement, tryEvaluate } from './evaluator.js';
export type { Statement, Outcome } from './evaluator.js';
