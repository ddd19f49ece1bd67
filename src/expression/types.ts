/**
 * Token categories produced by the scanner
 */
export enum TokenType {
  LITERAL = 'LITERAL',
  VARIABLE = 'VARIABLE',
  OPERATOR = 'OPERATOR',
}

/**
 * Operators recognised by the scanner.
 * ASSIGN separates statements and never appears in a tree.
 */
export enum Operator {
  EQUIVALENCE = 'Equivalence',
  IMPLICATION = 'Implication',
  OR = 'Or',
  AND = 'And',
  NOT = 'Not',
  LPAREN = 'ParenOpen',
  RPAREN = 'ParenClose',
  ASSIGN = 'Assign',
}

/**
 * Binary operators that can appear in an expression tree
 */
export type BinaryOperator =
  | Operator.EQUIVALENCE
  | Operator.IMPLICATION
  | Operator.OR
  | Operator.AND;

/**
 * Operators that can appear in an expression tree
 */
export type TreeOperator = BinaryOperator | Operator.NOT;

/**
 * Binding strength of each tree operator, loosest first
 */
export const PRECEDENCE: Readonly<Record<TreeOperator, number>> = {
  [Operator.EQUIVALENCE]: 1,
  [Operator.IMPLICATION]: 2,
  [Operator.OR]: 3,
  [Operator.AND]: 4,
  [Operator.NOT]: 5,
};

/**
 * Source symbol of each operator
 */
export const OPERATOR_SYMBOLS: Readonly<Record<Operator, string>> = {
  [Operator.EQUIVALENCE]: '<=>',
  [Operator.IMPLICATION]: '=>',
  [Operator.OR]: 'v',
  [Operator.AND]: '^',
  [Operator.NOT]: '~',
  [Operator.LPAREN]: '(',
  [Operator.RPAREN]: ')',
  [Operator.ASSIGN]: ':=',
};

/**
 * Base shape shared by every token
 */
interface BaseToken {
  type: TokenType;
  /** Offset of the first character of the token in the source */
  position: number;
}

/**
 * A `0` or `1` literal
 */
export interface LiteralToken extends BaseToken {
  type: TokenType.LITERAL;
  value: boolean;
}

/**
 * A variable reference
 */
export interface VariableToken extends BaseToken {
  type: TokenType.VARIABLE;
  name: string;
}

/**
 * An operator, parenthesis or assignment
 */
export interface OperatorToken extends BaseToken {
  type: TokenType.OPERATOR;
  operator: Operator;
}

/**
 * A token produced by the scanner
 */
export type Token = LiteralToken | VariableToken | OperatorToken;

/**
 * Base interface for all tree nodes
 */
export interface ASTNode {
  type: string;
}

/**
 * Boolean literal leaf
 */
export interface LiteralNode extends ASTNode {
  type: 'Literal';
  value: boolean;
}

/**
 * Variable reference leaf, resolved against the bindings at evaluation time
 */
export interface VariableNode extends ASTNode {
  type: 'Variable';
  name: string;
}

/**
 * Operator application.
 * Binary operators use both children; NOT keeps its operand in `left`.
 */
export interface OperatorNode extends ASTNode {
  type: 'Operator';
  operator: TreeOperator;
  left: ExpressionNode | null;
  right: ExpressionNode | null;
}

/**
 * Union type of all expression node types
 */
export type ExpressionNode = LiteralNode | VariableNode | OperatorNode;

/**
 * Render a token the way it appears in source
 */
export function tokenToString(token: Token): string {
  switch (token.type) {
    case TokenType.LITERAL:
      return token.value ? '1' : '0';
    case TokenType.VARIABLE:
      return token.name;
    case TokenType.OPERATOR:
      return OPERATOR_SYMBOLS[token.operator];
  }
}

/**
 * Pipeline stage an error was raised in
 */
export type ErrorStage = 'lex' | 'parse' | 'evaluate';

export type LexErrorKind = 'UnexpectedCharacter' | 'IncompleteOperator';

export type ParseErrorKind =
  | 'UnexpectedValue'
  | 'UnexpectedOperator'
  | 'UnmatchedClosingParenthesis'
  | 'UnmatchedOpeningParenthesis'
  | 'EmptyExpression'
  | 'MissingOperand'
  | 'MisplacedAssignment'
  | 'InvalidAssignment'
  | 'UndefinedVariable'
  | 'Internal';

export type EvalErrorKind = 'UndefinedVariable' | 'MissingOperand' | 'MissingOperands';

/**
 * Base class of every error the pipeline raises
 */
export abstract class StatementError extends Error {
  abstract readonly stage: ErrorStage;
  abstract readonly kind: LexErrorKind | ParseErrorKind | EvalErrorKind;
}

/**
 * Error thrown when the scanner meets malformed input
 */
export class LexError extends StatementError {
  readonly stage = 'lex';

  constructor(
    message: string,
    public readonly kind: LexErrorKind,
    public readonly position: number,
    public readonly source: string
  ) {
    super(`${message} at position ${position}: "${source}"`);
    this.name = 'LexError';
  }
}

/**
 * Error thrown when parsing fails
 */
export class ParseError extends StatementError {
  readonly stage = 'parse';

  constructor(
    message: string,
    public readonly kind: ParseErrorKind,
    public readonly position: number,
    public readonly source: string
  ) {
    super(`${message} at position ${position}: "${source}"`);
    this.name = 'ParseError';
  }
}

/**
 * Error thrown when a tree cannot be evaluated
 */
export class EvalError extends StatementError {
  readonly stage = 'evaluate';

  constructor(
    message: string,
    public readonly kind: EvalErrorKind,
    /** Variable name or missing side, depending on kind */
    public readonly detail?: string
  ) {
    super(message);
    this.name = 'EvalError';
  }
}
