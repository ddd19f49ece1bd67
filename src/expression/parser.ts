import {
  TokenType,
  Token,
  Operator,
  TreeOperator,
  BinaryOperator,
  PRECEDENCE,
  OPERATOR_SYMBOLS,
  ParseError,
  ParseErrorKind,
  ExpressionNode,
  tokenToString,
} from './types.js';
import { Scanner } from './scanner.js';
import { Bindings } from './bindings.js';
import { literal, variable, unary, binary } from './tree.js';

/**
 * Tree and bindings produced by a successful parse
 */
export interface ParseResult {
  tree: ExpressionNode;
  bindings: Bindings;
}

/**
 * Parser state after one token has been handled
 */
export interface TraceStep {
  token: Token;
  /** Operator stack, bottom first */
  operators: Operator[];
  /** Number of finished subtrees on the node stack */
  depth: number;
}

export interface ParserOptions {
  /**
   * Called after each token is handled. An assignment is reported once,
   * on its `:=` token, after its right-hand side has been consumed.
   */
  trace?: (step: TraceStep) => void;
}

interface StackEntry {
  operator: TreeOperator | Operator.LPAREN;
  position: number;
}

/**
 * Shunting-yard parser for propositional statements.
 *
 * Grammar:
 *   statement   := assignment* expression
 *   assignment  := variable ':=' (literal | variable)
 *   expression  := equivalence
 *   equivalence := implication ('<=>' implication)*
 *   implication := disjunction ('=>' disjunction)*
 *   disjunction := conjunction ('v' conjunction)*
 *   conjunction := unary ('^' unary)*
 *   unary       := '~' unary | primary
 *   primary     := literal | variable | '(' expression ')'
 *
 * Binary operators are left-associative. Instead of emitting postfix
 * order, every reduction combines the top of the node stack into a new
 * subtree, so the last node standing is the finished tree.
 */
export class Parser {
  private readonly source: string;
  private readonly options: ParserOptions;

  private operators: StackEntry[] = [];
  private nodes: ExpressionNode[] = [];
  private values = new Map<string, boolean>();
  private expectValue = true;

  constructor(source: string, options: ParserOptions = {}) {
    this.source = source;
    this.options = options;
  }

  /**
   * Parse the statement and return its tree with the assigned bindings.
   *
   * @throws LexError if the source contains malformed tokens
   * @throws ParseError if the tokens do not form a statement
   */
  parse(): ParseResult {
    this.operators = [];
    this.nodes = [];
    this.values = new Map();
    this.expectValue = true;

    const tokens = new Scanner(this.source)[Symbol.iterator]();
    let previous: Token | null = null;

    for (;;) {
      const step = tokens.next();
      if (step.done) break;
      const token = step.value;

      this.handleToken(token, previous, tokens);
      previous = token;

      this.options.trace?.({
        token,
        operators: this.operators.map((entry) => entry.operator),
        depth: this.nodes.length,
      });
    }

    return this.finish();
  }

  private handleToken(token: Token, previous: Token | null, tokens: Iterator<Token>): void {
    if (token.type === TokenType.LITERAL) {
      this.pushValue(literal(token.value), token);
      return;
    }
    if (token.type === TokenType.VARIABLE) {
      this.pushValue(variable(token.name), token);
      return;
    }

    const operator = token.operator;
    switch (operator) {
      case Operator.LPAREN:
        if (!this.expectValue) {
          throw this.error('Unexpected "(", expected an operator', 'UnexpectedValue', token.position);
        }
        this.operators.push({ operator, position: token.position });
        return;

      case Operator.RPAREN:
        this.closeGroup(token.position);
        return;

      case Operator.NOT:
        // prefix operator: nothing on its left can be reduced yet
        if (!this.expectValue) {
          throw this.error(
            'Unexpected operator "~", negation must precede a value',
            'UnexpectedOperator',
            token.position
          );
        }
        this.operators.push({ operator, position: token.position });
        return;

      case Operator.ASSIGN:
        this.assign(token.position, previous, tokens);
        return;

      default:
        this.pushBinary(operator, token.position);
    }
  }

  private pushValue(node: ExpressionNode, token: Token): void {
    if (!this.expectValue) {
      throw this.error(
        `Unexpected value "${tokenToString(token)}", expected an operator`,
        'UnexpectedValue',
        token.position
      );
    }
    this.nodes.push(node);
    this.expectValue = false;
  }

  private pushBinary(operator: BinaryOperator, position: number): void {
    if (this.expectValue) {
      throw this.error(
        `Unexpected operator "${OPERATOR_SYMBOLS[operator]}", expected a value`,
        'UnexpectedOperator',
        position
      );
    }

    for (let top = this.peek(); top !== undefined; top = this.peek()) {
      if (top.operator === Operator.LPAREN || PRECEDENCE[top.operator] < PRECEDENCE[operator]) {
        break;
      }
      this.operators.pop();
      this.reduce(top.operator, top.position);
    }

    this.operators.push({ operator, position });
    this.expectValue = true;
  }

  private closeGroup(position: number): void {
    if (!this.operators.some((entry) => entry.operator === Operator.LPAREN)) {
      throw this.error(
        'Unmatched closing parenthesis ")"',
        'UnmatchedClosingParenthesis',
        position
      );
    }
    if (this.expectValue) {
      throw this.error('Unexpected ")", expected a value', 'UnexpectedOperator', position);
    }

    for (let entry = this.operators.pop(); entry !== undefined; entry = this.operators.pop()) {
      if (entry.operator === Operator.LPAREN) {
        return;
      }
      this.reduce(entry.operator, entry.position);
    }
  }

  /**
   * Handle `name := value`. Only valid while the statement so far is the
   * single variable that precedes the `:=`.
   */
  private assign(position: number, previous: Token | null, tokens: Iterator<Token>): void {
    if (
      previous === null ||
      previous.type !== TokenType.VARIABLE ||
      this.nodes.length !== 1 ||
      this.operators.length > 0
    ) {
      throw this.error(
        'Assignment must have the form "<variable> := <value>" and precede the expression',
        'MisplacedAssignment',
        position
      );
    }

    const step = tokens.next();
    if (step.done) {
      throw this.error('Expected a value after ":="', 'InvalidAssignment', this.source.length);
    }

    const value = this.resolveAssignedValue(step.value);
    this.values.set(previous.name, value);
    this.nodes.pop();
    this.expectValue = true;
  }

  private resolveAssignedValue(token: Token): boolean {
    switch (token.type) {
      case TokenType.LITERAL:
        return token.value;

      case TokenType.VARIABLE: {
        const value = this.values.get(token.name);
        if (value === undefined) {
          throw this.error(
            `Undefined variable "${token.name}" in assignment`,
            'UndefinedVariable',
            token.position
          );
        }
        return value;
      }

      case TokenType.OPERATOR:
        throw this.error(
          `Expected a value after ":=", found "${tokenToString(token)}"`,
          'InvalidAssignment',
          token.position
        );
    }
  }

  /**
   * Combine the operator with its operands from the node stack
   */
  private reduce(operator: TreeOperator, position: number): void {
    const right = this.nodes.pop();
    if (right === undefined) {
      throw this.missingOperand(operator, position);
    }

    if (operator === Operator.NOT) {
      this.nodes.push(unary(right));
      return;
    }

    const left = this.nodes.pop();
    if (left === undefined) {
      throw this.missingOperand(operator, position);
    }
    this.nodes.push(binary(operator, left, right));
  }

  private finish(): ParseResult {
    if (this.nodes.length === 0 && this.operators.length === 0) {
      throw this.error('Empty expression', 'EmptyExpression', this.source.length);
    }
    if (this.expectValue) {
      throw this.error(
        'Unexpected end of statement, expected a value',
        'MissingOperand',
        this.source.length
      );
    }

    for (let entry = this.operators.pop(); entry !== undefined; entry = this.operators.pop()) {
      if (entry.operator === Operator.LPAREN) {
        throw this.error(
          'Unmatched opening parenthesis "("',
          'UnmatchedOpeningParenthesis',
          entry.position
        );
      }
      this.reduce(entry.operator, entry.position);
    }

    const [tree, ...rest] = this.nodes;
    if (tree === undefined || rest.length > 0) {
      throw this.error(
        `Expected a single expression, found ${this.nodes.length}`,
        'Internal',
        this.source.length
      );
    }

    return { tree, bindings: new Bindings(this.values) };
  }

  private peek(): StackEntry | undefined {
    return this.operators[this.operators.length - 1];
  }

  private missingOperand(operator: TreeOperator, position: number): ParseError {
    return this.error(
      `Operator "${OPERATOR_SYMBOLS[operator]}" is missing an operand`,
      'MissingOperand',
      position
    );
  }

  private error(message: string, kind: ParseErrorKind, position: number): ParseError {
    return new ParseError(message, kind, position, this.source);
  }
}

/**
 * Parse a statement into its tree and bindings.
 */
export function parse(source: string, options?: ParserOptions): ParseResult {
  return new Parser(source, options).parse();
}
