import {
  Operator,
  BinaryOperator,
  ExpressionNode,
  OperatorNode,
  EvalError,
  StatementError,
} from './types.js';
import { Bindings } from './bindings.js';
import { Parser, ParserOptions } from './parser.js';

const BINARY_OPERATIONS: Readonly<Record<BinaryOperator, (left: boolean, right: boolean) => boolean>> = {
  [Operator.AND]: (left, right) => left && right,
  [Operator.OR]: (left, right) => left || right,
  [Operator.EQUIVALENCE]: (left, right) => left === right,
  [Operator.IMPLICATION]: (left, right) => !(left && !right),
};

interface PendingNode {
  node: ExpressionNode;
  /** Operands have been evaluated and sit on the value stack */
  operandsReady: boolean;
}

/**
 * Evaluate a tree against a bindings table.
 *
 * Both operands of a binary operator are always evaluated, left first,
 * so an undefined variable on either side is reported even when the
 * other side would decide the result. The walk keeps its own stacks,
 * so tree depth is not limited by the call stack.
 *
 * @throws EvalError for undefined variables and malformed nodes
 */
export function evaluate(tree: ExpressionNode, bindings: Bindings): boolean {
  const pending: PendingNode[] = [{ node: tree, operandsReady: false }];
  const values: boolean[] = [];

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    const { node } = item;

    switch (node.type) {
      case 'Literal':
        values.push(node.value);
        break;

      case 'Variable': {
        const value = bindings.get(node.name);
        if (value === undefined) {
          throw new EvalError(`Undefined variable "${node.name}"`, 'UndefinedVariable', node.name);
        }
        values.push(value);
        break;
      }

      case 'Operator':
        if (item.operandsReady) {
          values.push(applyOperator(node, values));
        } else {
          pending.push({ node, operandsReady: true });
          // right is pushed first so the left operand is evaluated first
          for (const operand of operandsOf(node).reverse()) {
            pending.push({ node: operand, operandsReady: false });
          }
        }
        break;

      default:
        // TypeScript exhaustiveness check
        const _exhaustive: never = node;
        throw new Error(`Unknown node type: ${(_exhaustive as ExpressionNode).type}`);
    }
  }

  const result = popValue(values);
  if (values.length > 0) {
    throw new Error(`Evaluation left ${values.length} unused values`);
  }
  return result;
}

/**
 * Operands of an operator node, left first
 */
function operandsOf(node: OperatorNode): ExpressionNode[] {
  const { operator, left, right } = node;

  if (operator === Operator.NOT) {
    if (left === null) {
      throw new EvalError('Cannot evaluate negation without an operand', 'MissingOperand', 'left');
    }
    return [left];
  }

  if (left === null && right === null) {
    throw new EvalError(`Expected two operands for ${operator}, got none`, 'MissingOperands');
  }
  if (right === null) {
    throw new EvalError(`Expected two operands for ${operator}, got only left`, 'MissingOperand', 'right');
  }
  if (left === null) {
    throw new EvalError(`Expected two operands for ${operator}, got only right`, 'MissingOperand', 'left');
  }
  return [left, right];
}

function applyOperator(node: OperatorNode, values: boolean[]): boolean {
  const { operator } = node;

  if (operator === Operator.NOT) {
    return !popValue(values);
  }

  const right = popValue(values);
  const left = popValue(values);
  return BINARY_OPERATIONS[operator](left, right);
}

function popValue(values: boolean[]): boolean {
  const value = values.pop();
  if (value === undefined) {
    throw new Error('Evaluation value stack is empty');
  }
  return value;
}

/**
 * A parsed statement ready for evaluation
 */
export interface Statement {
  /** The trimmed source string */
  readonly source: string;
  readonly tree: ExpressionNode;
  readonly bindings: Bindings;
  evaluate(): boolean;
}

class CompiledStatement implements Statement {
  readonly source: string;
  readonly tree: ExpressionNode;
  readonly bindings: Bindings;

  constructor(source: string, tree: ExpressionNode, bindings: Bindings) {
    this.source = source;
    this.tree = tree;
    this.bindings = bindings;
  }

  evaluate(): boolean {
    return evaluate(this.tree, this.bindings);
  }
}

/**
 * Compile a source string into a Statement.
 *
 * @throws LexError or ParseError if the statement is invalid
 *
 * @example
 * ```ts
 * const statement = compile('p := 1 q := 0 p => q');
 * statement.bindings.toJSON(); // { p: true, q: false }
 * statement.evaluate();        // false
 * ```
 */
export function compile(source: string, options?: ParserOptions): Statement {
  const trimmed = source.trim();
  const { tree, bindings } = new Parser(trimmed, options).parse();
  return new CompiledStatement(trimmed, tree, bindings);
}

/**
 * Compile and evaluate a statement in one step.
 *
 * @throws LexError, ParseError or EvalError
 */
export function evaluateStatement(source: string): boolean {
  return compile(source).evaluate();
}

/**
 * Outcome of {@link tryEvaluate}
 */
export type Outcome =
  | { ok: true; value: boolean; statement: Statement }
  | { ok: false; error: StatementError };

/**
 * Compile and evaluate a statement, returning pipeline errors instead of
 * throwing them. Anything that is not a StatementError is rethrown.
 */
export function tryEvaluate(source: string, options?: ParserOptions): Outcome {
  try {
    const statement = compile(source, options);
    return { ok: true, value: statement.evaluate(), statement };
  } catch (error) {
    if (error instanceof StatementError) {
      return { ok: false, error };
    }
    throw error;
  }
}
