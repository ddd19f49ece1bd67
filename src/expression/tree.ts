import {
  Operator,
  OPERATOR_SYMBOLS,
  ExpressionNode,
  LiteralNode,
  VariableNode,
  OperatorNode,
  BinaryOperator,
} from './types.js';

export function literal(value: boolean): LiteralNode {
  return { type: 'Literal', value };
}

export function variable(name: string): VariableNode {
  return { type: 'Variable', name };
}

/**
 * Build a negation node. The operand is stored as the left child.
 */
export function unary(operand: ExpressionNode): OperatorNode {
  return { type: 'Operator', operator: Operator.NOT, left: operand, right: null };
}

export function binary(
  operator: BinaryOperator,
  left: ExpressionNode,
  right: ExpressionNode
): OperatorNode {
  return { type: 'Operator', operator, left, right };
}

export function isLeaf(node: ExpressionNode): node is LiteralNode | VariableNode {
  return node.type !== 'Operator';
}

/**
 * Short label of a single node: `true`/`false`, the variable name,
 * or the operator name.
 */
export function nodeLabel(node: ExpressionNode): string {
  switch (node.type) {
    case 'Literal':
      return String(node.value);
    case 'Variable':
      return node.name;
    case 'Operator':
      return node.operator;
  }
}

/**
 * Render a tree as fully parenthesised infix using source symbols.
 * Absent children print as `?`.
 *
 * @example
 * ```ts
 * formatTree(binary(Operator.OR, binary(Operator.AND, literal(true), literal(false)), literal(true)));
 * // '((1 ^ 0) v 1)'
 * ```
 */
export function formatTree(node: ExpressionNode | null): string {
  if (node === null) {
    return '?';
  }

  // pieces still to print, last first; strings are printed as they are
  const pending: (ExpressionNode | string)[] = [node];
  const output: string[] = [];

  for (let piece = pending.pop(); piece !== undefined; piece = pending.pop()) {
    if (typeof piece === 'string') {
      output.push(piece);
      continue;
    }

    switch (piece.type) {
      case 'Literal':
        output.push(piece.value ? '1' : '0');
        break;
      case 'Variable':
        output.push(piece.name);
        break;
      case 'Operator':
        if (piece.operator === Operator.NOT) {
          pending.push(piece.left ?? '?', '~');
        } else {
          pending.push(
            ')',
            piece.right ?? '?',
            ` ${OPERATOR_SYMBOLS[piece.operator]} `,
            piece.left ?? '?',
            '('
          );
        }
        break;
    }
  }

  return output.join('');
}
