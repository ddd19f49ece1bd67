import { writeFile } from 'fs/promises';
import type { ExpressionNode } from '../expression/types.js';
import { nodeLabel } from '../expression/tree.js';

interface QueuedNode {
  node: ExpressionNode;
  id: number;
  parent: number | null;
}

function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Render a tree as an undirected Graphviz graph.
 *
 * Nodes are numbered breadth-first from the root (0). Operator nodes are
 * drawn as boxes, leaves as plain labels. All node definitions come
 * before the edges.
 *
 * @example
 * ```ts
 * toDot(compile('~1').tree);
 * // graph G {
 * //     0 [label="Not" shape="box"]
 * //     1 [label="true"]
 * //     0 -- 1
 * // }
 * ```
 */
export function toDot(tree: ExpressionNode): string {
  const definitions: string[] = [];
  const edges: string[] = [];
  const queue: QueuedNode[] = [{ node: tree, id: 0, parent: null }];
  let nextId = 1;

  for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
    const { node, id, parent } = item;
    const label = escapeLabel(nodeLabel(node));

    if (node.type === 'Operator') {
      definitions.push(`    ${id} [label="${label}" shape="box"]`);
      for (const child of [node.left, node.right]) {
        if (child !== null) {
          queue.push({ node: child, id: nextId++, parent: id });
        }
      }
    } else {
      definitions.push(`    ${id} [label="${label}"]`);
    }

    if (parent !== null) {
      edges.push(`    ${parent} -- ${id}`);
    }
  }

  return ['graph G {', ...definitions, ...edges, '}'].join('\n') + '\n';
}

/**
 * Write the Graphviz rendering of a tree to a file
 */
export async function writeDot(tree: ExpressionNode, path: string): Promise<void> {
  await writeFile(path, toDot(tree), 'utf8');
}
