/**
 * Pre-order tree walk and node id assignment
 *
 * Both use an explicit work stack of (parent, next child index) frames, so
 * document depth never touches the call stack.
 */

import type { TreeNode } from '../runtime/types/tree.js';

export interface TreeEdge {
  parent: TreeNode;
  child: TreeNode;
}

interface WalkFrame {
  parent: TreeNode;
  childIndex: number;
}

/**
 * Yield every (parent, child) pair below `root` in pre-order
 */
export function* walkTree(root: TreeNode): Generator<TreeEdge> {
  const stack: WalkFrame[] = [{ parent: root, childIndex: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.childIndex >= frame.parent.children.length) {
      stack.pop();
      continue;
    }

    const child = frame.parent.children[frame.childIndex];
    frame.childIndex++;

    yield { parent: frame.parent, child };

    if (child.children.length > 0) {
      stack.push({ parent: child, childIndex: 0 });
    }
  }
}

export function nodeId(index: number): string {
  return `node_${index}`;
}

/**
 * Assign `node_0` to root and `node_1..n` in pre-order.
 *
 * Overwrites ids from any previous assignment.
 * @returns total number of nodes, root included
 */
export function assignNodeIds(root: TreeNode): number {
  root.id = nodeId(0);
  let count = 1;
  for (const { child } of walkTree(root)) {
    child.id = nodeId(count++);
  }
  return count;
}
