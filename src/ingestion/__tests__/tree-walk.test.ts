import { describe, it, expect } from 'vitest';
import { assignNodeIds, walkTree } from '../tree-walk.js';
import type { TreeNode } from '../../runtime/types/tree.js';

function heading(content: string, level: number, children: TreeNode[] = []): TreeNode {
  return { type: 'heading', content, level, children };
}

function paragraph(content: string): TreeNode {
  return { type: 'paragraph', content, children: [] };
}

function sampleTree(): TreeNode {
  return {
    type: 'root',
    content: '',
    children: [
      heading('H1', 1, [paragraph('P1'), heading('H2', 2, [paragraph('P2')])]),
      paragraph('P3'),
    ],
  };
}

describe('walkTree', () => {
  it('yields parent/child pairs in pre-order', () => {
    const pairs = [...walkTree(sampleTree())].map(({ parent, child }) => [
      parent.content || 'root',
      child.content,
    ]);

    expect(pairs).toEqual([
      ['root', 'H1'],
      ['H1', 'P1'],
      ['H1', 'H2'],
      ['H2', 'P2'],
      ['root', 'P3'],
    ]);
  });

  it('yields nothing for a childless root', () => {
    expect([...walkTree({ type: 'root', content: '', children: [] })]).toEqual([]);
  });
});

describe('assignNodeIds', () => {
  it('numbers root as node_0 and the rest in pre-order', () => {
    const root = sampleTree();

    const count = assignNodeIds(root);

    expect(count).toBe(6);
    expect(root.id).toBe('node_0');
    const ids = [...walkTree(root)].map(({ child }) => `${child.content}=${child.id}`);
    expect(ids).toEqual(['H1=node_1', 'P1=node_2', 'H2=node_3', 'P2=node_4', 'P3=node_5']);
  });

  it('is deterministic and overwrites stale ids', () => {
    const root = sampleTree();
    root.children[1].id = 'node_99';

    assignNodeIds(root);
    const first = [...walkTree(root)].map(({ child }) => child.id);
    assignNodeIds(root);
    const second = [...walkTree(root)].map(({ child }) => child.id);

    expect(first).toEqual(second);
    expect(root.children[1].id).toBe('node_5');
  });

  it('handles documents nested deeper than the call stack', () => {
    const root: TreeNode = { type: 'root', content: '', children: [] };
    let current = root;
    for (let i = 0; i < 20000; i++) {
      const next = paragraph(`p${i}`);
      current.children.push(next);
      current = next;
    }

    expect(assignNodeIds(root)).toBe(20001);
    expect(current.id).toBe('node_20000');
  });
});
