import { describe, it, expect, beforeEach } from 'vitest';
import { GraphTraversal, renderNode } from '../graph-traversal.js';
import { Logger } from '../../utils/logger.js';
import { InMemoryGraphStore } from './in-memory-graph-store.js';

describe('GraphTraversal', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = new Logger({ sink: line => lines.push(line) });
  });

  it('renders headings and paragraphs depth-first', async () => {
    const store = new InMemoryGraphStore()
      .addNode({ id: 'node_0', type: 'root', content: '' })
      .addNode({ id: 'node_1', type: 'heading', content: 'Header 1', level: 1 }, 'node_0')
      .addNode({ id: 'node_2', type: 'paragraph', content: 'Paragraph 1' }, 'node_1')
      .addNode({ id: 'node_3', type: 'heading', content: 'Header 2', level: 2 }, 'node_1');

    const markdown = await new GraphTraversal(store, logger).traverseToMarkdown();

    expect(markdown).toBe('# Header 1\n\nParagraph 1\n\n## Header 2\n\n');
    expect(store.childQueries).toEqual(['node_0', 'node_1', 'node_2', 'node_3']);
  });

  it('visits a subtree before the next sibling', async () => {
    const store = new InMemoryGraphStore()
      .addNode({ id: 'node_0', type: 'root', content: '' })
      .addNode({ id: 'node_1', type: 'heading', content: 'A', level: 1 }, 'node_0')
      .addNode({ id: 'node_2', type: 'paragraph', content: 'a text' }, 'node_1')
      .addNode({ id: 'node_3', type: 'heading', content: 'B', level: 1 }, 'node_0')
      .addNode({ id: 'node_4', type: 'paragraph', content: 'b text' }, 'node_3');

    const markdown = await new GraphTraversal(store, logger).traverseToMarkdown();

    expect(markdown).toBe('# A\n\na text\n\n# B\n\nb text\n\n');
  });

  it('returns empty output and logs an error when the root is missing', async () => {
    const markdown = await new GraphTraversal(new InMemoryGraphStore(), logger).traverseToMarkdown();

    expect(markdown).toBe('');
    expect(lines).toEqual(['[ERROR] Root node not found in graph']);
  });

  it('returns empty output for a root without children', async () => {
    const store = new InMemoryGraphStore().addNode({ id: 'node_0', type: 'root', content: '' });

    expect(await new GraphTraversal(store, logger).traverseToMarkdown()).toBe('');
    expect(lines).toEqual([]);
  });

  it('skips unknown node types but still walks their children', async () => {
    const store = new InMemoryGraphStore()
      .addNode({ id: 'node_0', type: 'root', content: '' })
      .addNode({ id: 'node_1', type: 'table', content: 'ignored' }, 'node_0')
      .addNode({ id: 'node_2', type: 'paragraph', content: 'kept' }, 'node_1');

    expect(await new GraphTraversal(store, logger).traverseToMarkdown()).toBe('kept\n\n');
  });
});

describe('renderNode', () => {
  it('uses one # per heading level', () => {
    expect(renderNode({ id: 'node_1', type: 'heading', content: 'Deep', level: 4 })).toBe('#### Deep');
  });

  it('defaults a heading without level to level 1', () => {
    expect(renderNode({ id: 'node_1', type: 'heading', content: 'Title' })).toBe('# Title');
  });

  it('renders nothing for the root', () => {
    expect(renderNode({ id: 'node_0', type: 'root', content: '' })).toBeNull();
  });
});
