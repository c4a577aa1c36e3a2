import { describe, it, expect } from 'vitest';
import { MarkdownTreeBuilder } from '../markdown-tree.js';
import type { TreeNode } from '../../runtime/types/tree.js';

/** Compact (type, content, level, children) view of a tree */
function outline(node: TreeNode): unknown {
  return {
    type: node.type,
    content: node.content,
    ...(node.level !== undefined ? { level: node.level } : {}),
    children: node.children.map(outline),
  };
}

describe('MarkdownTreeBuilder', () => {
  const builder = new MarkdownTreeBuilder();

  it('nests paragraphs and sub-headings under their heading', () => {
    const root = builder.parse('# Header 1\nSome paragraph\n\n## Header 2\nAnother paragraph\n');

    expect(outline(root)).toEqual({
      type: 'root',
      content: '',
      children: [
        {
          type: 'heading',
          content: 'Header 1',
          level: 1,
          children: [
            { type: 'paragraph', content: 'Some paragraph', children: [] },
            {
              type: 'heading',
              content: 'Header 2',
              level: 2,
              children: [{ type: 'paragraph', content: 'Another paragraph', children: [] }],
            },
          ],
        },
      ],
    });
  });

  it('attaches each heading to the nearest preceding heading of lower level', () => {
    const root = builder.parse('# A\n### B\n## C\n#### D\n# E\n');

    const [a, e] = root.children;
    expect(root.children.map(n => n.content)).toEqual(['A', 'E']);
    expect(a.children.map(n => n.content)).toEqual(['B', 'C']);
    expect(a.children[1].children.map(n => n.content)).toEqual(['D']);
    expect(e.children).toEqual([]);
  });

  it('pops sibling headings of the same level', () => {
    const root = builder.parse('## One\n## Two\n### Two.a\n## Three\n');

    expect(root.children.map(n => n.content)).toEqual(['One', 'Two', 'Three']);
    expect(root.children[1].children.map(n => n.content)).toEqual(['Two.a']);
  });

  it('attaches paragraphs before any heading to root', () => {
    const root = builder.parse('Preamble\n\n# Title\n');

    expect(root.children.map(n => [n.type, n.content])).toEqual([
      ['paragraph', 'Preamble'],
      ['heading', 'Title'],
    ]);
  });

  it('skips headings with no text', () => {
    const root = builder.parse('# Title\n\n##\n\nBody\n');

    expect(root.children).toHaveLength(1);
    expect(root.children[0].children.map(n => [n.type, n.content])).toEqual([['paragraph', 'Body']]);
  });

  it('keeps inline markup as written', () => {
    const root = builder.parse('## **Bold** and `code`\n\nSee [link](http://example.com) and ![img](a.png) here\n');

    const heading = root.children[0];
    expect(heading.content).toBe('**Bold** and `code`');
    expect(heading.children[0].content).toBe('See [link](http://example.com) and ![img](a.png) here');
  });

  it('keeps backslash escapes in paragraph text', () => {
    const root = builder.parse('\\# not a heading\n');

    expect(root.children.map(n => [n.type, n.content])).toEqual([['paragraph', '\\# not a heading']]);
  });

  it('drops the closing hashes of a heading', () => {
    const root = builder.parse('## Title ##\n');

    expect(root.children[0].content).toBe('Title');
  });

  it('keeps soft line breaks inside a paragraph', () => {
    const root = builder.parse('line one\nline two\n');

    expect(root.children[0].content).toBe('line one\nline two');
  });

  it('ignores lists, code blocks and tables but reads blockquote paragraphs', () => {
    const markdown = [
      '- item one',
      '- item two',
      '',
      '```',
      'code',
      '```',
      '',
      '| a | b |',
      '| - | - |',
      '| 1 | 2 |',
      '',
      '> quoted text',
      '',
    ].join('\n');

    const root = builder.parse(markdown);

    expect(root.children.map(n => [n.type, n.content])).toEqual([['paragraph', 'quoted text']]);
  });

  it('returns a bare root for an empty document', () => {
    expect(outline(builder.parse(''))).toEqual({ type: 'root', content: '', children: [] });
  });

  it('produces the same tree when parsing the same text twice', () => {
    const markdown = '# A\n\ntext\n\n## B\n\nmore\n\n# C\n';

    expect(builder.parse(markdown)).toEqual(builder.parse(markdown));
  });
});
