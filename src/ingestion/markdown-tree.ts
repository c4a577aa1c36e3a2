/**
 * Markdown Tree Builder
 *
 * Turns Markdown text into a root / heading / paragraph tree. Headings are
 * nested with a heading-level stack: a heading of level L becomes a child of
 * the nearest preceding heading with a level below L (or of root), and
 * paragraphs attach to the most recently opened heading.
 *
 * Only headings and paragraphs are captured. Lists, code blocks, tables and
 * HTML blocks contribute no nodes.
 */

import MarkdownIt from 'markdown-it';
import type { TreeNode } from '../runtime/types/tree.js';
import type { Logger } from '../runtime/utils/logger.js';

type Token = ReturnType<MarkdownIt['parse']>[number];

const HEADING_TAG = /^h([1-6])$/;

export function createRootNode(): TreeNode {
  return { type: 'root', content: '', children: [] };
}

/**
 * Raw Markdown source of an inline token.
 *
 * Inline markup is kept as written so the stored text renders back to the
 * same Markdown.
 */
export function inlineText(token: Token | undefined): string {
  if (!token || token.type !== 'inline') return '';
  return token.content;
}

export class MarkdownTreeBuilder {
  private readonly md: MarkdownIt;

  constructor(private readonly logger?: Logger) {
    this.md = new MarkdownIt({ html: true });
  }

  /**
   * Parse Markdown content into a tree rooted at a `root` node
   */
  parse(content: string): TreeNode {
    const tokens = this.md.parse(content, {});
    const root = createRootNode();
    const headingStack: TreeNode[] = [root];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      if (token.type === 'heading_open') {
        const match = HEADING_TAG.exec(token.tag);
        if (!match) continue;
        const level = Number(match[1]);
        const text = inlineText(tokens[i + 1]).trim();
        if (!text) {
          this.logger?.trace(`Skipping empty h${level}`);
          continue;
        }

        while (headingStack.length > 1 && (headingStack[headingStack.length - 1].level ?? 0) >= level) {
          headingStack.pop();
        }

        const heading: TreeNode = { type: 'heading', content: text, level, children: [] };
        headingStack[headingStack.length - 1].children.push(heading);
        headingStack.push(heading);
        this.logger?.trace(`Heading h${level}: ${text}`);
      } else if (token.type === 'paragraph_open' && !token.hidden) {
        const text = inlineText(tokens[i + 1]).trim();
        if (!text) continue;

        headingStack[headingStack.length - 1].children.push({
          type: 'paragraph',
          content: text,
          children: [],
        });
      }
    }

    this.logger?.debug(`Parsed markdown into ${countNodes(root)} nodes`);
    return root;
  }
}

function countNodes(root: TreeNode): number {
  let count = 0;
  const stack: TreeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    count++;
    stack.push(...node.children);
  }
  return count;
}
