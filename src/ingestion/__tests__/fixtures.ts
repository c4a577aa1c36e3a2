import type { TreeNode } from '../../runtime/types/tree.js';

/** root -> h1 "Header 1" -> [p "Paragraph 1", h2 "Header 2"] */
export function headerTree(): TreeNode {
  return {
    type: 'root',
    content: '',
    children: [
      {
        type: 'heading',
        content: 'Header 1',
        level: 1,
        children: [
          { type: 'paragraph', content: 'Paragraph 1', children: [] },
          { type: 'heading', content: 'Header 2', level: 2, children: [] },
        ],
      },
    ],
  };
}

export function emptyTree(): TreeNode {
  return { type: 'root', content: '', children: [] };
}
