import { isContainer, type LayoutNode } from './layout-node.js';

const EXPANDED_KINDS = new Set(['page', 'text-box', 'text-line']);

function formatCoordinate(value: number): string {
  return value.toFixed(3);
}

export function describeNode(node: LayoutNode): string {
  if (node.kind === 'anno') {
    return `anno ${JSON.stringify(node.text)}`;
  }
  const bbox = [node.x0, node.y0, node.x1, node.y1].map(formatCoordinate).join(',');
  if (node.kind === 'char' || node.kind === 'text-line' || node.kind === 'text-box') {
    return `${node.kind} ${bbox} ${JSON.stringify(node.lowerText)}`;
  }
  return `${node.kind} ${bbox}`;
}

/**
 * Indented dump of a node tree, one node per line.
 * Only the page and text containers are expanded, characters are listed
 * under their text line.
 */
export function formatNodeTree(root: LayoutNode): string {
  const lines: string[] = [];
  const stack: Array<[string, LayoutNode]> = [['', root]];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [indent, node] = entry;
    lines.push(`${indent}${describeNode(node)}`);

    if (isContainer(node) && EXPANDED_KINDS.has(node.kind)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined) {
          stack.push([`${indent}  `, child]);
        }
      }
    }
  }

  return lines.join('\n');
}
