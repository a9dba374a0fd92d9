/**
 * Tree generation utility
 */

export interface TreeNode {
  label: string;
  /** Extra lines printed under the label, indented to the node's children. */
  details?: string[];
  children?: TreeNode[];
}

/**
 * Draw a tree with box-drawing connectors. The root is printed without a
 * connector and its children start at column zero.
 */
export function generateTree(
  node: TreeNode,
  prefix: string = '',
  isLast: boolean = true,
  isRoot: boolean = true,
): string {
  const connector = isRoot ? '' : isLast ? '└── ' : '├── ';
  const childPrefix = isRoot ? '' : prefix + (isLast ? '    ' : '│   ');
  const children = node.children ?? [];

  let result = prefix + connector + node.label + '\n';
  for (const detail of node.details ?? []) {
    const rail = children.length > 0 ? '│ ' : '  ';
    result += childPrefix + rail + detail + '\n';
  }
  children.forEach((child, index) => {
    result += generateTree(child, childPrefix, index === children.length - 1, false);
  });

  return result;
}
