import { CascadeNode, CascadeResult, CascadeSummary } from './types';

export interface CascadeFormatOptions {
  /** Include non-stable parameters under each node (default: true) */
  showParameters?: boolean;
}

/**
 * Render a cascade tree as indented text:
 *
 *   HomeScreen [skippable]
 *   ├─ Header [skippable]
 *   └─ Feed [not skippable]
 *      └─ FeedItem [not skippable] (cycle detected: Feed)
 */
export function formatCascadeTree(result: CascadeResult, options: CascadeFormatOptions = {}): string {
  if (!result.root) {
    return '(no nodes visited)';
  }

  const lines: string[] = [formatNodeLabel(result.root)];
  appendNodeDetails(result.root, '', lines, options);
  appendChildren(result.root, '', lines, options);
  return lines.join('\n');
}

export function formatCascadeSummary(summary: CascadeSummary, complete = true): string {
  const parts = [
    `${summary.totalCount} ${summary.totalCount === 1 ? 'callable' : 'callables'}`,
    `${summary.skippableCount} skippable`,
    `${summary.unskippableCount} not skippable`,
    `max depth ${summary.maxDepth}`,
  ];

  if (summary.hasTruncatedBranches) {
    parts.push('truncated');
  }
  if (!complete) {
    parts.push('incomplete');
  }

  return parts.join(', ');
}

function appendChildren(
  node: CascadeNode,
  prefix: string,
  lines: string[],
  options: CascadeFormatOptions
): void {
  node.children.forEach((child, index) => {
    const isLast = index === node.children.length - 1;
    lines.push(`${prefix}${isLast ? '└─ ' : '├─ '}${formatNodeLabel(child)}`);

    const childPrefix = `${prefix}${isLast ? '   ' : '│  '}`;
    appendNodeDetails(child, childPrefix, lines, options);
    appendChildren(child, childPrefix, lines, options);
  });
}

function formatNodeLabel(node: CascadeNode): string {
  let label = `${node.stability.name} [${node.stability.isSkippable ? 'skippable' : 'not skippable'}]`;

  if (node.truncated) {
    label += ` (${node.truncated.reason})`;
  }
  if (node.error) {
    label += ` (unavailable: ${node.error})`;
  }

  return label;
}

function appendNodeDetails(
  node: CascadeNode,
  prefix: string,
  lines: string[],
  options: CascadeFormatOptions
): void {
  if (options.showParameters === false) {
    return;
  }

  const detailPrefix = `${prefix}${node.children.length > 0 ? '│  ' : '   '}`;
  for (const param of node.stability.parameters) {
    if (param.stability !== 'STABLE') {
      lines.push(`${detailPrefix}· ${param.name}: ${param.type} ${param.stability} - ${param.reason}`);
    }
  }
}
