import * as AST from './ast';
import { DecorationTable } from '../semantic/decorations';

function nodeLine(node: AST.Node, depth: number): string {
  const indent = '  '.repeat(depth);
  return `${indent}<${JSON.stringify(node.type)}, ${JSON.stringify(node.content)}, ${JSON.stringify(node.attributes)}>`;
}

/**
 * Render a tree one node per line, pre-order, two spaces per level:
 *
 *   <"Program", "root", {}>
 *     <"AthleteDecl", "Ana", {"name":"Ana",...}>
 */
export function formatTree(root: AST.Node): string {
  const lines: string[] = [];
  AST.walk(root, (node, depth) => {
    lines.push(nodeLine(node, depth));
  });
  return lines.join('\n');
}

/** Like `formatTree`, with a `Decorated: {...}` line under every decorated node. */
export function formatDecoratedTree(root: AST.Node, decorations: DecorationTable): string {
  const lines: string[] = [];
  AST.walk(root, (node, depth) => {
    lines.push(nodeLine(node, depth));
    const decoration = decorations.get(node.id);
    if (decoration) {
      lines.push(`${'  '.repeat(depth + 1)}Decorated: ${JSON.stringify(decoration)}`);
    }
  });
  return lines.join('\n');
}
