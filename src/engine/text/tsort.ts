/**
 * @fileoverview Topological sort over `u v` token pairs.
 *
 * @module engine/text/tsort
 */

import { ExpressionError } from '../errors';
import { fieldsOf } from './lines';

/**
 * The input graph has a cycle.
 *
 * @property cycle - Nodes on the loop, first node repeated at the end
 */
export class CycleError extends ExpressionError {
  constructor(readonly cycle: string[]) {
    super(`input contains a loop: ${cycle.join(' -> ')}`);
  }
}

/**
 * Order the nodes so that for every pair `u v`, `u` comes before `v`.
 *
 * Tokens are read in pairs across all lines. A pair with equal members
 * (`u u`) only declares the node. Nodes are visited in the order they were
 * first seen, and edges out of a node in the order they were declared, so
 * the output is deterministic.
 *
 * @throws ExpressionError when the token count is odd
 * @throws CycleError when the pairs contain a loop
 *
 * @example
 * topologicalSort(['a b', 'b c'])  // ['a', 'b', 'c']
 */
export function topologicalSort(lines: readonly string[]): string[] {
  const tokens = lines.flatMap(fieldsOf);
  if (tokens.length % 2 !== 0) {
    throw new ExpressionError('input contains an odd number of tokens');
  }

  const graph = new Map<string, string[]>();
  const ensure = (node: string) => {
    let edges = graph.get(node);
    if (!edges) {
      edges = [];
      graph.set(node, edges);
    }
    return edges;
  };

  for (let i = 0; i < tokens.length; i += 2) {
    const [from, to] = [tokens[i], tokens[i + 1]];
    const edges = ensure(from);
    ensure(to);
    if (from !== to && !edges.includes(to)) {
      edges.push(to);
    }
  }

  const done = new Set<string>();
  const onPath = new Set<string>();
  const postorder: string[] = [];

  // Explicit stack of (node, next edge index) frames; chains may be long.
  const visit = (start: string) => {
    const stack: Array<{ node: string; next: number }> = [{ node: start, next: 0 }];
    onPath.add(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edges = graph.get(frame.node) ?? [];

      if (frame.next < edges.length) {
        const child = edges[frame.next++];
        if (done.has(child)) continue;
        if (onPath.has(child)) {
          const path = stack.map(entry => entry.node);
          throw new CycleError([...path.slice(path.indexOf(child)), child]);
        }
        onPath.add(child);
        stack.push({ node: child, next: 0 });
        continue;
      }

      stack.pop();
      onPath.delete(frame.node);
      done.add(frame.node);
      postorder.push(frame.node);
    }
  };

  for (const node of graph.keys()) {
    if (!done.has(node)) visit(node);
  }

  return postorder.reverse();
}
