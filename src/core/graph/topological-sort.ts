import { CyclicDependencyError } from '../../utils/errors.js';
import type { DiGraph } from './digraph.js';

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Kahn's algorithm. Among the nodes that are ready at any point, the one with
 * the smallest `sortKey` goes first, so the order only depends on the graph
 * and the keys, never on insertion order. Returns node ids.
 *
 * @throws CyclicDependencyError with the ids that could not be ordered
 */
export function topologicalSort<N, E>(graph: DiGraph<N, E>, sortKey: (id: string, node: N) => string): string[] {
  const keys = new Map<string, string>();
  const remainingInDegree = new Map<string, number>();
  for (const id of graph.nodeIds()) {
    const node = graph.getNode(id);
    keys.set(id, node === undefined ? id : sortKey(id, node));
    remainingInDegree.set(id, graph.inDegree(id));
  }

  const keyOf = (id: string): string => keys.get(id) ?? id;
  // Sorted ascending by key, ties by id; small graphs make binary insertion sufficient
  const ready: string[] = [];
  const enqueue = (id: string): void => {
    const key = keyOf(id);
    let low = 0;
    let high = ready.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const cmp = compareKeys(keyOf(ready[mid]), key) || compareKeys(ready[mid], id);
      if (cmp < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    ready.splice(low, 0, id);
  };

  for (const [id, degree] of remainingInDegree) {
    if (degree === 0) {
      enqueue(id);
    }
  }

  const order: string[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) {
      break;
    }
    order.push(id);
    for (const successor of graph.successors(id)) {
      const degree = (remainingInDegree.get(successor) ?? 0) - 1;
      remainingInDegree.set(successor, degree);
      if (degree === 0) {
        enqueue(successor);
      }
    }
  }

  if (order.length < graph.size) {
    const placed = new Set(order);
    const remaining = graph.nodeIds().filter(id => !placed.has(id)).sort((a, b) => compareKeys(keyOf(a), keyOf(b)));
    throw new CyclicDependencyError(remaining);
  }

  return order;
}
