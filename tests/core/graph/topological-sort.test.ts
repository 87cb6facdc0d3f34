import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DiGraph } from '../../../src/core/graph/digraph.js';
import { topologicalSort } from '../../../src/core/graph/topological-sort.js';
import { CyclicDependencyError } from '../../../src/utils/errors.js';

function graphOf(nodes: string[], edges: Array<[string, string]>): DiGraph<string, null> {
  const graph = new DiGraph<string, null>();
  nodes.forEach(node => graph.addNode(node, node));
  edges.forEach(([from, to]) => graph.addEdge(from, to, null));
  return graph;
}

const byId = (id: string): string => id;

describe('DiGraph', () => {
  it('tracks successors and predecessors', () => {
    const graph = graphOf(['a', 'b', 'c'], [['a', 'b'], ['a', 'c'], ['b', 'c']]);
    assert.deepEqual(graph.successors('a'), ['b', 'c']);
    assert.deepEqual(graph.predecessors('c'), ['a', 'b']);
    assert.equal(graph.inDegree('c'), 2);
    assert.deepEqual(graph.edges().map(([from, to]) => `${from}->${to}`), ['a->b', 'a->c', 'b->c']);
  });

  it('rejects edges to unknown nodes', () => {
    const graph = graphOf(['a'], []);
    assert.throws(() => graph.addEdge('a', 'missing', null), /unknown node/);
  });
});

describe('topologicalSort', () => {
  it('puts every node after its predecessors', () => {
    const graph = graphOf(['c', 'b', 'a'], [['a', 'b'], ['b', 'c']]);
    assert.deepEqual(topologicalSort(graph, byId), ['a', 'b', 'c']);
  });

  it('breaks ties by sort key regardless of insertion order', () => {
    const first = graphOf(['z', 'y', 'x', 'root'], [['root', 'z'], ['root', 'x']]);
    const second = graphOf(['root', 'x', 'y', 'z'], [['root', 'x'], ['root', 'z']]);
    assert.deepEqual(topologicalSort(first, byId), ['root', 'x', 'y', 'z']);
    assert.deepEqual(topologicalSort(second, byId), ['root', 'x', 'y', 'z']);
  });

  it('uses the sort key rather than the id', () => {
    const graph = new DiGraph<number, null>();
    graph.addNode('a', 2);
    graph.addNode('b', 1);
    assert.deepEqual(topologicalSort(graph, (_id, rank) => String(rank)), ['b', 'a']);
  });

  it('reports the nodes of a cycle', () => {
    const graph = graphOf(['a', 'b', 'c', 'd'], [['a', 'b'], ['b', 'c'], ['c', 'b']]);
    assert.throws(
      () => topologicalSort(graph, byId),
      (error: unknown) => error instanceof CyclicDependencyError && error.remaining.join(',') === 'b,c'
    );
  });

  it('sorts an empty graph', () => {
    assert.deepEqual(topologicalSort(new DiGraph<string, null>(), byId), []);
  });
});
