/**
 * Directed graph keyed by string node ids, with a value per node and per edge.
 * Insertion order of nodes and edges is preserved.
 */
export class DiGraph<N, E> {
  private readonly nodes = new Map<string, N>();
  private readonly outgoing = new Map<string, Map<string, E>>();
  private readonly incoming = new Map<string, Set<string>>();

  addNode(id: string, value: N): void {
    this.nodes.set(id, value);
    if (!this.outgoing.has(id)) {
      this.outgoing.set(id, new Map());
      this.incoming.set(id, new Set());
    }
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): N | undefined {
    return this.nodes.get(id);
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Add or replace the edge `from → to`. Both nodes must exist.
   */
  addEdge(from: string, to: string, value: E): void {
    const targets = this.outgoing.get(from);
    const sources = this.incoming.get(to);
    if (!targets || !sources) {
      throw new Error(`Cannot add edge ${from} -> ${to}: unknown node`);
    }
    targets.set(to, value);
    sources.add(from);
  }

  getEdge(from: string, to: string): E | undefined {
    return this.outgoing.get(from)?.get(to);
  }

  successors(id: string): string[] {
    return [...(this.outgoing.get(id)?.keys() ?? [])];
  }

  predecessors(id: string): string[] {
    return [...(this.incoming.get(id) ?? [])];
  }

  inDegree(id: string): number {
    return this.incoming.get(id)?.size ?? 0;
  }

  edges(): Array<[from: string, to: string, value: E]> {
    const result: Array<[string, string, E]> = [];
    for (const [from, targets] of this.outgoing) {
      for (const [to, value] of targets) {
        result.push([from, to, value]);
      }
    }
    return result;
  }
}
