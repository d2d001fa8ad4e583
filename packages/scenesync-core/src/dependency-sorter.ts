/**
 * Orders items so every dependency comes before the items depending on it. Edges that would close
 * a cycle are refused, so the graph stays acyclic.
 */
export class DependencySorter<K> implements Iterable<K> {
  private readonly deps = new Map<K, K[]>();

  /** Number of items with at least one dependency. */
  get size(): number {
    return this.deps.size;
  }

  /**
   * Records that `item` depends on `dependency`. Returns false, leaving the graph untouched, if
   * the edge already exists or `dependency` depends on `item` (directly or transitively).
   */
  add(item: K, dependency: K): boolean {
    if (this.dependsOn(dependency, item)) return false;
    let list = this.deps.get(item);
    if (list?.includes(dependency)) return false;
    if (!list) {
      list = [];
      this.deps.set(item, list);
    }
    list.push(dependency);
    return true;
  }

  /** True if `item` equals `dependency` or reaches it through recorded edges. */
  dependsOn(item: K, dependency: K): boolean {
    if (item === dependency) return true;
    const visited = new Set<K>([item]);
    const stack = [item];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const next of this.deps.get(current) ?? []) {
        if (next === dependency) return true;
        if (!visited.has(next)) {
          visited.add(next);
          stack.push(next);
        }
      }
    }
    return false;
  }

  /**
   * Depth-first post-order over every item that takes part in an edge. `{A→B, B→C}` sorts to
   * `[C, B, A]`.
   */
  sort(): K[] {
    const out: K[] = [];
    const visited = new Set<K>();
    const visit = (item: K) => {
      if (visited.has(item)) return;
      visited.add(item);
      for (const dep of this.deps.get(item) ?? []) visit(dep);
      out.push(item);
    };
    for (const item of this.deps.keys()) visit(item);
    return out;
  }

  [Symbol.iterator](): Iterator<K> {
    return this.sort()[Symbol.iterator]();
  }

  clear(): void {
    this.deps.clear();
  }
}
