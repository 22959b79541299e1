/**
 * Graph Utilities
 *
 * Pure traversals over an adjacency map (node → direct successors).
 * They never mutate the map.
 */

export type Adjacency<T> = ReadonlyMap<T, ReadonlySet<T>>;

/**
 * Depth-first search from `start` with an explicit stack.
 * Returns true as soon as `target` is popped, so `start === target` is
 * always reachable.
 */
export function isDescendant<T>(adj: Adjacency<T>, start: T, target: T): boolean {
  const visited = new Set<T>();
  const stack: T[] = [start];

  let node = stack.pop();
  while (node !== undefined) {
    if (node === target) return true;
    if (!visited.has(node)) {
      visited.add(node);
      for (const next of adj.get(node) ?? []) stack.push(next);
    }
    node = stack.pop();
  }
  return false;
}

/** Every node reachable from any of `sources`, the sources included. */
export function reachableFrom<T>(adj: Adjacency<T>, sources: Iterable<T>): Set<T> {
  const visited = new Set<T>();
  const stack = [...sources];

  let node = stack.pop();
  while (node !== undefined) {
    if (!visited.has(node)) {
      visited.add(node);
      for (const next of adj.get(node) ?? []) stack.push(next);
    }
    node = stack.pop();
  }
  return visited;
}

export interface TreeLine<T> {
  id: T;
  depth: number;
}

/**
 * BFS from `start`, yielding each node once with its distance from
 * `start`. Nodes already in `visited` are skipped; pass the same set
 * across calls to list a node only the first time any traversal meets it.
 */
export function breadthFirst<T>(
  adj: Adjacency<T>,
  start: T,
  visited: Set<T> = new Set(),
): TreeLine<T>[] {
  const lines: TreeLine<T>[] = [];
  const queue: TreeLine<T>[] = [{ id: start, depth: 0 }];

  for (let head = 0; head < queue.length; head++) {
    const cur = queue[head];
    if (!cur || visited.has(cur.id)) continue;
    visited.add(cur.id);
    lines.push(cur);
    for (const next of adj.get(cur.id) ?? []) {
      queue.push({ id: next, depth: cur.depth + 1 });
    }
  }
  return lines;
}
