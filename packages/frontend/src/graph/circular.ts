/**
 * Circular dependency detection
 */

/**
 * Find a path `from -> ... -> to` along recorded edges (depth-first,
 * edges in recorded order). Returns the nodes on it, both ends included.
 */
export const findPath = (
  edges: ReadonlyMap<string, readonly string[]>,
  from: string,
  to: string
): readonly string[] | undefined => {
  const visited = new Set<string>();

  const visit = (node: string, trail: readonly string[]): readonly string[] | undefined => {
    if (node === to) {
      return [...trail, node];
    }
    if (visited.has(node)) {
      return undefined;
    }
    visited.add(node);

    for (const next of edges.get(node) ?? []) {
      const found = visit(next, [...trail, node]);
      if (found) {
        return found;
      }
    }
    return undefined;
  };

  return visit(from, []);
};

/**
 * The cycle closed by a new edge `current -> target`, if there is one.
 * Reported as `[target, ..., current, target]`.
 */
export const detectCycle = (
  edges: ReadonlyMap<string, readonly string[]>,
  current: string,
  target: string
): readonly string[] | undefined => {
  const back = findPath(edges, target, current);
  return back ? [...back, target] : undefined;
};
