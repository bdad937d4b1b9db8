type DependencyInfo = {
  id: string;
  dependencies: readonly string[];
};

/** First cycle found by depth-first search, as a closed path, or null. */
export function detectCycle(nodes: readonly DependencyInfo[]): string[] | null {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const visited = new Set<string>();
  const inStack = new Set<string>();
  const stack: string[] = [];

  const dfs = (nodeId: string): string[] | null => {
    visited.add(nodeId);
    inStack.add(nodeId);
    stack.push(nodeId);

    for (const dependencyId of byId.get(nodeId)?.dependencies ?? []) {
      if (!byId.has(dependencyId)) {
        continue;
      }
      if (!visited.has(dependencyId)) {
        const cycle = dfs(dependencyId);
        if (cycle) {
          return cycle;
        }
        continue;
      }
      if (inStack.has(dependencyId)) {
        return [...stack.slice(stack.indexOf(dependencyId)), dependencyId];
      }
    }

    stack.pop();
    inStack.delete(nodeId);
    return null;
  };

  for (const node of nodes) {
    if (!visited.has(node.id)) {
      const cycle = dfs(node.id);
      if (cycle) {
        return cycle;
      }
    }
  }
  return null;
}

export function findSelfDependency(nodes: readonly DependencyInfo[]): string[] | null {
  const node = nodes.find((candidate) => candidate.dependencies.includes(candidate.id));
  return node ? [node.id, node.id] : null;
}

/**
 * Kahn ordering that always releases the ready node proposed earliest, so an
 * already-ordered plan keeps its order. Returns null when the graph has a cycle.
 */
export function stableTopologicalOrder(nodes: readonly DependencyInfo[]): string[] | null {
  const position = new Map(nodes.map((node, index) => [node.id, index]));
  const dependents = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const node of nodes) {
    const known = node.dependencies.filter((dependencyId) => position.has(dependencyId));
    inDegree.set(node.id, known.length);
    for (const dependencyId of known) {
      const list = dependents.get(dependencyId) ?? [];
      list.push(node.id);
      dependents.set(dependencyId, list);
    }
  }

  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const ready = nodes.filter((node) => inDegree.get(node.id) === 0).map((node) => node.id);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(byPosition);
    const current = ready.shift();
    if (current === undefined) {
      break;
    }
    order.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
  }

  return order.length === nodes.length ? order : null;
}
