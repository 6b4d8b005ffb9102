/**
 * Dependency graph utilities for resource ordering.
 *
 * Builds the graph from declared `dependsOn` edges, detects cycles and
 * produces a deterministic execution order.
 */
import { ConfigurationError } from "./errors";

export interface GraphNode {
  id: string;
  dependsOn: string[];
}

export interface DependencyGraph<T extends GraphNode = GraphNode> {
  /** Map of resource id -> ids it depends on */
  edges: Map<string, string[]>;
  /** Map of resource id -> ids that depend on it */
  dependents: Map<string, string[]>;
  /** Map of resource id -> node, in declaration order */
  nodes: Map<string, T>;
}

/**
 * Build a dependency graph from declared nodes.
 *
 * @throws ConfigurationError on duplicate ids or dependencies on undeclared ids
 */
export function buildDependencyGraph<T extends GraphNode>(nodes: T[]): DependencyGraph<T> {
  const byId = new Map<string, T>();
  const edges = new Map<string, string[]>();
  const dependents = new Map<string, string[]>();

  for (const node of nodes) {
    if (byId.has(node.id)) {
      throw new ConfigurationError(`Resource '${node.id}' is declared more than once`, node.id);
    }
    byId.set(node.id, node);
    dependents.set(node.id, []);
  }

  for (const node of nodes) {
    const deps = [...new Set(node.dependsOn)];
    for (const dep of deps) {
      if (!byId.has(dep)) {
        throw new ConfigurationError(`Resource '${node.id}' depends on undeclared resource '${dep}'`, node.id);
      }
      dependents.get(dep)?.push(node.id);
    }
    edges.set(node.id, deps);
  }

  return { edges, dependents, nodes: byId };
}

/**
 * Detect cycles in the dependency graph.
 *
 * @returns the cycle path (e.g. ['a', 'b', 'a']), or null if the graph is acyclic
 */
export function detectCycle(graph: DependencyGraph): string[] | null {
  const visiting = new Set<string>();
  const visited = new Set<string>();

  function dfs(node: string, path: string[]): string[] | null {
    if (visiting.has(node)) {
      const cycleStart = path.indexOf(node);
      return [...path.slice(cycleStart), node];
    }
    if (visited.has(node)) return null;

    visiting.add(node);
    path.push(node);

    for (const dep of graph.edges.get(node) ?? []) {
      const cycle = dfs(dep, path);
      if (cycle) return cycle;
    }

    visiting.delete(node);
    visited.add(node);
    path.pop();
    return null;
  }

  for (const node of graph.edges.keys()) {
    const cycle = dfs(node, []);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Topologically sort the graph (Kahn's algorithm).
 *
 * Among the nodes whose dependencies are all placed, the one declared first
 * goes next, so an already-valid declaration order is returned unchanged.
 *
 * @throws ConfigurationError when the graph contains a cycle
 */
export function topologicalSort<T extends GraphNode>(graph: DependencyGraph<T>): T[] {
  const cycle = detectCycle(graph);
  if (cycle) {
    throw new ConfigurationError(`Dependency cycle detected: ${cycle.join(" -> ")}`, cycle[0]);
  }

  const declared = [...graph.nodes.keys()];
  const position = new Map(declared.map((id, index) => [id, index]));
  const remaining = new Map<string, number>();
  for (const [id, deps] of graph.edges) {
    remaining.set(id, deps.length);
  }

  const ready = declared.filter((id) => remaining.get(id) === 0);
  const result: T[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const id = ready.shift();
    if (id === undefined) break;
    const node = graph.nodes.get(id);
    if (node) result.push(node);

    for (const dependent of graph.dependents.get(id) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) ready.push(dependent);
    }
  }

  return result;
}

/**
 * Validate and order a resource set in one step.
 */
export function executionOrder<T extends GraphNode>(nodes: T[]): T[] {
  return topologicalSort(buildDependencyGraph(nodes));
}

/**
 * Human-readable representation of the graph, in declaration order.
 */
export function formatDependencyGraph(graph: DependencyGraph): string {
  const lines: string[] = ["Dependency Graph:"];

  for (const [name, deps] of graph.edges.entries()) {
    if (deps.length > 0) {
      lines.push(`  ${name} -> ${deps.join(", ")}`);
    } else {
      lines.push(`  ${name} (no dependencies)`);
    }
  }

  return lines.join("\n");
}
