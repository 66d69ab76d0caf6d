import type { DependencyGraph, DependencyNode } from "@depintel/core";

export type GraphIndex = {
  nodeById: ReadonlyMap<string, DependencyNode>;
  adjacencyById: ReadonlyMap<string, readonly string[]>;
};

export const edgeKey = (from: string, to: string): string => `${from}\u0000${to}`;

export const createGraphIndex = (graph: DependencyGraph): GraphIndex => {
  const nodeById = new Map(graph.nodes.map((node) => [node.id, node]));
  const adjacency = new Map<string, string[]>();
  adjacency.set(graph.rootId, []);
  for (const node of graph.nodes) {
    adjacency.set(node.id, []);
  }

  for (const edge of graph.edges) {
    adjacency.get(edge.from)?.push(edge.to);
  }

  const adjacencyById = new Map<string, readonly string[]>();
  for (const [nodeId, targets] of adjacency.entries()) {
    adjacencyById.set(
      nodeId,
      [...targets].sort((a, b) => a.localeCompare(b)),
    );
  }

  return { nodeById, adjacencyById };
};

export const getDirectNodes = (graph: DependencyGraph): readonly DependencyNode[] =>
  graph.nodes.filter((node) => node.direct);

/**
 * Every node reachable from `rootId`, excluding the root itself, sorted by id.
 */
export const collectTransitiveDependencies = (
  rootId: string,
  index: GraphIndex,
): readonly string[] => {
  const seen = new Set<string>();
  const stack = [...(index.adjacencyById.get(rootId) ?? [])];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current) || current === rootId) {
      continue;
    }

    seen.add(current);
    for (const next of index.adjacencyById.get(current) ?? []) {
      if (!seen.has(next)) {
        stack.push(next);
      }
    }
  }

  return [...seen].sort((a, b) => a.localeCompare(b));
};

/**
 * Shortest chain of node ids from `fromId` to `toId`, both included. Neighbours are
 * visited in id order, so among equally short chains the lexicographically first wins.
 */
export const findShortestPath = (
  fromId: string,
  toId: string,
  index: GraphIndex,
): readonly string[] | null => {
  if (fromId === toId) {
    return [fromId];
  }

  const previous = new Map<string, string>();
  const visited = new Set<string>([fromId]);
  const queue: string[] = [fromId];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }

    for (const next of index.adjacencyById.get(current) ?? []) {
      if (visited.has(next)) {
        continue;
      }

      visited.add(next);
      previous.set(next, current);
      if (next === toId) {
        const path = [toId];
        let cursor = previous.get(toId);
        while (cursor !== undefined) {
          path.unshift(cursor);
          cursor = previous.get(cursor);
        }
        return path;
      }

      queue.push(next);
    }
  }

  return null;
};
