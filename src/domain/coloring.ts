import type { Coloring, ConflictGraph, Enrollments } from "./types";

/**
 * Welsh–Powell: largest degree first, ties kept in node insertion (catalog)
 * order, each node taking the lowest day not used by a coloured neighbour.
 * Gives a proper colouring, not necessarily a minimum one.
 */
export function greedyColoring(graph: ConflictGraph): Coloring {
  const order = graph
    .nodes()
    .map((node, index) => ({ node, index, degree: graph.degree(node) }))
    .sort((a, b) => b.degree - a.degree || a.index - b.index);

  const assigned = new Map<string, number>();

  for (const { node } of order) {
    const taken = new Set<number>();
    for (const neighbor of graph.neighbors(node)) {
      const day = assigned.get(neighbor);
      if (day !== undefined) taken.add(day);
    }

    let day = 0;
    while (taken.has(day)) day += 1;
    assigned.set(node, day);
  }

  const coloring: Coloring = {};
  for (const node of graph.nodes()) {
    coloring[node] = assigned.get(node) ?? 0;
  }
  return coloring;
}

export function dayCount(coloring: Coloring) {
  const days = Object.values(coloring);
  if (days.length === 0) return 0;
  return Math.max(...days) + 1;
}

export function largestEnrollment(enrollments: Enrollments) {
  let largest = 0;
  for (const courses of Object.values(enrollments)) {
    largest = Math.max(largest, new Set(courses).size);
  }
  return largest;
}

export function isProperColoring(graph: ConflictGraph, coloring: Coloring) {
  return graph.everyEdge((_edge, _attributes, source, target) => {
    return coloring[source] !== undefined && coloring[source] !== coloring[target];
  });
}
