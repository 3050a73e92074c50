import { UndirectedGraph } from "graphology";
import { InputError } from "./errors";
import type { ConflictGraph, Course, Enrollments } from "./types";

export function assertEnrollments(catalog: readonly Course[], enrollments: Enrollments) {
  const known = new Set(catalog);

  for (const [student, courses] of Object.entries(enrollments)) {
    if (courses.length === 0) {
      throw new InputError(`${student} has no courses selected.`, student);
    }
    for (const course of courses) {
      if (!known.has(course)) {
        throw new InputError(`${student} is enrolled in "${course}", which is not in the catalog.`, student, course);
      }
    }
  }
}

/**
 * Every catalog course becomes a node. Each student's courses are linked
 * pairwise (a full clique), so two courses conflict whenever any student
 * takes both, whatever order they were selected in.
 */
export function buildConflictGraph(catalog: readonly Course[], enrollments: Enrollments): ConflictGraph {
  assertEnrollments(catalog, enrollments);

  const graph = new UndirectedGraph();
  for (const course of catalog) {
    if (!graph.hasNode(course)) graph.addNode(course);
  }

  for (const courses of Object.values(enrollments)) {
    const distinct = Array.from(new Set(courses));
    for (let i = 0; i < distinct.length; i += 1) {
      for (let j = i + 1; j < distinct.length; j += 1) {
        graph.mergeEdge(distinct[i], distinct[j]);
      }
    }
  }

  return graph;
}

export function conflictEdges(graph: ConflictGraph): Array<[Course, Course]> {
  const position = new Map(graph.nodes().map((node, index) => [node, index]));
  const rank = (node: Course) => position.get(node) ?? Number.MAX_SAFE_INTEGER;

  const edges: Array<[Course, Course]> = [];
  graph.forEachEdge((_edge, _attributes, source, target) => {
    edges.push(rank(source) <= rank(target) ? [source, target] : [target, source]);
  });

  return edges.sort((a, b) => rank(a[0]) - rank(b[0]) || rank(a[1]) - rank(b[1]));
}
