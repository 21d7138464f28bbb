import type { BookmarkSegment, BranchStack, ChangeGraph } from "./jjTypes.js";

export type StackTopology = Pick<
  ChangeGraph,
  "adjacencyList" | "segments" | "stackLeafs"
>;

function earliestTimestamp(segment: BookmarkSegment): number {
  return Math.min(...segment.changes.map((c) => c.authoredAt.getTime()));
}

/**
 * Order segments by their earliest commit, falling back to change id so the
 * order never depends on map iteration.
 */
function compareSegments(
  a: BookmarkSegment | undefined,
  b: BookmarkSegment | undefined,
  aId: string,
  bId: string,
): number {
  const aTime = a ? earliestTimestamp(a) : Infinity;
  const bTime = b ? earliestTimestamp(b) : Infinity;
  if (aTime !== bTime) {
    return aTime < bTime ? -1 : 1;
  }
  return aId < bId ? -1 : aId > bId ? 1 : 0;
}

/**
 * Leaf change ids in deterministic order
 */
export function sortedLeaves(topology: StackTopology): string[] {
  return [...topology.stackLeafs].sort((a, b) =>
    compareSegments(
      topology.segments.get(a),
      topology.segments.get(b),
      a,
      b,
    ),
  );
}

/**
 * Topological sort using Kahn's algorithm over child -> parent edges.
 *
 * Returns change ids leaves-first, roots-last. A parent whose last child has
 * been emitted goes to the front of the queue so each chain stays contiguous.
 */
export function topologicalSort(topology: StackTopology): string[] {
  const inDegrees = new Map<string, number>();
  for (const parentId of topology.adjacencyList.values()) {
    inDegrees.set(parentId, (inDegrees.get(parentId) ?? 0) + 1);
  }

  const queue = sortedLeaves(topology);
  const result: string[] = [];

  for (
    let changeId = queue.shift();
    changeId !== undefined;
    changeId = queue.shift()
  ) {
    result.push(changeId);

    const parentId = topology.adjacencyList.get(changeId);
    if (parentId === undefined) continue;

    const degree = (inDegrees.get(parentId) ?? 1) - 1;
    inDegrees.set(parentId, degree);
    if (degree === 0) {
      queue.unshift(parentId);
    }
  }

  return result;
}

function copySegment(segment: BookmarkSegment): BookmarkSegment {
  return {
    bookmarkNames: [...segment.bookmarkNames],
    changeId: segment.changeId,
    changes: [...segment.changes],
  };
}

/**
 * Walk from a change to its root, returning the path ordered root first
 */
export function pathToRoot(
  adjacencyList: Map<string, string>,
  changeId: string,
): string[] {
  const path: string[] = [changeId];
  const visited = new Set(path);

  for (
    let parent = adjacencyList.get(changeId);
    parent !== undefined;
    parent = adjacencyList.get(parent)
  ) {
    if (visited.has(parent)) {
      throw new Error(`Cycle detected in stack at change ${parent}`);
    }
    visited.add(parent);
    path.push(parent);
  }

  return path.reverse();
}

/**
 * Group segments into stacks based on their relationships
 * Creates one stack per leaf bookmark, with each stack representing the full
 * path from trunk to that leaf.
 * Segments shared between stacks are copied into each of them.
 */
export function groupSegmentsIntoStacks(
  topology: StackTopology,
): BranchStack[] {
  return sortedLeaves(topology).map((leafChangeId) => ({
    segments: pathToRoot(topology.adjacencyList, leafChangeId).map(
      (changeId) => {
        const segment = topology.segments.get(changeId);
        if (!segment) {
          throw new Error(`Segment not found for change id ${changeId}`);
        }
        return copySegment(segment);
      },
    ),
  }));
}
