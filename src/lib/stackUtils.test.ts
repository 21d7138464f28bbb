import type { BookmarkSegment } from "./jjTypes.js";
import {
  groupSegmentsIntoStacks,
  pathToRoot,
  sortedLeaves,
  topologicalSort,
  type StackTopology,
} from "./stackUtils.js";
import { makeLogEntry } from "./testUtils.js";
import assert from "assert/strict";

function segment(name: string, minute: number): BookmarkSegment {
  return {
    bookmarkNames: [name],
    changeId: name,
    changes: [
      makeLogEntry(name, {
        authoredAt: new Date(Date.UTC(2024, 0, 1, 0, minute)),
      }),
    ],
  };
}

function topology(
  segments: BookmarkSegment[],
  edges: Array<[string, string]>,
): StackTopology {
  const adjacencyList = new Map(edges);
  const parents = new Set(adjacencyList.values());
  return {
    adjacencyList,
    segments: new Map(segments.map((s) => [s.changeId, s])),
    stackLeafs: new Set(
      segments.map((s) => s.changeId).filter((id) => !parents.has(id)),
    ),
  };
}

// R <- X <- Z
// R <- Y
const tree = () =>
  topology(
    [segment("R", 1), segment("X", 2), segment("Y", 3), segment("Z", 4)],
    [
      ["X", "R"],
      ["Y", "R"],
      ["Z", "X"],
    ],
  );

suite("stack grouping", () => {
  test("leaves are ordered by earliest commit", () => {
    assert.deepEqual(sortedLeaves(tree()), ["Y", "Z"]);
  });

  test("ties on time fall back to change id", () => {
    const t = topology([segment("b", 5), segment("a", 5), segment("c", 5)], []);
    assert.deepEqual(sortedLeaves(t), ["a", "b", "c"]);
  });

  test("topological sort emits children before parents", () => {
    assert.deepEqual(topologicalSort(tree()), ["Y", "Z", "X", "R"]);
  });

  test("one stack per leaf, root first", () => {
    const stacks = groupSegmentsIntoStacks(tree());

    assert.deepEqual(
      stacks.map((stack) => stack.segments.map((s) => s.changeId)),
      [
        ["R", "Y"],
        ["R", "X", "Z"],
      ],
    );
  });

  test("shared segments are copied into each stack", () => {
    const [first, second] = groupSegmentsIntoStacks(tree());

    assert.notEqual(first.segments[0], second.segments[0]);
    assert.deepEqual(first.segments[0], second.segments[0]);

    first.segments[0].bookmarkNames.push("renamed");
    assert.deepEqual(second.segments[0].bookmarkNames, ["R"]);
  });

  test("path to root is ordered from the root", () => {
    assert.deepEqual(pathToRoot(tree().adjacencyList, "Z"), ["R", "X", "Z"]);
    assert.deepEqual(pathToRoot(tree().adjacencyList, "R"), ["R"]);
  });

  test("cycles are reported instead of looping", () => {
    const adjacencyList = new Map([
      ["a", "b"],
      ["b", "a"],
    ]);
    assert.throws(() => pathToRoot(adjacencyList, "a"), {
      message: "Cycle detected in stack at change a",
    });
  });

  test("a dangling edge is reported", () => {
    const t = topology([segment("child", 1)], [["child", "missing"]]);
    assert.throws(() => groupSegmentsIntoStacks(t), {
      message: "Segment not found for change id missing",
    });
  });
});
