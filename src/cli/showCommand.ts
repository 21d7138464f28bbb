import type { AppConfig } from "../lib/config.js";
import type { ChangeGraph } from "../lib/jjTypes.js";
import { buildChangeGraph, createJjFunctions } from "../lib/jjUtils.js";
import { topologicalSort } from "../lib/stackUtils.js";

export function formatChangeGraph(changeGraph: ChangeGraph): string {
  const lines: string[] = [];
  const names = (changeId: string) =>
    changeGraph.segments.get(changeId)?.bookmarkNames.join(", ") ?? changeId;

  lines.push(`Total bookmarks: ${changeGraph.bookmarks.size}`);
  lines.push(`Total stacks: ${changeGraph.stacks.length}`);

  changeGraph.stacks.forEach((stack, i) => {
    const totalChanges = stack.segments.reduce(
      (sum, segment) => sum + segment.changes.length,
      0,
    );
    lines.push("");
    lines.push(`Stack ${i + 1} (${totalChanges} changes):`);
    lines.push(
      `  trunk() <- ${stack.segments.map((s) => s.bookmarkNames.join(", ")).join(" <- ")}`,
    );
  });

  const order = topologicalSort(changeGraph);
  if (order.length > 0) {
    lines.push("");
    lines.push("Bookmarks, leaves first:");
    for (const changeId of order) {
      const parent = changeGraph.adjacencyList.get(changeId);
      lines.push(
        `  ${names(changeId)} -> ${parent ? names(parent) : "trunk()"}`,
      );
    }
  }

  if (changeGraph.excludedBookmarks.size > 0) {
    lines.push("");
    lines.push(
      `Excluded (merge commit in history): ${[...changeGraph.excludedBookmarks].join(", ")}`,
    );
  }
  if (changeGraph.unresolvedBookmarks.size > 0) {
    lines.push("");
    lines.push(
      `No changes above trunk(): ${[...changeGraph.unresolvedBookmarks].join(", ")}`,
    );
  }

  return lines.join("\n");
}

export async function showCommand(config: AppConfig): Promise<void> {
  console.log("Building change graph from user bookmarks...\n");
  const changeGraph = await buildChangeGraph(createJjFunctions(config.jj));
  console.log(formatChangeGraph(changeGraph));
}
