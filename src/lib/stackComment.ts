import * as v from "valibot";
import type { PullRequestComment } from "./forge.js";

export const STACK_COMMENT_VERSION = 1;

const StackCommentDataSchema = v.object({
  version: v.number(),
  stack: v.array(
    v.object({
      bookmarkName: v.string(),
      prUrl: v.pipe(v.string(), v.url()),
      prNumber: v.number(),
      merged: v.optional(v.boolean()),
    }),
  ),
});
export type StackCommentData = v.InferOutput<typeof StackCommentDataSchema>;
export type StackEntry = StackCommentData["stack"][number];

const commentDataPrefix = "<!--- STACKSMITH_STACK_INFO: ";
const commentDataPostfix = " --->";
const stackCommentFooter =
  "*Managed by stacksmith. Edits to this comment will be overwritten.*";
const stackCommentThisPRText = "← this PR";

/**
 * Render the stack comment for the PR at `currentIdx` in `data.stack`. The
 * listing starts at the base branch and ends with an HTML comment carrying
 * the encoded data, which GitHub does not render.
 */
export function formatStackComment(
  data: StackCommentData,
  currentIdx: number,
  baseBranch: string,
): string {
  const count = data.stack.length;
  let body = `This PR is part of a stack of ${count} bookmark${count === 1 ? "" : "s"}:\n\n`;
  body += `1. \`${baseBranch}\`\n`;

  data.stack.forEach((entry, i) => {
    if (i === currentIdx) {
      body += `1. **${entry.bookmarkName} ${stackCommentThisPRText}**\n`;
    } else if (entry.merged) {
      body += `1. ~~[${entry.bookmarkName}](${entry.prUrl})~~ (merged)\n`;
    } else {
      body += `1. [${entry.bookmarkName}](${entry.prUrl})\n`;
    }
  });

  const encoded = Buffer.from(JSON.stringify(data)).toString("base64");
  body += `\n---\n${stackCommentFooter}\n`;
  body += `${commentDataPrefix}${encoded}${commentDataPostfix}`;
  return body;
}

/**
 * Extract the embedded stack data from a comment body. Returns undefined for
 * comments that were not written by this tool.
 */
export function parseStackComment(body: string): StackCommentData | undefined {
  const start = body.indexOf(commentDataPrefix);
  if (start === -1) return undefined;

  const dataStart = start + commentDataPrefix.length;
  const end = body.indexOf(commentDataPostfix, dataStart);
  if (end === -1) return undefined;

  const decoded = Buffer.from(body.slice(dataStart, end), "base64").toString();
  let json: unknown;
  try {
    json = JSON.parse(decoded);
  } catch {
    return undefined;
  }

  const result = v.safeParse(StackCommentDataSchema, json);
  return result.success ? result.output : undefined;
}

/**
 * Find the comment managed by this tool among a PR's comments
 */
export function findStackComment(
  comments: PullRequestComment[],
): PullRequestComment | undefined {
  return comments.find(
    (comment) => parseStackComment(comment.body) !== undefined,
  );
}
