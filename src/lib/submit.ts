import type { BookmarkSegment, ChangeGraph } from "./jjTypes.js";
import type { JjFunctions } from "./jjUtils.js";
import type { Forge, PullRequest } from "./forge.js";
import { GraphError, toError } from "./errors.js";
import { logger } from "./logger.js";
import { pathToRoot } from "./stackUtils.js";
import {
  STACK_COMMENT_VERSION,
  findStackComment,
  formatStackComment,
  parseStackComment,
  type StackCommentData,
  type StackEntry,
} from "./stackComment.js";

// ---------------------------------------------------------------------------
// Phase 1: analysis
// ---------------------------------------------------------------------------

export interface SubmissionAnalysis {
  targetBookmark: string;
  // Trunk-nearest first, ending with the target
  relevantSegments: BookmarkSegment[];
}

/**
 * Find the segments between trunk and the target bookmark (inclusive).
 * Pure: the same graph and target always give the same path.
 */
export function analyzeSubmission(
  targetBookmark: string,
  changeGraph: ChangeGraph,
): SubmissionAnalysis {
  const changeId = changeGraph.bookmarkToChangeId.get(targetBookmark);
  if (changeId === undefined) {
    throw new GraphError(
      targetBookmark,
      changeGraph.excludedBookmarks.has(targetBookmark)
        ? "tainted"
        : "not-found",
    );
  }

  const relevantSegments = pathToRoot(changeGraph.adjacencyList, changeId).map(
    (id) => {
      const segment = changeGraph.segments.get(id);
      if (!segment) {
        throw new GraphError(targetBookmark, "not-found");
      }
      return segment;
    },
  );

  return { targetBookmark, relevantSegments };
}

// ---------------------------------------------------------------------------
// Phase 2: planning
// ---------------------------------------------------------------------------

export interface SegmentPlan {
  segment: BookmarkSegment;
  bookmarkName: string; // Name used as the PR head
  base: string; // Desired base branch
  existingPR: PullRequest | null;
  active: boolean; // False when the existing PR is closed or merged
}

export interface PlannedCreation {
  segment: BookmarkSegment;
  bookmarkName: string;
  base: string;
  prContent: { title: string; body: string };
}

export interface PlannedBaseUpdate {
  prNumber: number;
  bookmarkName: string;
  currentBase: string;
  newBase: string;
}

export interface SubmissionPlan {
  targetBookmark: string;
  remote: string;
  defaultBranch: string;
  draft: boolean;
  segments: SegmentPlan[];
  pushes: string[];
  creations: PlannedCreation[]; // Root to leaf
  baseUpdates: PlannedBaseUpdate[];
  inactive: Array<{ bookmarkName: string; pr: PullRequest }>;
}

export interface PlanOptions {
  remote: string;
  draft?: boolean;
  defaultBranch?: string; // Queried from the forge when omitted
}

/**
 * Generate PR title and body from a segment's commits
 */
export function generatePRContent(
  segment: BookmarkSegment,
  fallbackTitle: string,
): { title: string; body: string } {
  const lines = (segment.changes[0]?.description ?? "").trim().split("\n");
  const title = lines[0].trim() || fallbackTitle;

  if (segment.changes.length <= 1) {
    return { title, body: lines.slice(1).join("\n").trim() };
  }

  const body = [...segment.changes]
    .reverse()
    .map((change) => change.description.trim())
    .filter((description) => description !== "")
    .join("\n\n---\n\n");
  return { title, body };
}

/**
 * Look up the PR for a segment by each of its bookmark names. An open PR
 * wins, then any PR, then the segment's first name with no PR.
 */
async function findSegmentPR(
  segment: BookmarkSegment,
  forge: Forge,
): Promise<{ bookmarkName: string; pr: PullRequest | null }> {
  const found = await Promise.all(
    segment.bookmarkNames.map(async (bookmarkName) => ({
      bookmarkName,
      pr: await forge.findPrByHead(bookmarkName),
    })),
  );

  return (
    found.find(({ pr }) => pr?.state === "open") ??
    found.find(({ pr }) => pr !== null) ?? {
      bookmarkName: segment.bookmarkNames[0],
      pr: null,
    }
  );
}

/**
 * Query the forge for existing PRs and work out what must change. Performs
 * no mutation.
 */
export async function createSubmissionPlan(
  analysis: SubmissionAnalysis,
  forge: Forge,
  options: PlanOptions,
): Promise<SubmissionPlan> {
  const [defaultBranch, found] = await Promise.all([
    options.defaultBranch ?? forge.getDefaultBranch(),
    Promise.all(
      analysis.relevantSegments.map((segment) => findSegmentPR(segment, forge)),
    ),
  ]);

  const plan: SubmissionPlan = {
    targetBookmark: analysis.targetBookmark,
    remote: options.remote,
    defaultBranch,
    draft: options.draft ?? false,
    segments: [],
    pushes: [],
    creations: [],
    baseUpdates: [],
    inactive: [],
  };

  let previousActiveBookmark: string | undefined;
  analysis.relevantSegments.forEach((segment, i) => {
    const { bookmarkName, pr } = found[i];
    const base = previousActiveBookmark ?? defaultBranch;
    const active = pr === null || pr.state === "open";

    plan.segments.push({ segment, bookmarkName, base, existingPR: pr, active });

    if (!active && pr) {
      logger.debug(
        `PR #${pr.number} for ${bookmarkName} is ${pr.state}, skipping`,
      );
      plan.inactive.push({ bookmarkName, pr });
      return;
    }

    plan.pushes.push(bookmarkName);
    if (!pr) {
      plan.creations.push({
        segment,
        bookmarkName,
        base,
        prContent: generatePRContent(segment, bookmarkName),
      });
    } else if (pr.baseRef !== base) {
      plan.baseUpdates.push({
        prNumber: pr.number,
        bookmarkName,
        currentBase: pr.baseRef,
        newBase: base,
      });
    }
    previousActiveBookmark = bookmarkName;
  });

  return plan;
}

/**
 * Render a plan for --dry-run output
 */
export function formatSubmissionPlan(plan: SubmissionPlan): string {
  const count = plan.segments.length;
  const lines = [
    `Submission plan for ${plan.targetBookmark} (${count} bookmark${count === 1 ? "" : "s"}, remote: ${plan.remote}):`,
  ];

  for (const { bookmarkName, base, existingPR, active } of plan.segments) {
    if (!active && existingPR) {
      lines.push(
        `  ${bookmarkName}: PR #${existingPR.number} is ${existingPR.state}, skipping`,
      );
      continue;
    }

    lines.push(`  ${bookmarkName} (base: ${base})`);
    if (plan.pushes.includes(bookmarkName)) {
      lines.push(`    - push bookmark to ${plan.remote}`);
    }

    const creation = plan.creations.find(
      (c) => c.bookmarkName === bookmarkName,
    );
    const baseUpdate = plan.baseUpdates.find(
      (u) => u.bookmarkName === bookmarkName,
    );
    if (creation) {
      lines.push(
        `    - create ${plan.draft ? "draft " : ""}PR: "${creation.prContent.title}"`,
      );
    } else if (baseUpdate) {
      lines.push(
        `    - update PR #${baseUpdate.prNumber} base: ${baseUpdate.currentBase} -> ${baseUpdate.newBase}`,
      );
    } else if (existingPR) {
      lines.push(`    - PR #${existingPR.number} up to date`);
    }
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Phase 3: execution
// ---------------------------------------------------------------------------

export type ActionKind = "push" | "base-update" | "create-pr" | "comment";

export interface ActionOutcome {
  action: ActionKind;
  target: string; // Bookmark name
  status: "success" | "failure" | "skipped";
  prNumber?: number;
  error?: Error;
  reason?: string;
}

export interface SubmissionResult {
  success: boolean;
  outcomes: ActionOutcome[];
  stackEntries: StackEntry[];
}

export interface SubmissionCallbacks {
  onOutcome?: (outcome: ActionOutcome) => void;
}

function failed(
  action: ActionKind,
  target: string,
  error: unknown,
  prNumber?: number,
): ActionOutcome {
  const err = toError(error);
  logger.error(`${action} failed for ${target}: ${err.message}`);
  return { action, target, status: "failure", prNumber, error: err };
}

/**
 * Edit the managed comment on a PR, or create one when none exists
 */
async function createOrUpdateStackComment(
  forge: Forge,
  prNumber: number,
  body: string,
): Promise<"created" | "updated"> {
  const comments = await forge.listComments(prNumber);
  const existingComment = findStackComment(comments);

  if (existingComment) {
    await forge.updateComment(existingComment.id, body);
    return "updated";
  }
  await forge.createComment(prNumber, body);
  return "created";
}

/**
 * Entries below the root of the current stack that an earlier run listed
 * and that have since been merged
 */
async function findMergedAncestors(
  plan: SubmissionPlan,
  forge: Forge,
): Promise<StackEntry[]> {
  const rootPR = plan.segments[0]?.existingPR;
  if (!rootPR) {
    return [];
  }

  const rootComment = findStackComment(await forge.listComments(rootPR.number));
  const previousData = rootComment
    ? parseStackComment(rootComment.body)
    : undefined;
  if (!previousData) {
    return [];
  }

  const rootIdx = previousData.stack.findIndex(
    (entry) => entry.prNumber === rootPR.number,
  );
  if (rootIdx <= 0) {
    return [];
  }

  const submitted = new Set(plan.segments.map((s) => s.bookmarkName));
  const candidates = previousData.stack
    .slice(0, rootIdx)
    .filter((entry) => !submitted.has(entry.bookmarkName));

  const current = await Promise.all(
    candidates.map((entry) => forge.findPrByHead(entry.bookmarkName)),
  );
  return candidates
    .filter(
      (entry, i) =>
        current[i]?.number === entry.prNumber &&
        current[i]?.state === "merged",
    )
    .map((entry) => ({ ...entry, merged: true }));
}

/**
 * Execute the submission plan.
 *
 * Pushes and base updates run concurrently, PR creation runs root to leaf,
 * then every PR in the stack gets its comment created or refreshed. A failed
 * action is recorded in the result and never stops its siblings.
 */
export async function executeSubmissionPlan(
  plan: SubmissionPlan,
  jj: Pick<JjFunctions, "pushBookmark">,
  forge: Forge,
  callbacks?: SubmissionCallbacks,
): Promise<SubmissionResult> {
  const outcomes: ActionOutcome[] = [];
  const record = (outcome: ActionOutcome) => {
    outcomes.push(outcome);
    callbacks?.onOutcome?.(outcome);
  };

  // 1. Push all bookmarks
  const failedPushes = new Set<string>();
  const pushOutcomes = await Promise.all(
    plan.pushes.map(async (bookmarkName): Promise<ActionOutcome> => {
      try {
        await jj.pushBookmark(bookmarkName, plan.remote);
        return { action: "push", target: bookmarkName, status: "success" };
      } catch (error) {
        failedPushes.add(bookmarkName);
        return failed("push", bookmarkName, error);
      }
    }),
  );
  pushOutcomes.forEach(record);

  const skippedForPush = (
    action: ActionKind,
    bookmarkName: string,
    prNumber?: number,
  ): ActionOutcome => ({
    action,
    target: bookmarkName,
    status: "skipped",
    prNumber,
    reason: `push of ${bookmarkName} failed`,
  });

  // 2. Update PR bases
  const baseUpdateOutcomes = await Promise.all(
    plan.baseUpdates.map(async (update): Promise<ActionOutcome> => {
      if (failedPushes.has(update.bookmarkName)) {
        return skippedForPush(
          "base-update",
          update.bookmarkName,
          update.prNumber,
        );
      }
      try {
        await forge.updatePrBase(update.prNumber, update.newBase);
        return {
          action: "base-update",
          target: update.bookmarkName,
          status: "success",
          prNumber: update.prNumber,
        };
      } catch (error) {
        return failed(
          "base-update",
          update.bookmarkName,
          error,
          update.prNumber,
        );
      }
    }),
  );
  baseUpdateOutcomes.forEach(record);

  // 3. Create PRs, bottom to top, so every base branch exists first
  const bookmarkToPR = new Map<string, PullRequest>();
  for (const { bookmarkName, existingPR, active } of plan.segments) {
    if (active && existingPR) {
      bookmarkToPR.set(bookmarkName, existingPR);
    }
  }

  for (const { bookmarkName, base, prContent } of plan.creations) {
    if (failedPushes.has(bookmarkName)) {
      record(skippedForPush("create-pr", bookmarkName));
      continue;
    }
    try {
      const pr = await forge.createPr({
        head: bookmarkName,
        base,
        title: prContent.title,
        body: prContent.body || undefined,
        draft: plan.draft,
      });
      bookmarkToPR.set(bookmarkName, pr);
      record({
        action: "create-pr",
        target: bookmarkName,
        status: "success",
        prNumber: pr.number,
      });
    } catch (error) {
      record(failed("create-pr", bookmarkName, error));
    }
  }

  // 4. Create or update stack comments on every PR in the stack
  // The root's own comment action reports a failing comment read, so a
  // failed lookup here only loses the merged entries
  let mergedAncestors: StackEntry[] = [];
  try {
    mergedAncestors = await findMergedAncestors(plan, forge);
  } catch (error) {
    logger.warn(
      `Could not read merged PRs from the previous stack comment: ${toError(error).message}`,
    );
  }

  const stackEntries: StackEntry[] = [...mergedAncestors];
  for (const { bookmarkName, existingPR, active } of plan.segments) {
    const pr = active ? bookmarkToPR.get(bookmarkName) : existingPR;
    if (!pr || pr.state === "closed") continue;
    stackEntries.push({
      bookmarkName,
      prUrl: pr.url,
      prNumber: pr.number,
      ...(pr.state === "merged" ? { merged: true } : {}),
    });
  }
  const commentData: StackCommentData = {
    version: STACK_COMMENT_VERSION,
    stack: stackEntries,
  };

  const commentOutcomes = await Promise.all(
    plan.segments
      .filter(({ active }) => active)
      .map(async ({ bookmarkName }): Promise<ActionOutcome> => {
        const pr = bookmarkToPR.get(bookmarkName);
        if (!pr) {
          return {
            action: "comment",
            target: bookmarkName,
            status: "skipped",
            reason: "no pull request",
          };
        }
        const body = formatStackComment(
          commentData,
          stackEntries.findIndex((entry) => entry.prNumber === pr.number),
          plan.defaultBranch,
        );
        try {
          const how = await createOrUpdateStackComment(forge, pr.number, body);
          logger.debug(`Stack comment ${how} on PR #${pr.number}`);
          return {
            action: "comment",
            target: bookmarkName,
            status: "success",
            prNumber: pr.number,
          };
        } catch (error) {
          return failed("comment", bookmarkName, error, pr.number);
        }
      }),
  );
  commentOutcomes.forEach(record);

  return {
    success: outcomes.every((outcome) => outcome.status !== "failure"),
    outcomes,
    stackEntries,
  };
}
