import type { AppConfig } from "../lib/config.js";
import { getGitHubAuth, describeAuthSource } from "../lib/auth.js";
import { GitHubForge } from "../lib/githubForge.js";
import {
  buildChangeGraph,
  createJjFunctions,
  resolveGitHubRepo,
} from "../lib/jjUtils.js";
import {
  analyzeSubmission,
  createSubmissionPlan,
  executeSubmissionPlan,
  formatSubmissionPlan,
  type ActionOutcome,
} from "../lib/submit.js";

export interface SubmitOptions {
  dryRun?: boolean;
  draft?: boolean;
  remote?: string;
}

const actionLabels: Record<ActionOutcome["action"], string> = {
  push: "Push",
  "base-update": "Update PR base",
  "create-pr": "Create PR",
  comment: "Stack comment",
};

export function formatOutcome(outcome: ActionOutcome): string {
  const pr = outcome.prNumber !== undefined ? ` (#${outcome.prNumber})` : "";
  const label = `${actionLabels[outcome.action]} ${outcome.target}${pr}`;

  switch (outcome.status) {
    case "success":
      return `✅ ${label}`;
    case "skipped":
      return `⏭️  ${label}: skipped (${outcome.reason ?? "not needed"})`;
    case "failure":
      return `❌ ${label}: ${outcome.error?.message ?? "failed"}`;
  }
}

/**
 * Submit a bookmark and everything below it as stacked PRs.
 * Resolves to false when any action failed.
 */
export async function submitCommand(
  bookmarkName: string,
  options: SubmitOptions,
  config: AppConfig,
): Promise<boolean> {
  const jj = createJjFunctions(config.jj);
  const remote = options.remote ?? config.remote;

  const authConfig = await getGitHubAuth();
  const repo = config.repoOverride ?? (await resolveGitHubRepo(jj, remote));
  const forge = GitHubForge.fromToken(authConfig.token, repo.owner, repo.repo);

  const username = await forge.getAuthenticatedUser();
  console.log(
    `🔑 Authenticated as ${username} via ${describeAuthSource(authConfig.source)}`,
  );
  console.log(`📍 Repository: ${repo.owner}/${repo.repo}`);

  await jj.gitFetch();
  const [changeGraph, defaultBranch] = await Promise.all([
    buildChangeGraph(jj),
    jj.getDefaultBranch(),
  ]);

  const analysis = analyzeSubmission(bookmarkName, changeGraph);
  const plan = await createSubmissionPlan(analysis, forge, {
    remote,
    draft: options.draft,
    defaultBranch,
  });

  console.log(`\n${formatSubmissionPlan(plan)}\n`);

  if (options.dryRun) {
    console.log("🧪 Dry run: no changes were made");
    return true;
  }

  const result = await executeSubmissionPlan(plan, jj, forge, {
    onOutcome: (outcome) => console.log(formatOutcome(outcome)),
  });

  if (result.stackEntries.length > 0) {
    console.log("\n📚 Stack:");
    for (const entry of result.stackEntries) {
      console.log(
        `  ${entry.bookmarkName}: ${entry.prUrl}${entry.merged ? " (merged)" : ""}`,
      );
    }
  }

  if (!result.success) {
    const failures = result.outcomes.filter(
      (o) => o.status === "failure",
    ).length;
    console.error(
      `\n${failures} action${failures === 1 ? "" : "s"} failed. Re-run the command to retry.`,
    );
  }
  return result.success;
}
