import { Octokit, RequestError } from "octokit";
import { ForgeError } from "./errors.js";
import type {
  CreatePullRequestParams,
  Forge,
  PullRequest,
  PullRequestComment,
  PullRequestState,
} from "./forge.js";
import { logger } from "./logger.js";

type PullRequestListItem = Awaited<
  ReturnType<Octokit["rest"]["pulls"]["list"]>
>["data"][0];
type PullRequestItem = Awaited<
  ReturnType<Octokit["rest"]["pulls"]["create"]>
>["data"];

export interface GitHubConfig {
  owner: string;
  repo: string;
  octokit: Octokit;
}

function toPullRequest(pr: PullRequestListItem | PullRequestItem): PullRequest {
  let state: PullRequestState = "open";
  if (pr.merged_at) {
    state = "merged";
  } else if (pr.state === "closed") {
    state = "closed";
  }

  return {
    number: pr.number,
    url: pr.html_url,
    title: pr.title,
    headRef: pr.head.ref,
    baseRef: pr.base.ref,
    state,
  };
}

/**
 * Translate an Octokit failure into a ForgeError
 */
export function toForgeError(error: unknown, context: string): ForgeError {
  if (error instanceof RequestError) {
    const message = `${context}: ${error.message}`;
    const options = { status: error.status, cause: error };
    const rateLimitRemaining =
      error.response?.headers["x-ratelimit-remaining"];

    if (
      error.status === 429 ||
      (error.status === 403 && rateLimitRemaining === "0")
    ) {
      return new ForgeError("rate-limited", message, options);
    }
    if (error.status === 401 || error.status === 403) {
      return new ForgeError("auth", message, options);
    }
    if (error.status === 404) {
      return new ForgeError("not-found", message, options);
    }
    if (error.status === 409 || error.status === 422) {
      return new ForgeError("conflict", message, options);
    }
    return new ForgeError("api", message, options);
  }

  return new ForgeError(
    "api",
    `${context}: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error },
  );
}

export class GitHubForge implements Forge {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;

  constructor(config: GitHubConfig) {
    this.octokit = config.octokit;
    this.owner = config.owner;
    this.repo = config.repo;
  }

  static fromToken(token: string, owner: string, repo: string): GitHubForge {
    return new GitHubForge({
      owner,
      repo,
      octokit: new Octokit({ auth: token }),
    });
  }

  private async call<T>(
    context: string,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw toForgeError(error, context);
    }
  }

  async getAuthenticatedUser(): Promise<string> {
    const user = await this.call("getting authenticated user", () =>
      this.octokit.rest.users.getAuthenticated(),
    );
    return user.data.login;
  }

  async findPrByHead(head: string): Promise<PullRequest | null> {
    const result = await this.call(`finding PR for ${head}`, () =>
      this.octokit.rest.pulls.list({
        owner: this.owner,
        repo: this.repo,
        head: `${this.owner}:${head}`,
        state: "all",
      }),
    );

    const pulls = result.data.map(toPullRequest);
    logger.debug(`Found ${pulls.length} PRs with head ${head}`);
    return pulls.find((pr) => pr.state === "open") ?? pulls[0] ?? null;
  }

  async createPr(params: CreatePullRequestParams): Promise<PullRequest> {
    const result = await this.call(`creating PR for ${params.head}`, () =>
      this.octokit.rest.pulls.create({
        owner: this.owner,
        repo: this.repo,
        title: params.title,
        head: params.head,
        base: params.base,
        body: params.body,
        draft: params.draft,
      }),
    );
    return toPullRequest(result.data);
  }

  async updatePrBase(prNumber: number, base: string): Promise<void> {
    await this.call(`updating base of PR #${prNumber}`, () =>
      this.octokit.rest.pulls.update({
        owner: this.owner,
        repo: this.repo,
        pull_number: prNumber,
        base,
      }),
    );
  }

  async listComments(prNumber: number): Promise<PullRequestComment[]> {
    const comments = await this.call(
      `listing comments on PR #${prNumber}`,
      () =>
        this.octokit.paginate(this.octokit.rest.issues.listComments, {
          owner: this.owner,
          repo: this.repo,
          issue_number: prNumber,
          per_page: 100,
        }),
    );
    return comments.map((comment) => ({
      id: comment.id,
      body: comment.body ?? "",
    }));
  }

  async createComment(
    prNumber: number,
    body: string,
  ): Promise<PullRequestComment> {
    const result = await this.call(`creating comment on PR #${prNumber}`, () =>
      this.octokit.rest.issues.createComment({
        owner: this.owner,
        repo: this.repo,
        issue_number: prNumber,
        body,
      }),
    );
    return { id: result.data.id, body: result.data.body ?? "" };
  }

  async updateComment(commentId: number, body: string): Promise<void> {
    await this.call(`updating comment ${commentId}`, () =>
      this.octokit.rest.issues.updateComment({
        owner: this.owner,
        repo: this.repo,
        comment_id: commentId,
        body,
      }),
    );
  }

  async getDefaultBranch(): Promise<string> {
    const result = await this.call("getting repository", () =>
      this.octokit.rest.repos.get({ owner: this.owner, repo: this.repo }),
    );
    return result.data.default_branch;
  }
}
