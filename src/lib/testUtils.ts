// Fakes shared by the test suites: a scripted jj and an in-memory forge.

import type { Bookmark, LogEntry } from "./jjTypes.js";
import type { GraphJjFunctions } from "./jjUtils.js";
import { PAGE_SIZE } from "./jjUtils.js";
import type {
  CreatePullRequestParams,
  Forge,
  PullRequest,
  PullRequestComment,
  PullRequestState,
} from "./forge.js";

let clock = Date.UTC(2024, 0, 1);

export function makeLogEntry(
  id: string,
  options: {
    parents?: string[];
    bookmarks?: string[];
    description?: string;
    authoredAt?: Date;
  } = {},
): LogEntry {
  clock += 60_000;
  return {
    commitId: `commit_${id}`,
    changeId: `change_${id}`,
    authorName: "Test",
    authorEmail: "test@example.com",
    description: options.description ?? `Change ${id}`,
    parents: options.parents ?? [`commit_parent_of_${id}`],
    localBookmarks: options.bookmarks ?? [],
    authoredAt: options.authoredAt ?? new Date(clock),
  };
}

export function makeBookmark(name: string, entry: LogEntry): Bookmark {
  return {
    name,
    commitId: entry.commitId,
    changeId: entry.changeId,
  };
}

/**
 * A jj whose ancestry reads come from `chains`, keyed by the commit id a walk
 * starts at, each listed newest first down to (not including) trunk
 */
export function createMockJj(
  bookmarks: Bookmark[],
  chains: Record<string, LogEntry[]>,
): GraphJjFunctions & {
  pageRequests: Array<{ to: string; lastSeenCommit?: string }>;
} {
  const pageRequests: Array<{ to: string; lastSeenCommit?: string }> = [];
  return {
    pageRequests,
    getMyBookmarks: () => Promise.resolve(bookmarks),
    getBranchChangesPaginated: (_trunk, to, lastSeenCommit) => {
      pageRequests.push({ to, lastSeenCommit });
      const chain = chains[to] ?? [];
      const start = lastSeenCommit
        ? chain.findIndex((c) => c.commitId === lastSeenCommit) + 1
        : 0;
      return Promise.resolve(chain.slice(start, start + PAGE_SIZE));
    },
  };
}

type ForgeMethod = keyof Forge;

const mutatingMethods: ReadonlySet<ForgeMethod> = new Set<ForgeMethod>([
  "createPr",
  "updatePrBase",
  "createComment",
  "updateComment",
]);

/**
 * A Forge that keeps PRs and comments in memory and records every call.
 * `failOn` makes a method reject for a given argument (head, PR number or
 * comment id).
 */
export class InMemoryForge implements Forge {
  readonly pullRequests: PullRequest[] = [];
  readonly comments = new Map<number, PullRequestComment[]>();
  readonly calls: Array<{ method: ForgeMethod; arg?: string | number }> = [];
  readonly failOn = new Map<string, Error>();
  defaultBranch = "main";
  private nextPRNumber = 1;
  private nextCommentId = 1000;

  get mutationCount(): number {
    return this.calls.filter((call) => mutatingMethods.has(call.method)).length;
  }

  callsTo(method: ForgeMethod): Array<string | number | undefined> {
    return this.calls
      .filter((call) => call.method === method)
      .map((call) => call.arg);
  }

  private track(method: ForgeMethod, arg?: string | number): Promise<void> {
    this.calls.push({ method, arg });
    const failure = this.failOn.get(`${method}:${arg ?? ""}`);
    return failure ? Promise.reject(failure) : Promise.resolve();
  }

  addPR(
    head: string,
    base: string,
    state: PullRequestState = "open",
  ): PullRequest {
    const number = this.nextPRNumber++;
    const pr: PullRequest = {
      number,
      url: `https://github.com/test-owner/test-repo/pull/${number}`,
      title: `PR for ${head}`,
      headRef: head,
      baseRef: base,
      state,
    };
    this.pullRequests.push(pr);
    return pr;
  }

  addComment(prNumber: number, body: string): PullRequestComment {
    const comment = { id: this.nextCommentId++, body };
    this.comments.set(prNumber, [
      ...(this.comments.get(prNumber) ?? []),
      comment,
    ]);
    return comment;
  }

  async getAuthenticatedUser(): Promise<string> {
    await this.track("getAuthenticatedUser");
    return "test-user";
  }

  async findPrByHead(head: string): Promise<PullRequest | null> {
    await this.track("findPrByHead", head);
    const matching = this.pullRequests.filter((pr) => pr.headRef === head);
    const found =
      matching.find((pr) => pr.state === "open") ??
      matching[matching.length - 1];
    return found ? { ...found } : null;
  }

  async createPr(params: CreatePullRequestParams): Promise<PullRequest> {
    await this.track("createPr", params.head);
    const pr = this.addPR(params.head, params.base);
    pr.title = params.title;
    return { ...pr };
  }

  async updatePrBase(prNumber: number, base: string): Promise<void> {
    await this.track("updatePrBase", prNumber);
    const pr = this.pullRequests.find((p) => p.number === prNumber);
    if (!pr) throw new Error(`No PR #${prNumber}`);
    pr.baseRef = base;
  }

  async listComments(prNumber: number): Promise<PullRequestComment[]> {
    await this.track("listComments", prNumber);
    return (this.comments.get(prNumber) ?? []).map((c) => ({ ...c }));
  }

  async createComment(
    prNumber: number,
    body: string,
  ): Promise<PullRequestComment> {
    await this.track("createComment", prNumber);
    return this.addComment(prNumber, body);
  }

  async updateComment(commentId: number, body: string): Promise<void> {
    await this.track("updateComment", commentId);
    for (const comments of this.comments.values()) {
      const comment = comments.find((c) => c.id === commentId);
      if (comment) {
        comment.body = body;
        return;
      }
    }
    throw new Error(`No comment ${commentId}`);
  }

  async getDefaultBranch(): Promise<string> {
    await this.track("getDefaultBranch");
    return this.defaultBranch;
  }
}
