// AIDEV-NOTE: Everything the submission pipeline needs from a code host goes
// through this interface. No GitHub (or other host) types cross it.

export type PullRequestState = "open" | "closed" | "merged";

export interface PullRequest {
  number: number;
  url: string;
  title: string;
  headRef: string;
  baseRef: string;
  state: PullRequestState;
}

export interface PullRequestComment {
  id: number;
  body: string;
}

export interface CreatePullRequestParams {
  head: string;
  base: string;
  title: string;
  body?: string;
  draft: boolean;
}

export interface Forge {
  /** Login of the user the forge client is authenticated as. */
  getAuthenticatedUser(): Promise<string>;

  /**
   * Find the PR whose head is `head`, preferring an open one. Returns null
   * when the branch has never had a PR.
   */
  findPrByHead(head: string): Promise<PullRequest | null>;

  createPr(params: CreatePullRequestParams): Promise<PullRequest>;

  updatePrBase(prNumber: number, base: string): Promise<void>;

  listComments(prNumber: number): Promise<PullRequestComment[]>;

  createComment(prNumber: number, body: string): Promise<PullRequestComment>;

  updateComment(commentId: number, body: string): Promise<void>;

  getDefaultBranch(): Promise<string>;
}
