import { execFile } from "child_process";
import type {
  LogEntry,
  Bookmark,
  ChangeGraph,
  BookmarkSegment,
  GitRemote,
  JjConfig,
} from "./jjTypes.js";
import * as v from "valibot";
import { JjError } from "./errors.js";
import { logger } from "./logger.js";
import { groupSegmentsIntoStacks } from "./stackUtils.js";

// Types for dependency injection
export type JjFunctions = {
  gitFetch: () => Promise<void>;
  getMyBookmarks: () => Promise<Bookmark[]>;
  getBranchChangesPaginated: (
    from: string,
    to: string,
    lastSeenCommit?: string,
  ) => Promise<LogEntry[]>;
  getGitRemoteList: () => Promise<GitRemote[]>;
  getDefaultBranch: () => Promise<string>;
  pushBookmark: (bookmarkName: string, remote: string) => Promise<void>;
};

// The subset of jj reads the graph builder needs
export type GraphJjFunctions = Pick<
  JjFunctions,
  "getMyBookmarks" | "getBranchChangesPaginated"
>;

export const PAGE_SIZE = 100;

export interface GitHubRepo {
  owner: string;
  repo: string;
}

/**
 * Parse a GitHub owner/repo from a remote URL.
 *
 * Supports both HTTPS and SSH formats, with or without the `.git` suffix:
 * - HTTPS: https://github.com/owner/repo.git
 * - SSH: git@github.com:owner/repo.git
 *
 * Returns null for other hosts and for paths that are not exactly owner/repo.
 */
export function parseGitHubUrl(remoteUrl: string): GitHubRepo | null {
  const match = /^(?:git@github\.com:|https?:\/\/github\.com\/)(.+)$/.exec(
    remoteUrl.trim(),
  );
  if (!match) {
    return null;
  }

  let path = match[1];
  if (path.endsWith("/")) path = path.slice(0, -1);
  if (path.endsWith(".git")) path = path.slice(0, -4);

  const parts = path.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }

  return { owner: parts[0], repo: parts[1] };
}

/**
 * Find the named remote and parse its GitHub owner/repo
 */
export async function resolveGitHubRepo(
  jj: Pick<JjFunctions, "getGitRemoteList">,
  remoteName: string,
): Promise<GitHubRepo> {
  const remotes = await jj.getGitRemoteList();
  const remote = remotes.find((r) => r.name === remoteName);
  if (!remote) {
    throw new Error(
      `No '${remoteName}' remote found (available: ${remotes.map((r) => r.name).join(", ") || "none"})`,
    );
  }

  const repo = parseGitHubUrl(remote.url);
  if (!repo) {
    throw new Error(
      `Could not parse GitHub repository from remote URL: ${remote.url}`,
    );
  }
  return repo;
}

/**
 * Create configured JjFunctions from a config object
 */
export function createJjFunctions(config: JjConfig): JjFunctions {
  return {
    gitFetch: () => gitFetch(config),
    getMyBookmarks: () => getMyBookmarks(config),
    getBranchChangesPaginated: (from, to, lastSeenCommit) =>
      getBranchChangesPaginated(config, from, to, lastSeenCommit),
    getGitRemoteList: () => getGitRemoteList(config),
    getDefaultBranch: () => getDefaultBranch(config),
    pushBookmark: (bookmarkName, remote) =>
      pushBookmark(config, bookmarkName, remote),
  };
}

/**
 * Run jj with the given arguments and resolve with its stdout
 */
function runJj(config: JjConfig, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      config.binaryPath,
      args,
      { maxBuffer: 64 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          logger.error(`jj ${args[0]} failed: ${error.message}`);
          return reject(
            new JjError(error.message, args, { stderr, cause: error }),
          );
        }
        if (stderr) {
          logger.debug(`jj ${args[0]} stderr: ${stderr}`);
        }
        resolve(stdout);
      },
    );
  });
}

/**
 * Parse newline-delimited JSON output from a jj template
 */
function parseJsonLines<TSchema extends v.GenericSchema>(
  schema: TSchema,
  stdout: string,
  args: string[],
): v.InferOutput<TSchema>[] {
  const results: v.InferOutput<TSchema>[] = [];

  for (const line of stdout.trim().split("\n")) {
    if (line.trim() === "") continue;
    try {
      results.push(v.parse(schema, JSON.parse(line)));
    } catch (parseError) {
      logger.error(`Failed to parse line: ${line}`, parseError);
      throw new JjError(
        `Failed to parse jj output: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
        args,
        { cause: parseError },
      );
    }
  }

  return results;
}

/**
 * Fetch latest changes from all git remotes
 */
async function gitFetch(config: JjConfig): Promise<void> {
  await runJj(config, ["git", "fetch", "--all-remotes"]);
  logger.debug("Successfully fetched from all remotes");
}

const BookmarkOutputSchema = v.object({
  name: v.string(),
  commitId: v.string(),
  changeId: v.string(),
  localBookmarks: v.array(v.string()),
});
type BookmarkOutput = v.InferOutput<typeof BookmarkOutputSchema>;

/**
 * One bookmark per name. `jj bookmark list` also prints a line for each
 * remote target that differs from the local one; the line whose commit
 * carries the local bookmark wins.
 */
export function collectBookmarks(rows: BookmarkOutput[]): Bookmark[] {
  const bookmarks = new Map<string, Bookmark>();
  for (const row of rows) {
    if (!bookmarks.has(row.name) || row.localBookmarks.includes(row.name)) {
      bookmarks.set(row.name, {
        name: row.name,
        commitId: row.commitId,
        changeId: row.changeId,
      });
    }
  }
  return Array.from(bookmarks.values());
}

/**
 * Get all bookmarks created by the current user, excluding those on trunk
 */
async function getMyBookmarks(config: JjConfig): Promise<Bookmark[]> {
  const bookmarkTemplate = `'{ "name":' ++ name.escape_json() ++ ', ' ++
    '"commitId":' ++ normal_target.commit_id().short().escape_json() ++ ', ' ++
    '"changeId":' ++ normal_target.change_id().short().escape_json() ++ ', ' ++
    '"localBookmarks": [' ++ normal_target.local_bookmarks().map(|b| b.name().escape_json()).join(",") ++ '] }\n'`;

  const args = [
    "bookmark",
    "list",
    "--revisions",
    "mine() ~ ::trunk()",
    "--template",
    bookmarkTemplate,
  ];
  const stdout = await runJj(config, args);

  return collectBookmarks(parseJsonLines(BookmarkOutputSchema, stdout, args));
}

const LogEntrySchema = v.object({
  commitId: v.string(),
  changeId: v.string(),
  authorName: v.string(),
  authorEmail: v.string(),
  description: v.string(),
  parents: v.array(v.string()),
  localBookmarks: v.array(v.string()),
  authoredAt: v.pipe(v.string(), v.isoTimestamp()),
});

/**
 * Get changes that are ancestors of `to` that are not ancestors of `trunk`.
 * The result will include `to` itself, but not `trunk`. Returns at most
 * PAGE_SIZE entries, newest first, starting below `lastSeenCommit` when given.
 */
async function getBranchChangesPaginated(
  config: JjConfig,
  trunk: string,
  to: string,
  lastSeenCommit?: string,
): Promise<LogEntry[]> {
  const jjTemplate = `'{ "commitId":' ++ commit_id.short().escape_json() ++ ', ' ++ '"changeId":'
++ change_id.short().escape_json() ++ ', ' ++ '"authorName":' ++ author.name().escape_json() ++
', ' ++ '"authorEmail":' ++ stringify(author.email().local() ++ '@' ++
author.email().domain()).escape_json() ++ ', ' ++ '"description":' ++
description.escape_json() ++ ', ' ++ '"parents": [' ++ parents.map(|p|
p.commit_id().short().escape_json()).join(",") ++ '], ' ++ '"localBookmarks": [' ++
local_bookmarks.map(|b| b.name().escape_json()).join(",") ++ '], ' ++
'"authoredAt":' ++ author.timestamp().format('%+').escape_json() ++ ' }\n'`;

  // Build revset: trunk..to but exclude already seen commits
  const revset = lastSeenCommit
    ? `(${trunk}..${to}) ~ ${lastSeenCommit}::`
    : `${trunk}..${to}`;

  const args = [
    "log",
    "--revisions",
    revset,
    "--no-graph",
    "--limit",
    String(PAGE_SIZE),
    "--template",
    jjTemplate,
  ];
  const stdout = await runJj(config, args);

  return parseJsonLines(LogEntrySchema, stdout, args).map((rawChange) => ({
    ...rawChange,
    authoredAt: new Date(rawChange.authoredAt),
  }));
}

interface TraversalResult {
  segments: BookmarkSegment[]; // Newest first (leaf toward trunk)
  alreadySeenChangeId?: string; // Set when the walk stopped at a known segment
  excluded: boolean; // Set when the walk met a merge commit or tainted change
}

/**
 * Traverse from a bookmark toward trunk, discovering segments and relationships
 * along the way
 */
async function traverseAndDiscoverSegments(
  bookmark: Bookmark,
  trunkRev: string,
  ownedBookmarkNames: Set<string>,
  knownSegments: Map<string, BookmarkSegment>,
  taintedChangeIds: Set<string>,
  jj: GraphJjFunctions,
): Promise<TraversalResult> {
  const segments: BookmarkSegment[] = [];
  let currentSegment: BookmarkSegment | undefined;
  let lastSeenCommit: string | undefined;
  let alreadySeenChangeId: string | undefined;
  const seenChangeIds: string[] = [];

  pageLoop: while (true) {
    const changes = await jj.getBranchChangesPaginated(
      trunkRev,
      bookmark.commitId,
      lastSeenCommit,
    );

    if (changes.length === 0) {
      break;
    }

    for (const change of changes) {
      if (knownSegments.has(change.changeId)) {
        logger.debug(`    Reached known segment at ${change.commitId}`);
        if (currentSegment) {
          segments.push(currentSegment);
          currentSegment = undefined;
        }
        alreadySeenChangeId = change.changeId;
        break pageLoop;
      }

      seenChangeIds.push(change.changeId);

      if (change.parents.length > 1 || taintedChangeIds.has(change.changeId)) {
        logger.debug(
          `Found ${change.parents.length > 1 ? "merge commit" : "tainted change"} ${change.commitId} in bookmark ${bookmark.name} - excluding bookmark and descendants`,
        );
        for (const seenChangeId of seenChangeIds) {
          taintedChangeIds.add(seenChangeId);
        }
        return { segments: [], excluded: true };
      }

      const ownedNames = change.localBookmarks.filter((name) =>
        ownedBookmarkNames.has(name),
      );
      if (ownedNames.length) {
        if (currentSegment) {
          segments.push(currentSegment);
        }
        currentSegment = {
          bookmarkNames: ownedNames,
          changeId: change.changeId,
          changes: [],
        };
        logger.debug(
          `    Starting new segment for bookmarks: ${ownedNames.join(", ")} at commit ${change.commitId}`,
        );
      }
      if (!currentSegment) {
        throw new Error(
          `Encountered change ${change.changeId} before any bookmark while traversing from '${bookmark.name}'`,
        );
      }
      currentSegment.changes.push(change);
    }

    if (changes.length < PAGE_SIZE) {
      break; // We got all remaining changes
    }

    // Use the oldest commit in this batch as the cursor for the next page
    lastSeenCommit = changes[changes.length - 1].commitId;
  }

  if (currentSegment) {
    segments.push(currentSegment);
  }

  return { segments, alreadySeenChangeId, excluded: false };
}

function describeSegment(segment: BookmarkSegment | undefined): string {
  return `[${segment?.bookmarkNames.join(", ") ?? "?"}]`;
}

/**
 * Build a complete change graph by discovering all bookmark segments and their
 * relationships
 */
export async function buildChangeGraph(
  jj: GraphJjFunctions,
): Promise<ChangeGraph> {
  logger.debug("Discovering user bookmarks...");
  const bookmarks = await jj.getMyBookmarks();

  logger.debug(
    `Found ${bookmarks.length} bookmarks: ${bookmarks.map((b) => b.name).join(", ")}`,
  );

  const bookmarksByName = new Map<string, Bookmark>(
    bookmarks.map((b) => [b.name, b]),
  );
  const ownedBookmarkNames = new Set(bookmarksByName.keys());

  const bookmarkToChangeId = new Map<string, string>();
  // child (changeId) -> parent (changeId)
  const adjacencyList = new Map<string, string>();
  const segments = new Map<string, BookmarkSegment>();
  const taintedChangeIds = new Set<string>();
  const excludedBookmarks = new Set<string>();
  const unresolvedBookmarks = new Set<string>();

  for (const bookmark of bookmarks) {
    if (bookmarkToChangeId.has(bookmark.name)) {
      logger.debug(`Skipping already processed bookmark: ${bookmark.name}`);
      continue;
    }

    logger.debug(`Processing bookmark: ${bookmark.name}`);

    let result: TraversalResult;
    try {
      result = await traverseAndDiscoverSegments(
        bookmark,
        "trunk()",
        ownedBookmarkNames,
        segments,
        taintedChangeIds,
        jj,
      );
    } catch (error) {
      logger.error(`Failed to process bookmark ${bookmark.name}:`, error);
      throw error;
    }

    if (result.excluded) {
      excludedBookmarks.add(bookmark.name);
      logger.debug(
        `  Excluded ${bookmark.name} due to merge commit in history`,
      );
      continue;
    }

    if (result.segments.length === 0 && !result.alreadySeenChangeId) {
      // Nothing between trunk and the bookmark, e.g. it sits on an ancestor
      // of trunk()
      unresolvedBookmarks.add(bookmark.name);
      logger.warn(`Bookmark ${bookmark.name} has no changes above trunk()`);
      continue;
    }

    for (const segment of result.segments) {
      segments.set(segment.changeId, segment);
      for (const name of segment.bookmarkNames) {
        bookmarkToChangeId.set(name, segment.changeId);
      }
      logger.debug(
        `    Found segment for ${describeSegment(segment)}: ${segment.changes.length} changes`,
      );
    }

    // Segments are returned from target back to base
    for (let i = 0; i < result.segments.length - 1; i++) {
      adjacencyList.set(
        result.segments[i].changeId,
        result.segments[i + 1].changeId,
      );
    }

    const rootSegment = result.segments[result.segments.length - 1];
    if (result.alreadySeenChangeId && rootSegment) {
      adjacencyList.set(rootSegment.changeId, result.alreadySeenChangeId);
    }

    logger.debug(
      `  Processed ${bookmark.name} - found ${result.segments.length} segments`,
    );
  }

  const changeIdsWithChildren = new Set(adjacencyList.values());
  const stackLeafs = new Set(
    [...segments.keys()].filter(
      (changeId) => !changeIdsWithChildren.has(changeId),
    ),
  );
  const stackRoots = new Set(
    [...segments.keys()].filter((changeId) => !adjacencyList.has(changeId)),
  );

  logger.debug("=== STACKING RELATIONSHIPS ===");
  for (const [child, parent] of adjacencyList) {
    logger.debug(
      `${describeSegment(segments.get(child))} -> ${describeSegment(segments.get(parent))}`,
    );
  }
  for (const changeId of stackRoots) {
    logger.debug(`${describeSegment(segments.get(changeId))} -> trunk()`);
  }

  const stacks = groupSegmentsIntoStacks({
    adjacencyList,
    segments,
    stackLeafs,
  });

  return {
    bookmarks: bookmarksByName,
    bookmarkToChangeId,
    adjacencyList,
    segments,
    stackLeafs,
    stackRoots,
    taintedChangeIds,
    excludedBookmarks,
    unresolvedBookmarks,
    stacks,
  };
}

/**
 * Get git remote list using JJ
 */
async function getGitRemoteList(config: JjConfig): Promise<GitRemote[]> {
  const stdout = await runJj(config, ["git", "remote", "list"]);

  const remotes: GitRemote[] = [];
  for (const line of stdout.trim().split("\n")) {
    // JJ git remote list format: "remote_name url"
    const parts = line.trim().split(/\s+/);
    if (parts.length >= 2) {
      remotes.push({ name: parts[0], url: parts[1] });
    }
  }

  return remotes;
}

const RemoteBookmarksSchema = v.array(v.string());

/**
 * Get the default branch name for the repository by finding what trunk()
 * resolves to
 */
async function getDefaultBranch(config: JjConfig): Promise<string> {
  const template = `'[ ' ++ remote_bookmarks.map(|b| b.name().escape_json()).join(",") ++ ']\n'`;
  const args = [
    "log",
    "--revisions",
    "trunk()",
    "--no-graph",
    "--limit",
    "1",
    "--template",
    template,
  ];
  const stdout = await runJj(config, args);

  let remoteBookmarks: string[];
  try {
    remoteBookmarks = v.parse(RemoteBookmarksSchema, JSON.parse(stdout.trim()));
  } catch (e) {
    throw new JjError(
      `Failed to parse remote bookmarks from jj log output: ${String(e)}`,
      args,
      { cause: e },
    );
  }

  const candidates = ["main", "master", "trunk"];
  for (const candidate of candidates) {
    if (remoteBookmarks.includes(candidate)) {
      return candidate;
    }
  }

  throw new JjError(
    `Could not find a remote bookmark for default branch (main, master, or trunk) in: ${JSON.stringify(remoteBookmarks)}`,
    args,
  );
}

/**
 * Push the bookmark to the remote using JJ
 */
async function pushBookmark(
  config: JjConfig,
  bookmarkName: string,
  remote: string,
): Promise<void> {
  await runJj(config, [
    "git",
    "push",
    "--remote",
    remote,
    "--bookmark",
    bookmarkName,
    "--allow-new",
  ]);
  logger.debug(`Successfully pushed bookmark ${bookmarkName} to ${remote}`);
}
