export interface LogEntry {
  commitId: string;
  changeId: string;
  authorName: string;
  authorEmail: string;
  description: string; // Full description, first line is the summary
  parents: string[];
  localBookmarks: string[];
  authoredAt: Date;
}

export interface Bookmark {
  name: string;
  commitId: string;
  changeId: string;
}

export interface GitRemote {
  name: string;
  url: string;
}

export interface BookmarkSegment {
  bookmarkNames: string[]; // Owned bookmarks pointing at changeId, never empty
  changeId: string;
  changes: LogEntry[]; // Newest first; changes[0] is the bookmarked change
}

export interface BranchStack {
  segments: BookmarkSegment[]; // Ordered from base to top (trunk → intermediate → top)
}

export interface ChangeGraph {
  bookmarks: Map<string, Bookmark>;
  bookmarkToChangeId: Map<string, string>;
  adjacencyList: Map<string, string>; // child changeId -> parent changeId
  segments: Map<string, BookmarkSegment>;
  stackLeafs: Set<string>;
  stackRoots: Set<string>;
  taintedChangeIds: Set<string>;
  excludedBookmarks: Set<string>; // Bookmarks dropped because of a merge in their history
  unresolvedBookmarks: Set<string>; // Owned bookmarks whose walk found no changes
  stacks: BranchStack[];
}

export interface JjConfig {
  binaryPath: string;
}
