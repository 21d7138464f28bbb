import {
  STACK_COMMENT_VERSION,
  findStackComment,
  formatStackComment,
  parseStackComment,
  type StackCommentData,
} from "./stackComment.js";
import assert from "assert/strict";

const prUrl = (n: number) =>
  `https://github.com/test-owner/test-repo/pull/${n}`;

const data: StackCommentData = {
  version: STACK_COMMENT_VERSION,
  stack: [
    { bookmarkName: "A", prUrl: prUrl(1), prNumber: 1 },
    { bookmarkName: "B", prUrl: prUrl(2), prNumber: 2 },
    { bookmarkName: "C", prUrl: prUrl(3), prNumber: 3 },
  ],
};

const encode = (value: unknown) =>
  `<!--- STACKSMITH_STACK_INFO: ${Buffer.from(JSON.stringify(value)).toString("base64")} --->`;

suite("stack comment", () => {
  test("lists the stack from the base branch up", () => {
    const lines = formatStackComment(data, 1, "main").split("\n");

    assert.deepEqual(lines.slice(0, -1), [
      "This PR is part of a stack of 3 bookmarks:",
      "",
      "1. `main`",
      `1. [A](${prUrl(1)})`,
      "1. **B ← this PR**",
      `1. [C](${prUrl(3)})`,
      "",
      "---",
      "*Managed by stacksmith. Edits to this comment will be overwritten.*",
    ]);
    assert.equal(lines[lines.length - 1], encode(data));
  });

  test("merged entries are struck through", () => {
    const withMerged: StackCommentData = {
      version: STACK_COMMENT_VERSION,
      stack: [
        { bookmarkName: "A", prUrl: prUrl(1), prNumber: 1, merged: true },
        { bookmarkName: "B", prUrl: prUrl(2), prNumber: 2 },
      ],
    };

    const lines = formatStackComment(withMerged, 1, "trunk").split("\n");

    assert.equal(lines[0], "This PR is part of a stack of 2 bookmarks:");
    assert.equal(lines[2], "1. `trunk`");
    assert.equal(lines[3], `1. ~~[A](${prUrl(1)})~~ (merged)`);
    assert.equal(lines[4], "1. **B ← this PR**");
  });

  test("a single PR says bookmark", () => {
    const single: StackCommentData = {
      version: STACK_COMMENT_VERSION,
      stack: [{ bookmarkName: "solo", prUrl: prUrl(7), prNumber: 7 }],
    };

    assert.ok(
      formatStackComment(single, 0, "main").startsWith(
        "This PR is part of a stack of 1 bookmark:\n",
      ),
    );
  });

  test("the embedded data survives a round trip", () => {
    const flagged: StackCommentData = {
      version: STACK_COMMENT_VERSION,
      stack: [
        { bookmarkName: "A", prUrl: prUrl(1), prNumber: 1, merged: true },
        { bookmarkName: "B", prUrl: prUrl(2), prNumber: 2, merged: false },
      ],
    };

    assert.deepEqual(
      parseStackComment(formatStackComment(flagged, 1, "main")),
      flagged,
    );
    assert.deepEqual(
      parseStackComment(formatStackComment(data, 0, "main"))?.stack.map(
        (e) => e.prNumber,
      ),
      [1, 2, 3],
    );
  });

  test("comments from other sources are ignored", () => {
    assert.equal(parseStackComment("LGTM"), undefined);
    assert.equal(
      parseStackComment("<!--- STACKSMITH_STACK_INFO: unterminated"),
      undefined,
    );
    assert.equal(
      parseStackComment("<!--- STACKSMITH_STACK_INFO: not-base64-json! --->"),
      undefined,
    );
    assert.equal(parseStackComment(encode({ foo: 1 })), undefined);
    assert.equal(
      parseStackComment(
        encode({
          version: 1,
          stack: [{ bookmarkName: "A", prUrl: "nope", prNumber: 1 }],
        }),
      ),
      undefined,
    );
  });

  test("finds the managed comment among unrelated ones", () => {
    const comments = [
      { id: 1, body: "Looks good to me" },
      { id: 2, body: "Mentions STACKSMITH_STACK_INFO without any data" },
      { id: 3, body: formatStackComment(data, 2, "main") },
      { id: 4, body: "Another review comment" },
    ];

    assert.equal(findStackComment(comments)?.id, 3);
    assert.equal(findStackComment(comments.slice(0, 2)), undefined);
  });
});
