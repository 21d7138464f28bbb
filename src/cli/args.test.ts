import { parseCliArgs } from "./args.js";
import assert from "assert/strict";

suite("command line", () => {
  test("show is the default", () => {
    assert.deepEqual(parseCliArgs([]), { kind: "show" });
    assert.deepEqual(parseCliArgs(["show"]), { kind: "show" });
  });

  test("help", () => {
    for (const arg of ["help", "--help", "-h"]) {
      assert.deepEqual(parseCliArgs([arg]), { kind: "help" });
    }
  });

  test("auth subcommands", () => {
    assert.deepEqual(parseCliArgs(["auth", "test"]), { kind: "auth-test" });
    assert.deepEqual(parseCliArgs(["auth", "setup"]), { kind: "auth-setup" });
    assert.throws(() => parseCliArgs(["auth"]), {
      message: "Unknown auth command: (none)",
    });
  });

  test("submit with options in any order", () => {
    assert.deepEqual(
      parseCliArgs([
        "submit",
        "--draft",
        "feature",
        "--remote",
        "fork",
        "--dry-run",
      ]),
      {
        kind: "submit",
        bookmark: "feature",
        dryRun: true,
        draft: true,
        remote: "fork",
      },
    );
    assert.deepEqual(parseCliArgs(["submit", "feature"]), {
      kind: "submit",
      bookmark: "feature",
      dryRun: false,
      draft: false,
      remote: undefined,
    });
  });

  test("invalid input", () => {
    assert.throws(() => parseCliArgs(["submit"]), {
      message: "submit requires a bookmark name",
    });
    assert.throws(() => parseCliArgs(["submit", "a", "--remote"]), {
      message: "--remote requires a value",
    });
    assert.throws(() => parseCliArgs(["submit", "a", "--force"]), {
      message: "Unknown option: --force",
    });
    assert.throws(() => parseCliArgs(["submit", "a", "b"]), {
      message: "Unexpected argument: b",
    });
    assert.throws(() => parseCliArgs(["land"]), {
      message: "Unknown command: land",
    });
  });
});
