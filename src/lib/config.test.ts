import * as v from "valibot";
import { loadConfig } from "./config.js";
import assert from "assert/strict";

suite("config", () => {
  test("defaults", () => {
    // DEBUG is read by the logger, not carried in the config
    assert.deepEqual(loadConfig({ PATH: "/usr/bin", DEBUG: "true" }), {
      jj: { binaryPath: "jj" },
      remote: "origin",
      repoOverride: undefined,
    });
  });

  test("reads overrides from the environment", () => {
    assert.deepEqual(
      loadConfig({
        JJ_BINARY: "/opt/jj/bin/jj",
        STACKSMITH_REMOTE: "upstream",
        GITHUB_OWNER: "test-owner",
        GITHUB_REPO: "test-repo",
      }),
      {
        jj: { binaryPath: "/opt/jj/bin/jj" },
        remote: "upstream",
        repoOverride: { owner: "test-owner", repo: "test-repo" },
      },
    );
  });

  test("empty variables count as unset", () => {
    const config = loadConfig({
      JJ_BINARY: "",
      STACKSMITH_REMOTE: "",
      GITHUB_OWNER: "",
    });

    assert.equal(config.jj.binaryPath, "jj");
    assert.equal(config.remote, "origin");
    assert.equal(config.repoOverride, undefined);
  });

  test("owner and repo must come together", () => {
    assert.throws(
      () => loadConfig({ GITHUB_OWNER: "test-owner" }),
      (error) =>
        error instanceof v.ValiError &&
        error.message === "GITHUB_OWNER and GITHUB_REPO must be set together",
    );
  });
});
