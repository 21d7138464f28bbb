import { AUTH_REMEDIATION, getGitHubAuth } from "./auth.js";
import { AuthResolutionError } from "./errors.js";
import assert from "assert/strict";

const noGh = () => Promise.resolve(null);

suite("GitHub auth", () => {
  test("the GitHub CLI wins", async () => {
    const auth = await getGitHubAuth({ GITHUB_TOKEN: "test-env-token" }, () =>
      Promise.resolve("test-gh-token"),
    );

    assert.deepEqual(auth, { token: "test-gh-token", source: "gh-cli" });
  });

  test("GITHUB_TOKEN before GH_TOKEN", async () => {
    const auth = await getGitHubAuth(
      { GITHUB_TOKEN: "test-secret", GH_TOKEN: "test-other-secret" },
      noGh,
    );

    assert.deepEqual(auth, { token: "test-secret", source: "GITHUB_TOKEN" });
  });

  test("GH_TOKEN as a last resort", async () => {
    const auth = await getGitHubAuth(
      { GITHUB_TOKEN: "", GH_TOKEN: "test-secret" },
      noGh,
    );

    assert.deepEqual(auth, { token: "test-secret", source: "GH_TOKEN" });
  });

  test("no source explains how to log in", async () => {
    await assert.rejects(
      getGitHubAuth({}, noGh),
      (error) =>
        error instanceof AuthResolutionError &&
        error.remediation === AUTH_REMEDIATION,
    );
  });
});
