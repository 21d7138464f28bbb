import { RequestError } from "octokit";
import { toForgeError } from "./githubForge.js";
import assert from "assert/strict";

function requestError(
  status: number,
  message: string,
  headers: Record<string, string> = {},
): RequestError {
  return new RequestError(message, status, {
    request: {
      method: "GET",
      url: "https://api.github.com/repos/test-owner/test-repo/pulls",
      headers: {},
    },
    response: {
      status,
      url: "https://api.github.com/repos/test-owner/test-repo/pulls",
      headers,
      data: { message },
    },
  });
}

suite("GitHub errors", () => {
  test("maps HTTP statuses to error kinds", () => {
    const cases: Array<[RequestError, string]> = [
      [requestError(401, "Bad credentials"), "auth"],
      [requestError(403, "Resource not accessible"), "auth"],
      [
        requestError(403, "API rate limit exceeded", {
          "x-ratelimit-remaining": "0",
        }),
        "rate-limited",
      ],
      [requestError(429, "Too many requests"), "rate-limited"],
      [requestError(404, "Not Found"), "not-found"],
      [requestError(409, "Conflict"), "conflict"],
      [requestError(422, "Validation Failed"), "conflict"],
      [requestError(502, "Bad Gateway"), "api"],
    ];

    for (const [error, kind] of cases) {
      assert.equal(
        toForgeError(error, "listing PRs").kind,
        kind,
        `status ${error.status}`,
      );
    }
  });

  test("keeps the context, status and cause", () => {
    const cause = requestError(401, "Bad credentials");
    const error = toForgeError(cause, "getting authenticated user");

    assert.equal(error.message, "getting authenticated user: Bad credentials");
    assert.equal(error.status, 401);
    assert.equal(error.cause, cause);
  });

  test("anything else is an API error", () => {
    const error = toForgeError(
      new Error("socket hang up"),
      "creating PR for A",
    );

    assert.equal(error.kind, "api");
    assert.equal(error.message, "creating PR for A: socket hang up");
    assert.equal(error.status, undefined);
  });
});
