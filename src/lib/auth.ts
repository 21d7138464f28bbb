// AIDEV-NOTE: Only supports GitHub CLI and environment variables, no local
// storage of tokens. Tokens are not validated here; callers check them with
// Forge.getAuthenticatedUser().

import { execFile } from "child_process";
import { promisify } from "util";
import { AuthResolutionError } from "./errors.js";
import { logger } from "./logger.js";

const execFileAsync = promisify(execFile);

export type AuthSource = "gh-cli" | "GITHUB_TOKEN" | "GH_TOKEN";

export interface AuthConfig {
  token: string;
  source: AuthSource;
}

export const AUTH_REMEDIATION =
  "Run `gh auth login`, or set GITHUB_TOKEN or GH_TOKEN to a personal access token with `repo` scope.";

export function describeAuthSource(source: AuthSource): string {
  switch (source) {
    case "gh-cli":
      return "GitHub CLI (gh auth token)";
    case "GITHUB_TOKEN":
      return "GITHUB_TOKEN environment variable";
    case "GH_TOKEN":
      return "GH_TOKEN environment variable";
  }
}

export type GhTokenReader = () => Promise<string | null>;

/**
 * Read the token of an authenticated GitHub CLI, or null when gh is missing
 * or logged out
 */
export async function readGitHubCLIToken(): Promise<string | null> {
  try {
    const tokenResult = await execFileAsync("gh", ["auth", "token"]);
    const token = tokenResult.stdout.trim();
    return token || null;
  } catch (error) {
    logger.debug(
      `GitHub CLI auth unavailable: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
}

/**
 * Get GitHub authentication token using the following priority:
 * 1. GitHub CLI (if available and authenticated)
 * 2. GITHUB_TOKEN
 * 3. GH_TOKEN
 */
export async function getGitHubAuth(
  env: Record<string, string | undefined> = process.env,
  readGhToken: GhTokenReader = readGitHubCLIToken,
): Promise<AuthConfig> {
  const ghCliToken = await readGhToken();
  if (ghCliToken) {
    logger.debug("Found GitHub CLI authentication");
    return { token: ghCliToken, source: "gh-cli" };
  }

  for (const source of ["GITHUB_TOKEN", "GH_TOKEN"] as const) {
    const token = env[source];
    if (token) {
      logger.debug(`Found GitHub token in ${source}`);
      return { token, source };
    }
  }

  throw new AuthResolutionError(AUTH_REMEDIATION);
}
