import type { AppConfig } from "../lib/config.js";
import { describeAuthSource, getGitHubAuth } from "../lib/auth.js";
import { GitHubForge } from "../lib/githubForge.js";
import { createJjFunctions, resolveGitHubRepo } from "../lib/jjUtils.js";

/**
 * Command to test GitHub authentication
 */
export async function authTestCommand(config: AppConfig): Promise<void> {
  console.log("🔐 Testing GitHub authentication...\n");

  const authConfig = await getGitHubAuth();
  console.log(`✅ Token found via: ${describeAuthSource(authConfig.source)}`);

  const repo =
    config.repoOverride ??
    (await resolveGitHubRepo(createJjFunctions(config.jj), config.remote));
  const forge = GitHubForge.fromToken(authConfig.token, repo.owner, repo.repo);

  const username = await forge.getAuthenticatedUser();
  console.log(`👤 Authenticated as: ${username}`);
  console.log(`📍 Repository: ${repo.owner}/${repo.repo}`);
}

export function authSetupCommand(): void {
  console.log("stacksmith resolves GitHub authentication in this order:\n");
  console.log("  1. GitHub CLI:    Run `gh auth login` to authenticate.");
  console.log("                    This is the recommended method.\n");
  console.log("  2. GITHUB_TOKEN:  A personal access token with `repo` scope.\n");
  console.log("  3. GH_TOKEN:      Same as GITHUB_TOKEN, alternative name.\n");
  console.log("To verify: run `stacksmith auth test`");
}
