import * as v from "valibot";
import type { JjConfig } from "./jjTypes.js";

const EnvSchema = v.pipe(
  v.object({
    JJ_BINARY: v.optional(v.pipe(v.string(), v.minLength(1)), "jj"),
    STACKSMITH_REMOTE: v.optional(v.pipe(v.string(), v.minLength(1)), "origin"),
    GITHUB_OWNER: v.optional(v.pipe(v.string(), v.minLength(1))),
    GITHUB_REPO: v.optional(v.pipe(v.string(), v.minLength(1))),
  }),
  v.check(
    (env) =>
      (env.GITHUB_OWNER === undefined) === (env.GITHUB_REPO === undefined),
    "GITHUB_OWNER and GITHUB_REPO must be set together",
  ),
);

export interface AppConfig {
  jj: JjConfig;
  remote: string;
  repoOverride?: { owner: string; repo: string };
}

/**
 * Read configuration from the environment. Empty variables count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== "",
    ),
  );
  const parsed = v.parse(EnvSchema, present);

  return {
    jj: { binaryPath: parsed.JJ_BINARY },
    remote: parsed.STACKSMITH_REMOTE,
    repoOverride:
      parsed.GITHUB_OWNER !== undefined && parsed.GITHUB_REPO !== undefined
        ? { owner: parsed.GITHUB_OWNER, repo: parsed.GITHUB_REPO }
        : undefined,
  };
}
