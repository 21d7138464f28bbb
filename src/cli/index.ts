#!/usr/bin/env node

import * as v from "valibot";
import { loadConfig } from "../lib/config.js";
import { AuthResolutionError, ForgeError, JjError } from "../lib/errors.js";
import { authSetupCommand, authTestCommand } from "./authCommand.js";
import { showCommand } from "./showCommand.js";
import { submitCommand } from "./submitCommand.js";
import { parseCliArgs } from "./args.js";

function showHelp() {
  console.log("🔧 stacksmith - stacked GitHub PRs from jj bookmarks");
  console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
  console.log("");
  console.log("USAGE:");
  console.log("  stacksmith [COMMAND] [OPTIONS]");
  console.log("");
  console.log("COMMANDS:");
  console.log("  show                  Show the bookmark stacks (default)");
  console.log("  submit <bookmark>     Submit a bookmark (and its stack) as PRs");
  console.log("    --dry-run           Show what would be done without making changes");
  console.log("    --draft             Create new PRs as drafts");
  console.log("    --remote <name>     Push to this remote (default: origin)");
  console.log("");
  console.log("  auth test             Test GitHub authentication");
  console.log("  auth setup            Show how authentication is resolved");
  console.log("");
  console.log("  help, --help, -h      Show this help message");
  console.log("");
  console.log("ENVIRONMENT:");
  console.log("  JJ_BINARY             jj executable (default: jj)");
  console.log("  STACKSMITH_REMOTE     Default push remote (default: origin)");
  console.log("  GITHUB_OWNER/REPO     Override repository detection");
  console.log("  DEBUG=true            Verbose logging");
}

function reportError(error: unknown) {
  if (error instanceof AuthResolutionError) {
    console.error(`❌ ${error.message}`);
    console.error(`   ${error.remediation}`);
  } else if (error instanceof ForgeError && error.kind === "auth") {
    console.error(`❌ GitHub rejected the credentials: ${error.message}`);
  } else if (error instanceof JjError) {
    console.error(`❌ ${error.message}`);
    if (error.stderr) console.error(error.stderr.trim());
  } else if (error instanceof v.ValiError) {
    console.error(`❌ Invalid configuration: ${error.message}`);
  } else {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function main(): Promise<number> {
  try {
    const command = parseCliArgs(process.argv.slice(2));
    const config = loadConfig();

    switch (command.kind) {
      case "help":
        showHelp();
        return 0;
      case "show":
        await showCommand(config);
        return 0;
      case "auth-test":
        await authTestCommand(config);
        return 0;
      case "auth-setup":
        authSetupCommand();
        return 0;
      case "submit":
        return (await submitCommand(command.bookmark, command, config)) ? 0 : 1;
    }
  } catch (error) {
    reportError(error);
    return 1;
  }
}

void main().then((code) => {
  process.exitCode = code;
});
