export type CliCommand =
  | { kind: "show" }
  | { kind: "help" }
  | { kind: "auth-test" }
  | { kind: "auth-setup" }
  | {
      kind: "submit";
      bookmark: string;
      dryRun: boolean;
      draft: boolean;
      remote?: string;
    };

export function parseCliArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
    case "show":
      return { kind: "show" };
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    case "auth":
      if (rest[0] === "test") return { kind: "auth-test" };
      if (rest[0] === "setup") return { kind: "auth-setup" };
      throw new Error(`Unknown auth command: ${rest[0] ?? "(none)"}`);
    case "submit": {
      let bookmark: string | undefined;
      let remote: string | undefined;
      let dryRun = false;
      let draft = false;

      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === "--dry-run") {
          dryRun = true;
        } else if (arg === "--draft") {
          draft = true;
        } else if (arg === "--remote") {
          remote = rest[++i];
          if (!remote) throw new Error("--remote requires a value");
        } else if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        } else if (bookmark === undefined) {
          bookmark = arg;
        } else {
          throw new Error(`Unexpected argument: ${arg}`);
        }
      }

      if (!bookmark) {
        throw new Error("submit requires a bookmark name");
      }
      return { kind: "submit", bookmark, dryRun, draft, remote };
    }
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}
