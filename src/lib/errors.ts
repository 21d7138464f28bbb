/**
 * A jj invocation failed: the process could not start, exited non-zero, or
 * printed something we could not parse.
 */
export class JjError extends Error {
  readonly args: string[];
  readonly stderr: string;

  constructor(
    message: string,
    args: string[],
    options?: { stderr?: string; cause?: unknown },
  ) {
    super(`${message} (jj ${args.join(" ")})`, { cause: options?.cause });
    this.name = "JjError";
    this.args = args;
    this.stderr = options?.stderr ?? "";
  }
}

export type GraphErrorReason = "not-found" | "tainted";

export class GraphError extends Error {
  readonly bookmark: string;
  readonly reason: GraphErrorReason;

  constructor(bookmark: string, reason: GraphErrorReason) {
    super(
      reason === "tainted"
        ? `Bookmark '${bookmark}' has a merge commit in its history and cannot be stacked`
        : `Bookmark '${bookmark}' not found in any stack`,
    );
    this.name = "GraphError";
    this.bookmark = bookmark;
    this.reason = reason;
  }
}

export type ForgeErrorKind =
  | "auth"
  | "rate-limited"
  | "not-found"
  | "conflict"
  | "api";

export class ForgeError extends Error {
  readonly kind: ForgeErrorKind;
  readonly status?: number;

  constructor(
    kind: ForgeErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ForgeError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export class AuthResolutionError extends Error {
  readonly remediation: string;

  constructor(remediation: string) {
    super("No GitHub authentication found");
    this.name = "AuthResolutionError";
    this.remediation = remediation;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
