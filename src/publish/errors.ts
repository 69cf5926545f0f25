import type { PublishState } from "./states.js";

export type PublishErrorKind = "precondition" | "divergence" | "transport" | "rejected" | "git";

export class PublishError extends Error {
  readonly kind: PublishErrorKind;
  /** Terminal state the pipeline stopped in; set by the pipeline when it aborts. */
  state: PublishState | null = null;
  hint?: string;

  constructor(kind: PublishErrorKind, message: string, options?: { cause?: unknown; hint?: string }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "PublishError";
    this.kind = kind;
    this.hint = options?.hint;
  }
}

export class PreconditionError extends PublishError {
  constructor(message: string, options?: { cause?: unknown; hint?: string }) {
    super("precondition", message, options);
    this.name = "PreconditionError";
  }
}

export type DivergenceDetails = {
  status: "behind" | "diverged";
  remote: string;
  branch: string;
  local: string;
  remoteTip: string;
  base: string | null;
  ahead: number;
  behind: number;
  localOnly: string[];
  remoteOnly: string[];
};

export class DivergenceError extends PublishError {
  readonly details: DivergenceDetails;

  constructor(details: DivergenceDetails) {
    const remoteRef = `${details.remote}/${details.branch}`;
    super(
      "divergence",
      details.status === "behind"
        ? `Local ${details.branch} is behind ${remoteRef} by ${details.behind} commit(s)`
        : `Local ${details.branch} and ${remoteRef} have diverged (${details.ahead} ahead, ${details.behind} behind)`,
      {
        hint:
          details.status === "behind"
            ? `Run 'git merge --ff-only ${remoteRef}' (or sync-check --pull), then retry.`
            : `Run 'git pull --rebase ${details.remote} ${details.branch}' to resolve, then retry.`,
      },
    );
    this.name = "DivergenceError";
    this.details = details;
  }
}

export class TransportError extends PublishError {
  readonly remote: string;

  constructor(remote: string, message: string, cause?: unknown) {
    super("transport", message, { cause });
    this.name = "TransportError";
    this.remote = remote;
  }
}

export class PushRejectedError extends PublishError {
  readonly remote: string;
  readonly ref: string;

  constructor(remote: string, ref: string, message: string, cause?: unknown) {
    super("rejected", message, { cause });
    this.name = "PushRejectedError";
    this.remote = remote;
    this.ref = ref;
  }
}

/** A local git command failed mid-pipeline (object store, refs, history walk). */
export class GitOperationError extends PublishError {
  readonly args: string[];

  constructor(args: string[], message: string, cause?: unknown) {
    super("git", message, { cause });
    this.name = "GitOperationError";
    this.args = args;
  }
}
