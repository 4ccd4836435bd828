/**
 * Domain types for git-re
 */

export type Action =
  | { kind: "help" }
  | { kind: "edit"; commit: string; stash: boolean }
  | { kind: "done" }
  | { kind: "abort" };

export interface Invocation {
  action: Action;
  verbose: boolean;
  dryRun: boolean;
}

/** Exit code for invalid or conflicting flags */
export const USAGE_EXIT_CODE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
