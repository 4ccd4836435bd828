/**
 * Git utilities
 *
 * Every git invocation git-re makes lives here. Mutating commands are skipped
 * in dry-run mode; read-only queries always run.
 */

import { constants } from "node:os";
import { execa } from "execa";
import { formatCommand } from "./string.js";

/** Message that marks stash entries created by git-re */
export const STASH_MESSAGE = "git-re--stash";

/**
 * Sequence editor that turns the first todo line into `edit`.
 * `-i.bak` keeps it working with both GNU and BSD sed.
 */
export const SEQUENCE_EDITOR = "sed -i.bak -e '1s/^pick /edit /'";

export interface GitCommand {
  args: string[];
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of passing them through to the terminal */
  capture: boolean;
}

export interface GitRunResult {
  exitCode: number;
  stdout: string;
}

export type GitRunner = (command: GitCommand) => Promise<GitRunResult>;

export type StepResult =
  | { ok: true; dryRun: boolean }
  | { ok: false; exitCode: number };

export type StagedCheck =
  | { ok: true; staged: boolean }
  | { ok: false; exitCode: number };

/**
 * Shell-style exit code for a process killed by `signal` (128 + signal number)
 */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

/**
 * Run git through execa. A non-zero exit is a result, not an exception.
 */
export function createExecaRunner(
  gitBinary: string = process.env.GIT_RE_GIT ?? "git",
  cwd?: string,
): GitRunner {
  return async ({ args, env, capture }) => {
    const result = await execa(gitBinary, args, {
      cwd,
      env,
      reject: false,
      stdio: capture ? "pipe" : "inherit",
    });
    // Killed by a signal, e.g. Ctrl-C inside a hook or editor
    if (result.signal) {
      return { exitCode: signalExitCode(result.signal), stdout: result.stdout ?? "" };
    }
    // No exit code means git never ran (e.g. not on PATH)
    if (result.failed && typeof result.exitCode !== "number") {
      throw new Error(`could not run ${gitBinary}`);
    }
    return { exitCode: result.exitCode, stdout: result.stdout ?? "" };
  };
}

export interface GitOptions {
  dryRun: boolean;
  log: { debug(message: string): void };
  runner?: GitRunner;
}

export class Git {
  readonly dryRun: boolean;
  private readonly log: GitOptions["log"];
  private readonly runner: GitRunner;

  constructor(options: GitOptions) {
    this.dryRun = options.dryRun;
    this.log = options.log;
    this.runner = options.runner ?? createExecaRunner();
  }

  /**
   * Echo and run a command. Returns null when dry-run suppressed it.
   */
  private async exec(
    args: string[],
    options: { mutating: boolean; env?: Record<string, string> },
  ): Promise<GitRunResult | null> {
    const skip = this.dryRun && options.mutating;
    this.log.debug((skip ? "# " : "> ") + formatCommand("git", args, options.env));

    if (skip) {
      return null;
    }

    return await this.runner({ args, env: options.env, capture: !options.mutating });
  }

  private async step(
    args: string[],
    env?: Record<string, string>,
  ): Promise<StepResult> {
    const result = await this.exec(args, { mutating: true, env });
    if (result === null) {
      return { ok: true, dryRun: true };
    }
    if (result.exitCode !== 0) {
      return { ok: false, exitCode: result.exitCode };
    }
    return { ok: true, dryRun: false };
  }

  /**
   * Start an interactive rebase that stops at `commit`, ready to be amended,
   * without asking the user to edit the todo list.
   * With `autostash`, unstaged edits are set aside until the rebase finishes.
   */
  rebaseEdit(commit: string, options: { autostash?: boolean } = {}): Promise<StepResult> {
    const flags = options.autostash ? ["--autostash"] : [];
    return this.step(["rebase", "-i", ...flags, `${commit}^`], {
      GIT_SEQUENCE_EDITOR: SEQUENCE_EDITOR,
    });
  }

  continueRebase(): Promise<StepResult> {
    return this.step(["rebase", "--continue"]);
  }

  abortRebase(): Promise<StepResult> {
    return this.step(["rebase", "--abort"]);
  }

  amendCommit(): Promise<StepResult> {
    return this.step(["commit", "--amend", "--no-edit"]);
  }

  /**
   * Stash only the staged changes, under git-re's own message
   */
  stashStaged(): Promise<StepResult> {
    return this.step(["stash", "push", "--staged", "-m", STASH_MESSAGE]);
  }

  /**
   * Pop a stash entry (the top one by default), restoring it to the index
   */
  popStash(ref?: string): Promise<StepResult> {
    return this.step(["stash", "pop", "--index", ...(ref === undefined ? [] : [ref])]);
  }

  dropStash(ref: string): Promise<StepResult> {
    return this.step(["stash", "drop", ref]);
  }

  /**
   * `git diff --cached --quiet` exits 1 when the index differs from HEAD
   */
  async hasStaged(): Promise<StagedCheck> {
    const result = await this.exec(["diff", "--cached", "--quiet"], { mutating: false });
    if (result === null || result.exitCode === 0) {
      return { ok: true, staged: false };
    }
    if (result.exitCode === 1) {
      return { ok: true, staged: true };
    }
    return { ok: false, exitCode: result.exitCode };
  }

  /**
   * Raw `git stash list` output, or "" if the command failed
   */
  async stashList(): Promise<string> {
    const result = await this.exec(["stash", "list"], { mutating: false });
    if (result === null || result.exitCode !== 0) {
      return "";
    }
    return result.stdout;
  }
}
