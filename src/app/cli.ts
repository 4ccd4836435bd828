/**
 * CLI entry point for git-re
 * Parses arguments and dispatches to the matching workflow
 */

import { parseArgs as parseArgv } from "node:util";
import { Git, type GitRunner } from "../lib/git.js";
import { Log } from "../lib/log.js";
import { FlagsSchema } from "./schema.js";
import { type Invocation, USAGE_EXIT_CODE, UsageError } from "./types.js";
import { abortFlow, doneFlow, editFlow, stashFlow } from "./workflows.js";

export const USAGE = `Usage:
  git re [options] <commit>          Rebase-edit <commit>
  git re [options] --stash <commit>  Move staged changes into <commit>
  git re [options] --done            Amend the current commit and continue the rebase
  git re [options] --abort           Abort the rebase
  git re --help                      Show this message

Options:
  -s, --stash    Stash staged changes, rebase-edit, pop, amend, and continue the rebase
  -v, --verbose  Print each git command before running it
      --dry-run  Show what would be done without making any changes
  -h, --help     Show this message`;

/**
 * Turn argv into exactly one action, or throw a UsageError
 */
export function parseArgs(argv: readonly string[]): Invocation {
  let tokens: ReturnType<typeof tokenize>;
  try {
    tokens = tokenize(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = tokens;
  if (positionals.length > 1) {
    throw new UsageError(`unexpected argument '${positionals[1]}'`);
  }

  const parsed = FlagsSchema.safeParse({
    commit: positionals[0],
    stash: values.stash ?? false,
    done: values.done ?? false,
    abort: values.abort ?? false,
    verbose: values.verbose ?? false,
    dryRun: values["dry-run"] ?? false,
    help: values.help ?? false,
  });

  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? "invalid arguments");
  }
  return parsed.data;
}

function tokenize(argv: readonly string[]) {
  return parseArgv({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      stash: { type: "boolean", short: "s" },
      done: { type: "boolean" },
      abort: { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
      "dry-run": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export interface MainOptions {
  /** Replaces the execa-backed git runner, mainly for tests */
  runner?: GitRunner;
}

/**
 * Run git-re and return the process exit code
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  let invocation: Invocation;
  try {
    invocation = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error(`\n${USAGE}`);
      return USAGE_EXIT_CODE;
    }
    throw error;
  }

  const { action } = invocation;
  if (action.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const log = new Log(invocation);
  const git = new Git({ dryRun: invocation.dryRun, log, runner: options.runner });

  switch (action.kind) {
    case "abort":
      return await abortFlow(log, git);
    case "done":
      return await doneFlow(log, git);
    case "edit":
      return action.stash
        ? await stashFlow(action.commit, log, git)
        : await editFlow(action.commit, log, git);
  }
}
