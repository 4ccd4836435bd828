/**
 * Zod schema for git-re's command-line flags
 */

import { z } from "zod";
import type { Action, Invocation } from "./types.js";

const RawFlagsSchema = z.object({
  commit: z.string().min(1, "commit argument must not be empty").optional(),
  stash: z.boolean(),
  done: z.boolean(),
  abort: z.boolean(),
  verbose: z.boolean(),
  dryRun: z.boolean(),
  help: z.boolean(),
});

export type Flags = z.infer<typeof RawFlagsSchema>;

/**
 * Pick the single action the flags ask for, or the first conflict between them
 */
function resolveAction(flags: Flags): Action | string {
  if (flags.help) {
    return { kind: "help" };
  }

  if (flags.abort) {
    if (flags.commit !== undefined) return "--abort cannot be used with a commit argument";
    if (flags.stash) return "--abort cannot be used with --stash";
    if (flags.done) return "--abort cannot be used with --done";
    return { kind: "abort" };
  }

  if (flags.done) {
    if (flags.commit !== undefined) return "--done cannot be used with a commit argument";
    if (flags.stash) return "--done cannot be used with --stash";
    return { kind: "done" };
  }

  if (flags.commit === undefined) {
    return "missing commit argument";
  }

  return { kind: "edit", commit: flags.commit, stash: flags.stash };
}

export const FlagsSchema = RawFlagsSchema.transform((flags, ctx): Invocation => {
  const action = resolveAction(flags);
  if (typeof action === "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: action });
    return z.NEVER;
  }
  return { action, verbose: flags.verbose, dryRun: flags.dryRun };
});
