/**
 * git-re workflows
 * These functions can be imported and used programmatically
 */

import { type Git, STASH_MESSAGE } from "../lib/git.js";
import type { Log } from "../lib/log.js";

function printResumeHints(log: Log): void {
  log.error("Error: + Fix any conflicts, then run 'git re --done'.");
  log.error("Error: + To cancel the rebase, run 'git re --abort'.");
}

/**
 * Find the ref (e.g. `stash@{2}`) of the entry git-re left in the stash, if any
 */
export function findStashRef(stashList: string): string | undefined {
  const line = stashList.split("\n").find((entry) => entry.includes(STASH_MESSAGE));
  return line?.split(":", 1)[0];
}

/**
 * Drop the stash entry left behind once its changes made it into the commit.
 * A failed drop only warns; it never fails the surrounding workflow.
 */
export async function cleanupStash(git: Git, log: Log): Promise<void> {
  const ref = findStashRef(await git.stashList());
  if (ref === undefined) {
    return;
  }

  log.debug("Removing leftover stash entry...");
  const dropped = await git.dropStash(ref);
  if (!dropped.ok) {
    log.error("Warning: Failed to remove leftover stash entry.");
  }
}

/**
 * Put the changes of a leftover stash entry back into the index.
 * A failed pop only warns; the entry stays in the stash.
 */
export async function restoreStash(git: Git, log: Log): Promise<void> {
  const ref = findStashRef(await git.stashList());
  if (ref === undefined) {
    return;
  }

  const restored = await git.popStash(ref);
  if (!restored.ok) {
    log.error(`Warning: Failed to restore stashed changes from ${ref}.`);
    log.error("Warning: + To recover them, check 'git stash list'.");
  } else if (!restored.dryRun) {
    log.info(`Restored stashed changes from ${ref}.`);
  }
}

/**
 * Amend the paused commit with the staged changes and continue the rebase
 */
export async function doneFlow(log: Log, git: Git): Promise<number> {
  const amended = await git.amendCommit();
  if (!amended.ok) {
    log.error("Error: Failed to amend the current commit.");
    return amended.exitCode;
  }

  const continued = await git.continueRebase();
  if (!continued.ok) {
    log.error("Error: Failed to finish rebase.");
    printResumeHints(log);
    return continued.exitCode;
  }

  await cleanupStash(git, log);

  log.info(
    continued.dryRun
      ? "Dry run: would amend commit and continue rebase."
      : "Successfully amended commit and continued rebase.",
  );
  return 0;
}

/**
 * Abort the paused rebase. Changes a failed --stash run left in the stash go back to the index.
 */
export async function abortFlow(log: Log, git: Git): Promise<number> {
  const aborted = await git.abortRebase();
  if (!aborted.ok) {
    log.error("Error: Failed to abort rebase.");
    return aborted.exitCode;
  }

  await restoreStash(git, log);

  log.info(aborted.dryRun ? "Dry run: would abort rebase." : "Successfully aborted rebase.");
  return 0;
}

/**
 * Start an interactive rebase paused on `commit`
 */
export async function editFlow(commit: string, log: Log, git: Git): Promise<number> {
  const started = await git.rebaseEdit(commit);
  if (!started.ok) {
    log.error("Error: Failed to start interactive rebase.");
    return started.exitCode;
  }

  log.info(
    started.dryRun
      ? `Dry run: would start rebase-editing ${commit}.`
      : "Rebase-editing. Stage your changes, then run 'git re --done'.",
  );
  return 0;
}

/**
 * Move the staged changes into `commit`: stash them, rebase-edit, restore, then finish.
 * Unstaged edits ride along in git's autostash. With nothing staged this is the plain edit flow.
 */
export async function stashFlow(commit: string, log: Log, git: Git): Promise<number> {
  const leftover = findStashRef(await git.stashList());
  if (leftover !== undefined) {
    log.error(`Error: Changes from an earlier --stash run are still saved in ${leftover}.`);
    log.error(`Error: + Restore them with 'git stash pop --index ${leftover}', or drop them, then retry.`);
    return 1;
  }

  const check = await git.hasStaged();
  if (!check.ok) {
    log.error("Error: Failed to inspect staged changes.");
    return check.exitCode;
  }

  if (!check.staged) {
    log.info("No staged changes, nothing to stash.");
    return await editFlow(commit, log, git);
  }

  const stashed = await git.stashStaged();
  if (!stashed.ok) {
    log.error("Error: Failed to stash staged changes.");
    return stashed.exitCode;
  }

  const started = await git.rebaseEdit(commit, { autostash: true });
  if (!started.ok) {
    log.error("Error: Failed to start interactive rebase.");

    log.debug("Restoring stash...");
    const restored = await git.popStash();
    if (!restored.ok) {
      log.error("Error: + Failed to restore stash after rebase failure.");
      log.error("Error: + To recover your stashed changes, check 'git stash list'.");
    }

    return started.exitCode;
  }

  const popped = await git.popStash();
  if (!popped.ok) {
    log.error("Error: Failed to apply stash to commit. The changes are saved in the stash.");
    printResumeHints(log);
    return popped.exitCode;
  }

  return await doneFlow(log, git);
}
