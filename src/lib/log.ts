/**
 * Console output for git-re
 */

export interface LogOptions {
  verbose: boolean;
  dryRun: boolean;
}

/**
 * Thin wrapper over console. Debug lines only appear in verbose or dry-run mode.
 */
export class Log {
  readonly verbose: boolean;

  constructor(options: LogOptions) {
    this.verbose = options.verbose || options.dryRun;
  }

  info(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}
