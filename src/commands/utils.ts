import pc from 'picocolors';
import type { SiteConfigInput } from '../config/site.js';
import { isBuildError } from '../lib/errors.js';

export interface InputOptions {
  config?: string;
  content?: string;
  public?: string;
  drafts?: boolean;
  sanitize?: boolean;
}

export interface BuildOptions extends InputOptions {
  out?: string;
  clean?: boolean;
}

/** Maps CLI flags onto config keys; flags that were not given stay undefined. */
export function toConfigOverrides(options: BuildOptions): Partial<SiteConfigInput> {
  return {
    contentDir: options.content,
    outDir: options.out,
    publicDir: options.public,
    includeDrafts: options.drafts,
    sanitize: options.sanitize,
    clean: options.clean,
  };
}

export type Reporter = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export const consoleReporter: Reporter = {
  log: line => console.log(line),
  error: line => console.error(line),
};

/** Prints a failure and returns the process exit code for it. */
export function reportFailure(err: unknown, reporter: Reporter): number {
  if (isBuildError(err)) {
    reporter.error(pc.red(`${err.name}: ${err.message}`));
    for (const file of err.filePaths) {
      reporter.error(pc.dim(`  at ${file}`));
    }
    return 1;
  }
  reporter.error(pc.red(`Unexpected error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`));
  return 1;
}
