import path from 'node:path';
import pc from 'picocolors';
import { loadSiteConfig } from '../config/site.js';
import { buildSite } from '../lib/build.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { consoleReporter, reportFailure, toConfigOverrides, type BuildOptions, type Reporter } from './utils.js';

export type CommandContext = {
  cwd?: string;
  logger?: Logger;
  reporter?: Reporter;
};

/** Runs a build and returns the exit code: 0 on success, 1 on any build error. */
export async function runBuild(options: BuildOptions, ctx: CommandContext = {}): Promise<number> {
  const cwd = ctx.cwd ?? process.cwd();
  const reporter = ctx.reporter ?? consoleReporter;
  try {
    const config = await loadSiteConfig(toConfigOverrides(options), options.config, cwd);
    const logger = ctx.logger ?? createLogger();
    reporter.log(pc.blue(`Building ${pc.bold(config.siteName)}...`));
    const result = await buildSite(config, logger);
    reporter.log(pc.green(`Build complete! ${result.posts} post(s), ${result.files.length} page(s) in ${path.relative(cwd, result.outDir) || '.'}`));
    return 0;
  } catch (err) {
    return reportFailure(err, reporter);
  }
}

export async function buildCommand(options: BuildOptions): Promise<void> {
  process.exitCode = await runBuild(options);
}
