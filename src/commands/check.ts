import pc from 'picocolors';
import { loadSiteConfig } from '../config/site.js';
import { checkSite } from '../lib/build.js';
import { createLogger } from '../lib/logger.js';
import type { CommandContext } from './build.js';
import { consoleReporter, reportFailure, toConfigOverrides, type InputOptions } from './utils.js';

/** Loads and renders every post without writing anything. */
export async function runCheck(options: InputOptions, ctx: CommandContext = {}): Promise<number> {
  const reporter = ctx.reporter ?? consoleReporter;
  try {
    const config = await loadSiteConfig(toConfigOverrides(options), options.config, ctx.cwd ?? process.cwd());
    const site = await checkSite(config, ctx.logger ?? createLogger());
    for (const post of site.posts) {
      reporter.log(`${pc.green('✓')} ${post.slug}${post.draft ? pc.dim(' (draft)') : ''}`);
    }
    reporter.log(pc.green(`All ${site.posts.length} post(s) OK`));
    return 0;
  } catch (err) {
    return reportFailure(err, reporter);
  }
}

export async function checkCommand(options: InputOptions): Promise<void> {
  process.exitCode = await runCheck(options);
}
