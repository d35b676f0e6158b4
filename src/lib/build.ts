import path from 'node:path';
import type { SiteConfig } from '../config/site.js';
import type { Site } from '../types/post.js';
import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';
import { copyPublicAssets, prepareOutDir, writeSite } from './output.js';
import { loadPosts } from './posts.js';
import { assembleSite } from './site.js';

export type BuildResult = {
  outDir: string;
  posts: number;
  files: string[];
  assetsCopied: boolean;
};

function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

function assertSeparateDirs(config: SiteConfig): void {
  if (isWithin(config.outDir, config.contentDir)) {
    throw new ConfigError('output directory must not contain the content directory', config.outDir);
  }
  if (isWithin(config.outDir, config.publicDir)) {
    throw new ConfigError('output directory must not contain the public directory', config.outDir);
  }
  if (isWithin(config.publicDir, config.outDir)) {
    throw new ConfigError('public directory must not contain the output directory', config.publicDir);
  }
}

/** Loads and assembles the site without touching the output directory. */
export async function checkSite(config: SiteConfig, logger?: Logger): Promise<Site> {
  logger?.info({ contentDir: config.contentDir }, 'Loading posts');
  const posts = await loadPosts(config.contentDir);
  logger?.info({ count: posts.length }, 'Loaded posts');
  return assembleSite(posts, config, logger);
}

/**
 * Full build. Everything is loaded and rendered in memory first, so a parse,
 * render or slug error leaves the output directory untouched.
 */
export async function buildSite(config: SiteConfig, logger?: Logger): Promise<BuildResult> {
  assertSeparateDirs(config);
  const site = await checkSite(config, logger);

  if (config.clean) {
    logger?.info({ outDir: config.outDir }, 'Cleaning output directory');
  }
  await prepareOutDir(config.outDir, config.clean);
  // assets first so a page always wins over a same-named static file
  const assetsCopied = await copyPublicAssets(config.publicDir, config.outDir);
  if (assetsCopied) {
    logger?.debug({ publicDir: config.publicDir }, 'Copied public assets');
  }
  const files = await writeSite(site, config.outDir);

  logger?.info({ outDir: config.outDir, pages: files.length }, 'Build complete');
  return { outDir: config.outDir, posts: site.posts.length, files, assetsCopied };
}
