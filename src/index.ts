export { buildSite, checkSite, type BuildResult } from './lib/build.js';
export { loadSiteConfig, parseSiteConfig, SiteConfigSchema, type SiteConfig, type SiteConfigInput } from './config/site.js';
export { BuildError, CollisionError, ConfigError, ParseError, RenderError, isBuildError } from './lib/errors.js';
export { createLogger, createSilentLogger, type Logger } from './lib/logger.js';
export { getMarkdownOptions, renderExcerpt, renderMarkdown, type MarkdownOptions, type RenderOptions } from './lib/markdown.js';
export { copyPublicAssets, prepareOutDir, writeSite } from './lib/output.js';
export { discoverPostFiles, loadPost, loadPosts, parsePost, slugFromFilename } from './lib/posts.js';
export { assembleSite, assertUniqueSlugs, comparePosts, selectPosts } from './lib/site.js';
export type { NavItem, Post, RenderedPage, Site } from './types/post.js';
