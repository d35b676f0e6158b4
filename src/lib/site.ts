import type { SiteConfig } from '../config/site.js';
import type { IndexEntry } from '../components/BlogIndex.js';
import type { Post, RenderedPage, Site } from '../types/post.js';
import { CollisionError } from './errors.js';
import type { Logger } from './logger.js';
import { renderExcerpt, renderMarkdown } from './markdown.js';
import { renderIndexPage, renderPostPage } from './pages.js';
import { INDEX_PAGE_PATH, postHref, postPagePath } from './routes.js';

export type SelectOptions = { includeDrafts: boolean };

/**
 * Fails when two documents map to the same slug, since both would be written
 * to the same output path. Drafts count too.
 */
export function assertUniqueSlugs(posts: readonly Post[]): void {
  const bySlug = new Map<string, string[]>();
  for (const post of posts) {
    const paths = bySlug.get(post.slug) ?? [];
    paths.push(post.sourcePath);
    bySlug.set(post.slug, paths);
  }
  const collisions = [...bySlug.entries()]
    .filter(([, paths]) => paths.length > 1)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (collisions.length > 0) {
    const [slug, paths] = collisions[0];
    throw new CollisionError(slug, [...paths].sort());
  }
}

/** Newest first; equal dates fall back to slug order so output never depends on load order. */
export function comparePosts(a: Post, b: Post): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  return a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0;
}

export function selectPosts(posts: readonly Post[], { includeDrafts }: SelectOptions): Post[] {
  return posts.filter(p => includeDrafts || !p.draft).sort(comparePosts);
}

/**
 * Turns loaded posts into the full page set: one page per included post and
 * the index. Nothing is written here.
 */
export async function assembleSite(posts: readonly Post[], config: SiteConfig, logger?: Logger): Promise<Site> {
  assertUniqueSlugs(posts);
  const included = selectPosts(posts, { includeDrafts: config.includeDrafts });
  logger?.info({ total: posts.length, included: included.length, drafts: config.includeDrafts }, 'Assembling site');

  const pages: RenderedPage[] = [];
  const entries: IndexEntry[] = [];
  for (const post of included) {
    logger?.debug({ slug: post.slug, file: post.sourcePath }, 'Rendering post');
    const html = await renderMarkdown(post.body, {
      sanitize: config.sanitize,
      publicDir: config.publicDir,
      logger,
      filePath: post.sourcePath,
      lineOffset: post.bodyLine - 1,
    });
    const excerptHtml = post.excerpt ? await renderExcerpt(post.excerpt, { sanitize: config.sanitize }) : undefined;
    pages.push({ path: postPagePath(post.slug), contents: renderPostPage(post, html, excerptHtml, config) });
    entries.push({
      slug: post.slug,
      title: post.title,
      date: post.date,
      href: postHref(post.slug, config.basePath),
      draft: post.draft,
      ...(excerptHtml !== undefined ? { excerptHtml } : {}),
    });
  }

  pages.push({ path: INDEX_PAGE_PATH, contents: renderIndexPage(entries, config) });
  pages.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { posts: included, pages };
}
