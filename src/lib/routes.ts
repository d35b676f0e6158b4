import type { NavItem } from '../types/post.js';

export const INDEX_PAGE_PATH = 'index.html';
export const POSTS_DIR = 'blog';

/** Output file for a post, relative to the output directory. */
export function postPagePath(slug: string): string {
  return `${POSTS_DIR}/${slug}/index.html`;
}

/** Public URL path of a post. `basePath` always ends with '/'. */
export function postHref(slug: string, basePath = '/'): string {
  return `${basePath}${POSTS_DIR}/${slug}/`;
}

export function indexHref(basePath = '/'): string {
  return basePath;
}

/** Navigation shown in the page header; configured items replace the default. */
export function navItems(basePath = '/', configured?: NavItem[]): NavItem[] {
  return configured ?? [{ label: 'Blog', href: indexHref(basePath) }];
}
