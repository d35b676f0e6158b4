import fs from 'node:fs/promises';
import path from 'node:path';
import matter from 'gray-matter';
import { slug as githubSlug } from 'github-slugger';
import type { Post } from '../types/post.js';
import { ConfigError, ParseError } from './errors.js';
import { PostFrontmatterSchema, describeIssues, parseFrontmatterYaml } from './frontmatter.js';

const MARKDOWN_EXT = /\.(md|markdown)$/i;

export function isMarkdownFile(fileName: string): boolean {
  return MARKDOWN_EXT.test(fileName);
}

/**
 * Derives a post's slug from its file name: `My First Post.md` -> `my-first-post`.
 * Only the base name counts, so `2023/intro.md` and `2024/intro.md` share a slug.
 */
export function slugFromFilename(fileName: string): string {
  const base = path.basename(fileName).replace(MARKDOWN_EXT, '');
  return githubSlug(base.trim()).replace(/-{2,}/g, '-').replace(/^-+|-+$/g, '');
}

/**
 * Recursively collects Markdown documents under `contentDir`. Names starting
 * with `.` or `_` are skipped, directories included.
 */
export async function discoverPostFiles(contentDir: string): Promise<string[]> {
  const stat = await fs.stat(contentDir).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new ConfigError('content directory does not exist', contentDir);
  }

  const files: string[] = [];
  async function scanDir(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.') || entry.name.startsWith('_')) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await scanDir(fullPath);
      } else if (entry.isFile() && isMarkdownFile(entry.name)) {
        files.push(fullPath);
      }
    }
  }

  await scanDir(contentDir);
  return files.sort();
}

export function parsePost(raw: string, sourcePath: string): Post {
  if (!matter.test(raw)) {
    throw new ParseError('missing front-matter block (expected the document to start with ---)', sourcePath);
  }

  let data: unknown;
  let content: string;
  try {
    ({ data, content } = matter(raw, { engines: { yaml: parseFrontmatterYaml } }));
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new ParseError(`malformed front-matter: ${reason}`, sourcePath, { cause: err });
  }

  const parsed = PostFrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    throw new ParseError(describeIssues(parsed.error), sourcePath);
  }

  const slug = slugFromFilename(sourcePath);
  if (!slug) {
    throw new ParseError('file name does not produce a usable slug', sourcePath);
  }

  const { title, date, draft, excerpt } = parsed.data;
  const head = raw.endsWith(content) ? raw.slice(0, raw.length - content.length) : '';
  return Object.freeze({
    slug,
    title,
    date,
    draft,
    ...(excerpt !== undefined ? { excerpt } : {}),
    body: content,
    bodyLine: (head.match(/\n/g)?.length ?? 0) + 1,
    sourcePath,
  });
}

export async function loadPost(sourcePath: string): Promise<Post> {
  const raw = await fs.readFile(sourcePath, 'utf8');
  return parsePost(raw, sourcePath);
}

/**
 * Loads every post under `contentDir`. Files are read concurrently; the
 * result has no particular order (the site assembler sorts).
 */
export async function loadPosts(contentDir: string): Promise<Post[]> {
  const files = await discoverPostFiles(contentDir);
  return Promise.all(files.map(f => loadPost(f)));
}
