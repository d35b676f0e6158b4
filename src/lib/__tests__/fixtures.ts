import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseSiteConfig, type SiteConfig, type SiteConfigInput } from '../../config/site.js';
import type { Post } from '../../types/post.js';

/** Creates a throwaway project directory holding `files` (paths relative to it). */
export async function createProject(files: Record<string, string | Buffer> = {}): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-'));
  for (const [rel, contents] of Object.entries(files)) {
    const target = path.join(root, rel);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, contents);
  }
  return root;
}

export async function removeProject(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export function postSource(frontmatter: Record<string, string | boolean>, body = 'Some text.\n'): string {
  const lines = Object.entries(frontmatter).map(([key, value]) => `${key}: ${String(value)}`);
  return `---\n${lines.join('\n')}\n---\n${body}`;
}

export function makePost(overrides: Partial<Post> & { slug: string }): Post {
  return {
    title: overrides.slug,
    date: new Date('2024-01-01T00:00:00Z'),
    draft: false,
    body: 'Body\n',
    bodyLine: 5,
    sourcePath: `/content/${overrides.slug}.md`,
    ...overrides,
  };
}

export function testConfig(root: string, overrides: Partial<SiteConfigInput> = {}): SiteConfig {
  return parseSiteConfig(
    { siteName: 'Test Blog', description: 'Posts for tests', contentDir: 'content', outDir: 'out', publicDir: 'public', ...overrides },
    root,
  );
}

/** Smallest byte sequence image-size accepts as a PNG of the given dimensions. */
export function pngHeader(width: number, height: number): Buffer {
  const dims = Buffer.alloc(8);
  dims.writeUInt32BE(width, 0);
  dims.writeUInt32BE(height, 4);
  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    Buffer.from([0x00, 0x00, 0x00, 0x0d]),
    Buffer.from('IHDR', 'ascii'),
    dims,
    Buffer.from([0x08, 0x06, 0x00, 0x00, 0x00]),
    Buffer.alloc(4),
  ]);
}

/** Reads every file under `dir` into a map keyed by '/'-separated relative path. */
export async function readTree(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  async function walk(current: string): Promise<void> {
    for (const entry of await fs.readdir(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        out[path.relative(dir, full).split(path.sep).join('/')] = await fs.readFile(full, 'utf8');
      }
    }
  }
  await walk(dir);
  return out;
}
