import fs from 'node:fs/promises';
import path from 'node:path';
import type { Site } from '../types/post.js';

/** Creates `outDir`, emptying it first when `clean` is set. */
export async function prepareOutDir(outDir: string, clean = false): Promise<void> {
  if (clean) {
    await fs.rm(outDir, { recursive: true, force: true });
  }
  await fs.mkdir(outDir, { recursive: true });
}

/**
 * Writes every page of `site` under `outDir`, creating directories as needed.
 * Returns the absolute paths written, in page order.
 */
export async function writeSite(site: Site, outDir: string): Promise<string[]> {
  await fs.mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const page of site.pages) {
    const target = path.join(outDir, ...page.path.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, page.contents, 'utf8');
    written.push(target);
  }
  return written;
}

/** Copies static assets (images, stylesheets) into the output. Returns false when there is nothing to copy. */
export async function copyPublicAssets(publicDir: string, outDir: string): Promise<boolean> {
  const stat = await fs.stat(publicDir).catch(() => undefined);
  if (!stat?.isDirectory()) return false;
  await fs.cp(publicDir, outDir, { recursive: true });
  return true;
}
