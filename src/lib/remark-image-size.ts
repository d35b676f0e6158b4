import fs from 'node:fs';
import path from 'node:path';
import type { Image, Root } from 'mdast';
import type { Plugin } from 'unified';
import { visit } from 'unist-util-visit';
import { imageSize } from 'image-size';
import type { Logger } from './logger.js';

export type RemarkImageSizeOptions = {
  publicDir: string;
  logger?: Logger;
};

/**
 * Maps a site-absolute image URL (`/images/cat.png?v=2`) to a file in `publicDir`.
 * Remote and relative URLs give undefined.
 */
export function resolvePublicImage(url: string, publicDir: string): string | undefined {
  if (!url.startsWith('/') || url.startsWith('//')) return undefined;
  const pathname = url.split(/[?#]/)[0];
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return undefined; // malformed escape, not a file we can find
  }
  const resolved = path.resolve(publicDir, `.${decoded}`);
  // keep lookups inside publicDir
  if (resolved !== publicDir && !resolved.startsWith(publicDir + path.sep)) return undefined;
  return resolved;
}

// Remark plugin: add width/height to Markdown images ![alt](/img.png) whose file
// exists under publicDir. Remote URLs: left as-is (can't pre-measure without fetch).

const remarkImageSize: Plugin<[RemarkImageSizeOptions], Root> = ({ publicDir, logger }) => (tree: Root) => {
  const root = path.resolve(publicDir);
  visit(tree, 'image', (node: Image) => {
    const imgPath = resolvePublicImage(node.url, root);
    if (!imgPath || !fs.existsSync(imgPath)) return;
    try {
      const { width, height } = imageSize(imgPath);
      if (!width || !height) return;
      node.data = {
        ...node.data,
        hProperties: { ...node.data?.hProperties, width, height },
      };
    } catch (err) {
      logger?.debug({ err, image: imgPath }, 'Could not measure image');
    }
  });
};

export default remarkImageSize;
