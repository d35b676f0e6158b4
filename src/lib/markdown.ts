import { marked } from 'marked';
import rehypeAutolinkHeadings from 'rehype-autolink-headings';
import rehypeParse from 'rehype-parse';
import rehypeRaw from 'rehype-raw';
import rehypeSanitize from 'rehype-sanitize';
import rehypeSlug from 'rehype-slug';
import rehypeStringify from 'rehype-stringify';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import remarkRehype from 'remark-rehype';
import { unified, type PluggableList } from 'unified';
import { VFile } from 'vfile';
import { VFileMessage } from 'vfile-message';
import { RenderError } from './errors.js';
import type { Logger } from './logger.js';
import remarkFenceGuard from './remark-fence-guard.js';
import remarkImageSize from './remark-image-size.js';

export type MarkdownOptions = {
  /** Parse raw HTML and strip anything unsafe. Off by default: raw HTML is copied through untouched. */
  sanitize?: boolean;
  /** Directory that site-absolute image URLs resolve against for measuring. */
  publicDir?: string;
  logger?: Logger;
};

export type RenderOptions = MarkdownOptions & {
  /** Reported in errors. */
  filePath?: string;
  /** Lines preceding the body in its source file (the front-matter block). */
  lineOffset?: number;
};

export function getMarkdownOptions(opts: MarkdownOptions = {}): { remarkPlugins: PluggableList; rehypePlugins: PluggableList } {
  const remarkPlugins: PluggableList = [remarkGfm, remarkFenceGuard];
  if (opts.publicDir) {
    remarkPlugins.push([remarkImageSize, { publicDir: opts.publicDir, logger: opts.logger }]);
  }
  return {
    remarkPlugins,
    rehypePlugins: [
      ...(opts.sanitize ? [rehypeRaw, rehypeSanitize] : []),
      rehypeSlug,
      [rehypeAutolinkHeadings, { behavior: 'wrap' }],
    ],
  };
}

/**
 * Renders a post body to an HTML fragment.
 *
 * Code blocks keep their text exactly (only `<` and `&` are escaped). Raw HTML
 * is emitted verbatim unless `sanitize` is set.
 */
export async function renderMarkdown(body: string, opts: RenderOptions = {}): Promise<string> {
  const { remarkPlugins, rehypePlugins } = getMarkdownOptions(opts);
  const filePath = opts.filePath ?? '<input>';
  const file = new VFile({ path: filePath, value: body });

  const processor = unified()
    .use(remarkParse)
    .use(remarkPlugins)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypePlugins)
    .use(rehypeStringify, { allowDangerousHtml: true });

  try {
    const result = await processor.process(file);
    return String(result);
  } catch (err) {
    if (err instanceof VFileMessage) {
      const line = err.line === undefined ? undefined : err.line + (opts.lineOffset ?? 0);
      throw new RenderError(err.reason, filePath, line, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new RenderError(reason, filePath, undefined, { cause: err });
  }
}

/** Renders a one-line excerpt (inline Markdown only) for listings. */
export async function renderExcerpt(excerpt: string, opts: Pick<MarkdownOptions, 'sanitize'> = {}): Promise<string> {
  const html = await marked.parseInline(excerpt, { gfm: true });
  if (!opts.sanitize) return html;

  const file = await unified()
    .use(rehypeParse, { fragment: true })
    .use(rehypeSanitize)
    .use(rehypeStringify)
    .process(html);
  return String(file);
}
