import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { RenderError } from '../errors.js';
import { getMarkdownOptions, renderExcerpt, renderMarkdown } from '../markdown.js';
import { resolvePublicImage } from '../remark-image-size.js';
import { createProject, pngHeader, removeProject } from './fixtures.js';

describe('renderMarkdown', () => {
  it('keeps fenced code text unmodified', async () => {
    const code = 'const add = (a, b) => a + b;\nconsole.log("sum", add(1, 2));';
    const html = await renderMarkdown(`Intro\n\n\`\`\`js\n${code}\n\`\`\`\n`);
    expect(html).toContain(`<pre><code class="language-js">${code}\n</code></pre>`);
  });

  it('escapes only what HTML requires inside code', async () => {
    const html = await renderMarkdown('```\nif (a < b && ok) {}\n```\n');
    expect(html).toContain('<pre><code>if (a &lt; b &amp;&amp; ok) {}\n</code></pre>');
  });

  it('passes inline raw HTML through byte-for-byte', async () => {
    const html = await renderMarkdown('Press <kbd>Ctrl</kbd> + <kbd>C</kbd>.\n');
    expect(html).toBe('<p>Press <kbd>Ctrl</kbd> + <kbd>C</kbd>.</p>');
  });

  it('passes block raw HTML through byte-for-byte', async () => {
    const block = "<div class='note'  data-x=1>Raw</div>";
    const html = await renderMarkdown(`${block}\n`);
    expect(html).toContain(block);
  });

  it('strips unsafe HTML when sanitizing', async () => {
    const html = await renderMarkdown('Hello\n\n<script>alert(1)</script>\n', { sanitize: true });
    expect(html).toContain('<p>Hello</p>');
    expect(html).not.toContain('alert');
  });

  it('adds anchors to headings', async () => {
    const html = await renderMarkdown('## Getting Started\n');
    expect(html).toContain('<h2 id="getting-started">');
    expect(html).toContain('<a href="#getting-started">Getting Started</a>');
  });

  it('supports GitHub-flavored tables', async () => {
    const html = await renderMarkdown('| a | b |\n| - | - |\n| 1 | 2 |\n');
    expect(html).toContain('<table>');
    expect(html).toContain('<td>1</td>');
  });

  describe('fences', () => {
    it('fails on an unterminated fence with file and line', async () => {
      const body = 'Text\n\n```ts\nconst x = 1;\n';
      const rendering = renderMarkdown(body, { filePath: '/posts/p.md', lineOffset: 4 });
      await expect(rendering).rejects.toBeInstanceOf(RenderError);
      await expect(renderMarkdown(body, { filePath: '/posts/p.md', lineOffset: 4 })).rejects.toMatchObject({
        filePath: '/posts/p.md',
        line: 7,
        message: '/posts/p.md:7: Unterminated code fence: ```ts is never closed',
      });
    });

    it('fails on an opening fence on the last line', async () => {
      await expect(renderMarkdown('Text\n\n~~~')).rejects.toBeInstanceOf(RenderError);
    });

    it('fails on a fence left open inside a blockquote', async () => {
      await expect(renderMarkdown('> ```\n> code\n\nAfter\n')).rejects.toBeInstanceOf(RenderError);
    });

    it('accepts longer closing fences, tilde fences and quoted fences', async () => {
      await expect(renderMarkdown('````\ncode\n`````\n')).resolves.toContain('<pre><code>code\n</code></pre>');
      await expect(renderMarkdown('~~~py\nprint(1)\n~~~\n')).resolves.toContain('print(1)');
      await expect(renderMarkdown('> ```\n> code\n> ```\n')).resolves.toContain('<blockquote>');
    });

    it('does not treat a shorter run as a closing fence', async () => {
      await expect(renderMarkdown('````\ncode\n```\n')).rejects.toBeInstanceOf(RenderError);
    });

    it('ignores indented code blocks', async () => {
      await expect(renderMarkdown('    indented\n')).resolves.toContain('<pre><code>indented\n</code></pre>');
    });
  });

  describe('images', () => {
    let root: string | undefined;

    afterEach(async () => {
      if (root) await removeProject(root);
      root = undefined;
    });

    it('measures local images found in the public directory', async () => {
      root = await createProject({ 'public/images/dot.png': pngHeader(40, 20) });
      const html = await renderMarkdown('![Dot](/images/dot.png)\n', { publicDir: path.join(root, 'public') });
      expect(html).toBe('<p><img src="/images/dot.png" alt="Dot" width="40" height="20"></p>');
    });

    it('leaves remote and missing images alone', async () => {
      root = await createProject({});
      const html = await renderMarkdown('![Remote](https://example.com/a.png) ![Gone](/images/gone.png)\n', {
        publicDir: path.join(root, 'public'),
      });
      expect(html).toBe('<p><img src="https://example.com/a.png" alt="Remote"> <img src="/images/gone.png" alt="Gone"></p>');
    });
  });
});

describe('resolvePublicImage', () => {
  const publicDir = path.resolve('/srv/public');

  it('maps site-absolute URLs into the public directory', () => {
    expect(resolvePublicImage('/images/a%20b.png?v=2', publicDir)).toBe(path.join(publicDir, 'images', 'a b.png'));
  });

  it('refuses URLs that are remote, relative or escape the directory', () => {
    expect(resolvePublicImage('//cdn.example.com/x.png', publicDir)).toBeUndefined();
    expect(resolvePublicImage('images/x.png', publicDir)).toBeUndefined();
    expect(resolvePublicImage('/../secret.png', publicDir)).toBeUndefined();
  });
});

describe('getMarkdownOptions', () => {
  it('only adds raw parsing and sanitizing on request', () => {
    expect(getMarkdownOptions().rehypePlugins).toHaveLength(2);
    expect(getMarkdownOptions({ sanitize: true }).rehypePlugins).toHaveLength(4);
  });

  it('only measures images when a public directory is given', () => {
    expect(getMarkdownOptions().remarkPlugins).toHaveLength(2);
    expect(getMarkdownOptions({ publicDir: '/srv/public' }).remarkPlugins).toHaveLength(3);
  });
});

describe('renderExcerpt', () => {
  it('renders inline Markdown without a paragraph wrapper', async () => {
    await expect(renderExcerpt('A *short* intro')).resolves.toBe('A <em>short</em> intro');
  });

  it('keeps raw HTML unless sanitizing', async () => {
    const excerpt = 'Hi <img src=x onerror=alert(1)>';
    await expect(renderExcerpt(excerpt)).resolves.toBe('Hi <img src=x onerror=alert(1)>');
    const sanitized = await renderExcerpt(excerpt, { sanitize: true });
    expect(sanitized).not.toContain('onerror');
    expect(sanitized).toBe('Hi <img src="x">');
  });

  it('keeps inline formatting when sanitizing', async () => {
    await expect(renderExcerpt('A *short* intro', { sanitize: true })).resolves.toBe('A <em>short</em> intro');
  });
});
