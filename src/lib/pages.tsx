import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { SiteConfig } from '../config/site.js';
import BlogIndex, { type IndexEntry } from '../components/BlogIndex.js';
import BlogPost from '../components/BlogPost.js';
import SiteLayout from '../components/SiteLayout.js';
import type { Post } from '../types/post.js';
import { indexHref, navItems, postHref } from './routes.js';
import { absoluteUrl, buildMeta } from './seo.js';

export type PageSettings = Pick<SiteConfig, 'siteName' | 'description' | 'basePath' | 'siteUrl' | 'nav'>;

export function renderDocument(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}\n`;
}

export function renderIndexPage(entries: IndexEntry[], settings: PageSettings): string {
  const home = indexHref(settings.basePath);
  const meta = buildMeta({
    siteName: settings.siteName,
    description: settings.description,
    canonical: absoluteUrl(settings.siteUrl, home),
  });
  return renderDocument(
    <SiteLayout meta={meta} siteName={settings.siteName} homeHref={home} nav={navItems(settings.basePath, settings.nav)} currentPath={home}>
      <BlogIndex heading={settings.siteName} description={settings.description} entries={entries} />
    </SiteLayout>,
  );
}

export function renderPostPage(post: Post, html: string, excerptHtml: string | undefined, settings: PageSettings): string {
  const home = indexHref(settings.basePath);
  const href = postHref(post.slug, settings.basePath);
  const meta = buildMeta({
    siteName: settings.siteName,
    title: post.title,
    description: post.excerpt || post.title,
    canonical: absoluteUrl(settings.siteUrl, href),
    type: 'article',
    publishedTime: post.date,
  });
  return renderDocument(
    <SiteLayout meta={meta} siteName={settings.siteName} homeHref={home} nav={navItems(settings.basePath, settings.nav)} currentPath={href}>
      <BlogPost title={post.title} date={post.date} draft={post.draft} html={html} excerptHtml={excerptHtml} />
    </SiteLayout>,
  );
}
