import type { ReactNode } from 'react';
import type { PageMeta } from '../lib/seo.js';
import type { NavItem } from '../types/post.js';
import Nav from './Nav.js';

type SiteLayoutProps = {
  meta: PageMeta;
  siteName: string;
  homeHref: string;
  nav: NavItem[];
  currentPath?: string;
  children: ReactNode;
};

export default function SiteLayout({ meta, siteName, homeHref, nav, currentPath, children }: SiteLayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{meta.title}</title>
        <meta name="description" content={meta.description} />
        {meta.canonical && <link rel="canonical" href={meta.canonical} />}
        <meta property="og:title" content={meta.openGraph.title} />
        <meta property="og:description" content={meta.openGraph.description} />
        <meta property="og:site_name" content={meta.openGraph.siteName} />
        <meta property="og:type" content={meta.openGraph.type} />
        {meta.openGraph.publishedTime && <meta property="article:published_time" content={meta.openGraph.publishedTime} />}
        <meta name="twitter:card" content={meta.twitter.card} />
        <meta name="twitter:title" content={meta.twitter.title} />
        <meta name="twitter:description" content={meta.twitter.description} />
      </head>
      <body>
        <Nav siteName={siteName} homeHref={homeHref} items={nav} currentPath={currentPath} />
        <main className="container">
          {children}
        </main>
      </body>
    </html>
  );
}
