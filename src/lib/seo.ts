export interface PageMeta {
  title: string;
  description: string;
  canonical?: string;
  openGraph: {
    title: string;
    description: string;
    siteName: string;
    type: 'website' | 'article';
    publishedTime?: string;
  };
  twitter: {
    card: 'summary' | 'summary_large_image';
    title: string;
    description: string;
  };
}

interface BaseMeta {
  siteName: string;
  title?: string;
  description?: string;
  /** Absolute URL, only set when the site origin is configured. */
  canonical?: string;
  type?: 'website' | 'article';
  publishedTime?: Date;
}

export function buildMeta({ siteName, title, description, canonical, type = 'website', publishedTime }: BaseMeta): PageMeta {
  const fullTitle = title ? `${title} · ${siteName}` : siteName;
  const desc = description || siteName;
  return {
    title: fullTitle,
    description: desc,
    canonical,
    openGraph: {
      title: fullTitle,
      description: desc,
      siteName,
      type,
      publishedTime: publishedTime?.toISOString(),
    },
    twitter: {
      card: 'summary',
      title: fullTitle,
      description: desc,
    },
  };
}

/** Joins a site origin and a path without doubling the slash. */
export function absoluteUrl(siteUrl: string | undefined, pathname: string): string | undefined {
  if (!siteUrl) return undefined;
  return `${siteUrl.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`;
}
