export type Post = {
  slug: string; // derived from the source filename, unique per build
  title: string;
  date: Date;
  draft: boolean;
  excerpt?: string; // inline markdown
  body: string; // markdown after the front-matter block
  bodyLine: number; // 1-based line of the source file where body starts
  sourcePath: string;
};

export type RenderedPage = {
  path: string; // relative to the output directory, '/' separated
  contents: string;
};

export type Site = {
  posts: Post[]; // included posts, in index order
  pages: RenderedPage[];
};

export type NavItem = { label: string; href: string };
