import PostDate from './PostDate.js';

export type IndexEntry = {
  slug: string;
  title: string;
  date: Date;
  href: string;
  draft: boolean;
  excerptHtml?: string;
};

type BlogIndexProps = {
  heading: string;
  description?: string;
  entries: IndexEntry[];
};

export default function BlogIndex({ heading, description, entries }: BlogIndexProps) {
  return (
    <section className="post-index">
      <div className="card">
        <h1>{heading}</h1>
        {description && <p className="muted">{description}</p>}
      </div>

      {entries.length === 0 ? (
        <p className="muted">No posts yet.</p>
      ) : (
        <ul className="post-list">
          {entries.map((p) => (
            <li key={p.slug} className="card" data-slug={p.slug}>
              <h2>
                <a href={p.href}>{p.title}</a>
                {p.draft && <span className="badge">Draft</span>}
              </h2>
              <PostDate date={p.date} />
              {p.excerptHtml && <p className="excerpt" dangerouslySetInnerHTML={{ __html: p.excerptHtml }} />}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
