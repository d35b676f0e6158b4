import PostDate from './PostDate.js';

type BlogPostProps = {
  title: string;
  date: Date;
  draft: boolean;
  html: string;
  excerptHtml?: string;
};

export default function BlogPost({ title, date, draft, html, excerptHtml }: BlogPostProps) {
  return (
    <article className="card post">
      <h1>{title}</h1>
      <PostDate date={date} />
      {draft && <p className="badge">Draft</p>}
      {excerptHtml && <p className="excerpt" dangerouslySetInnerHTML={{ __html: excerptHtml }} />}
      <div className="prose" dangerouslySetInnerHTML={{ __html: html }} />
    </article>
  );
}
