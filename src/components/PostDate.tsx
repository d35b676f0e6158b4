/** Calendar date in UTC, e.g. 2024-05-01. Independent of the build machine's locale and zone. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export default function PostDate({ date }: { date: Date }) {
  return <time className="post-date" dateTime={date.toISOString()}>{formatDate(date)}</time>;
}
