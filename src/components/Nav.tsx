import type { NavItem } from '../types/post.js';

type NavProps = {
  siteName: string;
  homeHref: string;
  items: NavItem[];
  currentPath?: string;
};

export default function Nav({ siteName, homeHref, items, currentPath }: NavProps) {
  return (
    <header className="site-header">
      <div className="container">
        <a href={homeHref} className="site-title">{siteName}</a>
        <nav>
          {items.map((r) => {
            const active = currentPath === r.href;
            return (
              <a key={r.href} href={r.href} aria-current={active ? 'page' : undefined} className={active ? 'nav-link active' : 'nav-link'}>
                {r.label}
              </a>
            );
          })}
        </nav>
      </div>
    </header>
  );
}
