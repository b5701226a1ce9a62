export const PAGES = ['home', 'todos', 'bookings', 'signin', 'signup'] as const;

export type Page = (typeof PAGES)[number];

/** Maps `#/todos` style hashes to a page; anything unknown is home. */
export function pageFromHash(hash: string): Page {
  const name = hash.replace(/^#\/?/, '').split(/[/?]/)[0];
  return PAGES.find((page) => page === name) ?? 'home';
}
