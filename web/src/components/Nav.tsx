import React from 'react';
import type { Session } from '../auth/session';
import type { Page } from '../routes';

interface NavProps {
  page: Page;
  session: Session | null;
  onSignOut: () => void;
}

const LINKS: Array<{ page: Page; label: string; requiresSession: boolean }> = [
  { page: 'home', label: 'Home', requiresSession: false },
  { page: 'todos', label: 'Todos', requiresSession: false },
  { page: 'bookings', label: 'Bookings', requiresSession: true },
];

const Nav: React.FC<NavProps> = ({ page, session, onSignOut }) => (
  <nav>
    {LINKS.filter((link) => session || !link.requiresSession).map((link) => (
      <a
        key={link.page}
        href={`#/${link.page}`}
        aria-current={link.page === page ? 'page' : undefined}
      >
        {link.label}
      </a>
    ))}
    {session ? (
      <>
        <span className="user">{session.display_name}</span>
        <button type="button" onClick={onSignOut}>
          Sign out
        </button>
      </>
    ) : (
      <>
        <a href="#/signin">Sign in</a>
        <a href="#/signup">Sign up</a>
      </>
    )}
  </nav>
);

export default Nav;
