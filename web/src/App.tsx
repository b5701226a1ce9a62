import React, { useEffect, useState } from 'react';
import type { ApiClient } from './api/client';
import { clearSession, loadSession, saveSession, Session, SessionStorage } from './auth/session';
import Nav from './components/Nav';
import BookingsPage from './pages/BookingsPage';
import HomePage from './pages/HomePage';
import SignInPage from './pages/SignInPage';
import SignUpPage from './pages/SignUpPage';
import TodosPage from './pages/TodosPage';
import { Page, pageFromHash } from './routes';

interface AppProps {
  client: ApiClient;
  storage: SessionStorage;
}

const App: React.FC<AppProps> = ({ client, storage }) => {
  const [session, setSession] = useState<Session | null>(() => {
    const stored = loadSession(storage);
    client.setBearerToken(stored?.bearer_token);
    return stored;
  });
  const [page, setPage] = useState<Page>(() => pageFromHash(window.location.hash));

  useEffect(() => {
    client.setUnauthorizedHandler(() => {
      clearSession(storage);
      client.setBearerToken(undefined);
      setSession(null);
    });
    return () => client.setUnauthorizedHandler(undefined);
  }, [client, storage]);

  useEffect(() => {
    const onHashChange = () => setPage(pageFromHash(window.location.hash));
    window.addEventListener('hashchange', onHashChange);
    return () => window.removeEventListener('hashchange', onHashChange);
  }, []);

  const navigate = (next: Page) => {
    window.location.hash = `#/${next}`;
    setPage(next);
  };

  const handleSignedIn = (next: Session) => {
    saveSession(storage, next);
    client.setBearerToken(next.bearer_token);
    setSession(next);
    navigate('bookings');
  };

  const handleSignOut = () => {
    clearSession(storage);
    client.setBearerToken(undefined);
    setSession(null);
    navigate('home');
  };

  const renderPage = () => {
    switch (page) {
      case 'todos':
        return <TodosPage client={client} />;
      case 'bookings':
        return session ? (
          <BookingsPage client={client} session={session} />
        ) : (
          <SignInPage client={client} onSignedIn={handleSignedIn} />
        );
      case 'signin':
        return <SignInPage client={client} onSignedIn={handleSignedIn} />;
      case 'signup':
        return <SignUpPage client={client} onSignedIn={handleSignedIn} />;
      case 'home':
        return <HomePage client={client} />;
    }
  };

  return (
    <div className="app">
      <Nav page={page} session={session} onSignOut={handleSignOut} />
      <main>{renderPage()}</main>
    </div>
  );
};

export default App;
