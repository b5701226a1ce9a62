import React, { useState } from 'react';
import type { ApiClient } from '../api/client';
import { Session, toSession } from '../auth/session';
import { errorMessage } from '../components/errors';
import FieldError from '../components/FieldError';

interface SignInPageProps {
  client: Pick<ApiClient, 'signIn'>;
  onSignedIn: (session: Session) => void;
}

const SignInPage: React.FC<SignInPageProps> = ({ client, onSignedIn }) => {
  const [email, setEmail] = useState('');
  const [password, setPassword] = useState('');
  const [error, setError] = useState<unknown>(null);
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setError(null);
    setSubmitting(true);
    try {
      const session = toSession(await client.signIn({ email, password }));
      if (!session) {
        throw new Error('Sign in did not return a token');
      }
      onSignedIn(session);
    } catch (err) {
      setError(err);
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <section className="signin">
      <h1>Sign in</h1>
      <form aria-label="Sign in" onSubmit={(e) => void handleSubmit(e)}>
        <label>
          Email
          <input type="email" value={email} onChange={(e) => setEmail(e.target.value)} />
          <FieldError error={error} field="email" />
        </label>
        <label>
          Password
          <input type="password" value={password} onChange={(e) => setPassword(e.target.value)} />
          <FieldError error={error} field="password" />
        </label>
        {error !== null && <p role="alert" className="error">{errorMessage(error)}</p>}
        <button type="submit" disabled={submitting}>
          Sign in
        </button>
      </form>
      <p>
        No account? <a href="#/signup">Sign up</a>
      </p>
    </section>
  );
};

export default SignInPage;
