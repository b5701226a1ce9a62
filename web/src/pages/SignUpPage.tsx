import React, { useState } from 'react';
import type { ApiClient } from '../api/client';
import { Session, toSession } from '../auth/session';
import { errorMessage } from '../components/errors';
import FieldError from '../components/FieldError';

interface SignUpPageProps {
  client: Pick<ApiClient, 'signUp'>;
  onSignedIn: (session: Session) => void;
}

const SignUpPage: React.FC<SignUpPageProps> = ({ client, onSignedIn }) => {
  const [displayName, setDisplayName] = useState('');
  const [email, setEmail] = useState('');
  const [password, setPassword] = useState('');
  const [confirmPassword, setConfirmPassword] = useState('');
  const [error, setError] = useState<unknown>(null);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setError(null);
    try {
      const response = await client.signUp({
        email,
        password,
        confirm_password: confirmPassword,
        display_name: displayName || undefined,
        auto_login: true,
      });
      const session = toSession(response);
      if (!session) {
        throw new Error('Registration did not return a token');
      }
      onSignedIn(session);
    } catch (err) {
      setError(err);
    }
  };

  return (
    <section className="signup">
      <h1>Sign up</h1>
      <form aria-label="Sign up" onSubmit={(e) => void handleSubmit(e)}>
        <label>
          Display name
          <input value={displayName} onChange={(e) => setDisplayName(e.target.value)} />
          <FieldError error={error} field="display_name" />
        </label>
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
        <label>
          Confirm password
          <input
            type="password"
            value={confirmPassword}
            onChange={(e) => setConfirmPassword(e.target.value)}
          />
          <FieldError error={error} field="confirm_password" />
        </label>
        {error !== null && <p role="alert" className="error">{errorMessage(error)}</p>}
        <button type="submit">Create account</button>
      </form>
      <p>
        Already registered? <a href="#/signin">Sign in</a>
      </p>
    </section>
  );
};

export default SignUpPage;
