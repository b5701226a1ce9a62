import React, { useEffect, useState } from 'react';
import type { ApiClient } from '../api/client';
import { errorMessage } from '../components/errors';

interface HomePageProps {
  client: Pick<ApiClient, 'hello'>;
}

const HomePage: React.FC<HomePageProps> = ({ client }) => {
  const [name, setName] = useState('World');
  const [greeting, setGreeting] = useState('');

  useEffect(() => {
    if (!name.trim()) {
      setGreeting('');
      return;
    }
    let active = true;
    client
      .hello(name)
      .then((response) => {
        if (active) setGreeting(response.result);
      })
      .catch((err: unknown) => {
        if (active) setGreeting(errorMessage(err));
      });
    return () => {
      active = false;
    };
  }, [client, name]);

  return (
    <section className="home">
      <h1>Bookings starter</h1>
      <label>
        Name
        <input value={name} onChange={(e) => setName(e.target.value)} />
      </label>
      <p aria-live="polite">{greeting}</p>
      <ul>
        <li>
          <a href="#/todos">Todo list</a>, stored in memory on the server
        </li>
        <li>
          <a href="#/bookings">Bookings</a>, for signed in staff
        </li>
      </ul>
    </section>
  );
};

export default HomePage;
