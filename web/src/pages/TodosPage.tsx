import React, { useEffect, useState } from 'react';
import type { Todo } from '../../../src/todo/entities/todo.entity';
import type { ApiClient } from '../api/client';
import { errorMessage } from '../components/errors';

export type TodosApi = Pick<
  ApiClient,
  'queryTodos' | 'createTodo' | 'updateTodo' | 'deleteTodo' | 'deleteTodos'
>;

type Filter = 'all' | 'active' | 'finished';

const FILTERS: Array<{ value: Filter; label: string }> = [
  { value: 'all', label: 'All' },
  { value: 'active', label: 'Active' },
  { value: 'finished', label: 'Finished' },
];

interface TodosPageProps {
  client: TodosApi;
}

const TodosPage: React.FC<TodosPageProps> = ({ client }) => {
  const [todos, setTodos] = useState<Todo[]>([]);
  const [text, setText] = useState('');
  const [filter, setFilter] = useState<Filter>('all');
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let active = true;
    client
      .queryTodos()
      .then((response) => {
        if (active) setTodos(response.results);
      })
      .catch((err: unknown) => {
        if (active) setError(errorMessage(err));
      });
    return () => {
      active = false;
    };
  }, [client]);

  const run = async (action: () => Promise<void>) => {
    setError(null);
    try {
      await action();
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  const handleAdd = (event: React.FormEvent) => {
    event.preventDefault();
    const trimmed = text.trim();
    if (!trimmed) return;

    void run(async () => {
      const todo = await client.createTodo({ text: trimmed });
      setTodos((current) => [...current, todo]);
      setText('');
    });
  };

  const handleToggle = (todo: Todo) =>
    run(async () => {
      const updated = await client.updateTodo(todo.id, { is_finished: !todo.is_finished });
      setTodos((current) => current.map((t) => (t.id === updated.id ? updated : t)));
    });

  const handleDelete = (todo: Todo) =>
    run(async () => {
      await client.deleteTodo(todo.id);
      setTodos((current) => current.filter((t) => t.id !== todo.id));
    });

  const handleClearFinished = () =>
    run(async () => {
      const finishedIds = todos.filter((t) => t.is_finished).map((t) => t.id);
      if (finishedIds.length === 0) return;
      await client.deleteTodos(finishedIds);
      setTodos((current) => current.filter((t) => !finishedIds.includes(t.id)));
    });

  const visible = todos.filter((todo) =>
    filter === 'all' ? true : filter === 'finished' ? todo.is_finished : !todo.is_finished,
  );
  const remaining = todos.filter((t) => !t.is_finished).length;

  return (
    <section className="todos">
      <h1>Todos</h1>

      {error && <p role="alert" className="error">{error}</p>}

      <form aria-label="Add todo" onSubmit={handleAdd}>
        <input
          type="text"
          placeholder="What needs to be done?"
          value={text}
          onChange={(e) => setText(e.target.value)}
        />
        <button type="submit">Add</button>
      </form>

      <ul>
        {visible.map((todo) => (
          <li key={todo.id} className={todo.is_finished ? 'finished' : undefined}>
            <input
              type="checkbox"
              aria-label={`Toggle ${todo.text}`}
              checked={todo.is_finished}
              onChange={() => void handleToggle(todo)}
            />
            <span>{todo.text}</span>
            <button type="button" aria-label={`Delete ${todo.text}`} onClick={() => void handleDelete(todo)}>
              ×
            </button>
          </li>
        ))}
      </ul>

      <footer>
        <span>{remaining === 1 ? '1 item left' : `${remaining} items left`}</span>
        {FILTERS.map(({ value, label }) => (
          <button
            key={value}
            type="button"
            aria-pressed={filter === value}
            onClick={() => setFilter(value)}
          >
            {label}
          </button>
        ))}
        <button type="button" onClick={() => void handleClearFinished()}>
          Clear finished
        </button>
      </footer>
    </section>
  );
};

export default TodosPage;
