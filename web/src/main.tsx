import React from 'react';
import ReactDOM from 'react-dom/client';
import { ApiClient } from './api/client';
import App from './App';

const apiBaseUrl = document.documentElement.dataset.apiBase ?? 'http://localhost:3000';
const root = document.getElementById('root');

if (!root) {
  throw new Error('Missing #root element');
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App client={new ApiClient({ baseUrl: apiBaseUrl })} storage={window.localStorage} />
  </React.StrictMode>,
);
