import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { dataSourceOptions } from './database.config';

// Used by the typeorm CLI (`npm run migration:run`).
export default new DataSource(dataSourceOptions);
