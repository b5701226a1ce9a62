import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DataSourceOptions } from 'typeorm';
import { User } from '../auth/entities/user.entity';
import { Booking } from '../booking/entities/booking.entity';

export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env.DB_HOST ?? 'localhost',
  port: process.env.DB_PORT ? parseInt(process.env.DB_PORT, 10) : 5432,
  username: process.env.DB_USERNAME ?? 'postgres',
  password: process.env.DB_PASSWORD ?? 'postgres',
  database: process.env.DB_DATABASE ?? 'bookings',
  entities: [User, Booking],
  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  logging: process.env.DB_LOGGING === 'true',
  migrations: [__dirname + '/../migrations/**/*{.ts,.js}'],
  migrationsRun: process.env.DB_MIGRATIONS_RUN !== 'false',
};

export const databaseConfig: TypeOrmModuleOptions = {
  ...dataSourceOptions,
  retryAttempts: process.env.DB_RETRY_ATTEMPTS
    ? parseInt(process.env.DB_RETRY_ATTEMPTS, 10)
    : 9,
};
