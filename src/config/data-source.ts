import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { env } from './env';
import { User } from '../entities/User';
import { Session } from '../entities/Session';
import { Resume } from '../entities/Resume';

export const AppDataSource = new DataSource({
  type: 'mongodb',
  url: env.MONGODB_URL,
  database: env.DATABASE_NAME,
  entities: [User, Session, Resume],
  // Builds the declared indexes; MongoDB has no schema to migrate
  synchronize: true,
  logging: env.NODE_ENV === 'development'
});
