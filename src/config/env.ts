import dotenv from 'dotenv';

dotenv.config();

export interface EnvConfig {
  PORT: number;
  HOST: string;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MONGODB_URL: string;
  DATABASE_NAME: string;
  OPENAI_API_KEY?: string;
  OPENAI_TEXT_MODEL: string;
  OPENAI_FILE_MODEL: string;
  GROQ_API_KEY?: string;
  GROQ_MODEL: string;
  GROQ_BASE_URL: string;
  ANTHROPIC_API_KEY?: string;
  ANTHROPIC_MODEL: string;
  AWS_ACCESS_KEY_ID?: string;
  AWS_SECRET_ACCESS_KEY?: string;
  AWS_REGION: string;
  S3_BUCKET_NAME?: string;
  CONFIG_API_KEY?: string;
  ADMIN_API_TOKEN?: string;
  JWT_SECRET_KEY?: string;
  MAX_UPLOAD_BYTES: number;
  UPLOAD_RATE_LIMIT_PER_MINUTE: number;
  SESSION_TTL_HOURS: number;
  PRESIGNED_URL_TTL_SECONDS: number;
  TRUST_PROXY_HOPS: number;
  PERSIST_RUNTIME_CONFIG: boolean;
  ENV_FILE_PATH: string;
}

function optional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name] ?? String(fallback);
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function nonNegativeInt(name: string, fallback: number): number {
  const raw = process.env[name] ?? String(fallback);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function validateEnv(): EnvConfig {
  const requiredEnvVars = ['MONGODB_URL'];

  for (const envVar of requiredEnvVars) {
    if (!process.env[envVar]) {
      throw new Error(`Missing required environment variable: ${envVar}`);
    }
  }

  return {
    PORT: positiveInt('PORT', 8000),
    HOST: process.env.HOST || '0.0.0.0',
    NODE_ENV: process.env.NODE_ENV || 'development',
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
    MONGODB_URL: process.env.MONGODB_URL || '',
    DATABASE_NAME: process.env.DATABASE_NAME || 'ats_checker',
    OPENAI_API_KEY: optional('OPENAI_API_KEY'),
    OPENAI_TEXT_MODEL: process.env.OPENAI_TEXT_MODEL || 'gpt-4o-mini',
    OPENAI_FILE_MODEL: process.env.OPENAI_FILE_MODEL || 'gpt-4o',
    GROQ_API_KEY: optional('GROQ_API_KEY'),
    GROQ_MODEL: process.env.GROQ_MODEL || 'llama-3.1-8b-instant',
    GROQ_BASE_URL: process.env.GROQ_BASE_URL || 'https://api.groq.com/openai/v1',
    ANTHROPIC_API_KEY: optional('ANTHROPIC_API_KEY'),
    ANTHROPIC_MODEL: process.env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-latest',
    AWS_ACCESS_KEY_ID: optional('AWS_ACCESS_KEY_ID'),
    AWS_SECRET_ACCESS_KEY: optional('AWS_SECRET_ACCESS_KEY'),
    AWS_REGION: process.env.AWS_REGION || 'us-east-1',
    S3_BUCKET_NAME: optional('S3_BUCKET_NAME'),
    CONFIG_API_KEY: optional('CONFIG_API_KEY'),
    ADMIN_API_TOKEN: optional('ADMIN_API_TOKEN'),
    JWT_SECRET_KEY: optional('JWT_SECRET_KEY'),
    MAX_UPLOAD_BYTES: positiveInt('MAX_UPLOAD_MB', 10) * 1024 * 1024,
    UPLOAD_RATE_LIMIT_PER_MINUTE: positiveInt('UPLOAD_RATE_LIMIT_PER_MINUTE', 30),
    SESSION_TTL_HOURS: positiveInt('SESSION_TTL_HOURS', 24),
    PRESIGNED_URL_TTL_SECONDS: positiveInt('PRESIGNED_URL_TTL_SECONDS', 3600),
    TRUST_PROXY_HOPS: nonNegativeInt('TRUST_PROXY_HOPS', 0),
    PERSIST_RUNTIME_CONFIG: (process.env.PERSIST_RUNTIME_CONFIG || 'true').toLowerCase() === 'true',
    ENV_FILE_PATH: process.env.ENV_FILE_PATH || '.env'
  };
}

export const env = validateEnv();
