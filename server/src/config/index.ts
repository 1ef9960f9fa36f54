import dotenv from 'dotenv';
import type { AIProvider } from '@branching-stories/shared';

dotenv.config();

function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function optionalNumber(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = optional(key, defaultValue);
  const match = allowed.find(value => value === raw);
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

const AI_PROVIDERS = ['anthropic', 'openai', 'gemini'] as const satisfies readonly AIProvider[];
const STORAGE_DRIVERS = ['memory', 'dynamodb'] as const;

export type StorageDriver = (typeof STORAGE_DRIVERS)[number];

export const config = {
  // Server
  port: optionalNumber('PORT', 4000),
  nodeEnv: optional('NODE_ENV', 'development'),
  clientUrl: optional('CLIENT_URL', 'http://localhost:3000'),

  // AI Providers
  ai: {
    provider: oneOf('AI_PROVIDER', AI_PROVIDERS, 'openai'),
    anthropic: {
      apiKey: optional('ANTHROPIC_API_KEY', ''),
      model: optional('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
    },
    openai: {
      apiKey: optional('OPENAI_API_KEY', ''),
      baseUrl: optional('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    },
    gemini: {
      apiKey: optional('GOOGLE_AI_API_KEY', ''),
      model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    },
  },

  // Story generation
  generation: {
    temperature: optionalNumber('GENERATION_TEMPERATURE', 0.7),
    maxTokens: optionalNumber('GENERATION_MAX_TOKENS', 1000),
    maxAttempts: optionalNumber('GENERATION_MAX_ATTEMPTS', 2),
    retryDelayMs: optionalNumber('GENERATION_RETRY_DELAY_MS', 1000),
  },

  // Storage
  storage: {
    driver: oneOf('STORAGE_DRIVER', STORAGE_DRIVERS, 'memory'),
    tableName: optional('STORIES_TABLE_NAME', 'branching-stories'),
    region: optional('AWS_REGION', 'us-east-1'),
    endpoint: optional('DYNAMODB_ENDPOINT', ''),
  },
} as const;

export type Config = typeof config;
