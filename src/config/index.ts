import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, CredentialResolver } from '../core/interfaces';
import {
  AdvisorIdentity,
  AdvisorIdentitySchema,
  AppConfig,
  LogLevel,
  MAX_TIMEOUT_MS,
  ProviderKind,
  RejectedAdvisorEntry
} from '../types';

export const DEFAULT_TIMEOUT_MS = 60000;

interface DefaultAdvisor {
  name: string;
  provider: ProviderKind;
  credentialRef: string;
  modelEnv: string;
  model: string;
}

// One advisor per provider kind when no ADVISORS_FILE is given
const DEFAULT_ADVISORS: DefaultAdvisor[] = [
  { name: 'Claude', provider: 'claude', credentialRef: 'CLAUDE_API_KEY', modelEnv: 'CLAUDE_MODEL', model: 'claude-sonnet-4-5' },
  { name: 'Gemini', provider: 'gemini', credentialRef: 'GEMINI_API_KEY', modelEnv: 'GEMINI_MODEL', model: 'gemini-2.5-pro' },
  { name: 'Grok', provider: 'grok', credentialRef: 'GROK_API_KEY', modelEnv: 'GROK_MODEL', model: 'grok-4' },
  { name: 'OpenAI', provider: 'openai', credentialRef: 'OPENAI_API_KEY', modelEnv: 'OPENAI_MODEL', model: 'gpt-4o' }
];

// Entries in an advisors file may leave the timeout to ADVISOR_TIMEOUT_MS
const AdvisorFileEntrySchema = AdvisorIdentitySchema.extend({
  config: AdvisorIdentitySchema.shape.config.extend({
    timeoutMs: AdvisorIdentitySchema.shape.config.shape.timeoutMs.optional()
  })
});

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Loads `.env` from the working directory into process.env. Variables that
 * are already set win.
 */
export function loadEnvironment(envPath: string = path.join(process.cwd(), '.env')): void {
  dotenv.config({ path: envPath });
}

export const envCredentialResolver: CredentialResolver = (credentialRef) => {
  const value = process.env[credentialRef];
  return value && value.trim() ? value.trim() : undefined;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaultTimeoutMs = parseTimerDelay(env.ADVISOR_TIMEOUT_MS, 'ADVISOR_TIMEOUT_MS', DEFAULT_TIMEOUT_MS);

  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL ?? 'info');
  if (!logLevel.success) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}`, { value: env.LOG_LEVEL });
  }

  const { advisors, rejectedAdvisors } = env.ADVISORS_FILE
    ? readAdvisorsFile(env.ADVISORS_FILE, defaultTimeoutMs)
    : { advisors: defaultAdvisors(env, defaultTimeoutMs), rejectedAdvisors: [] };

  return {
    advisors,
    rejectedAdvisors,
    defaultTimeoutMs,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: logLevel.data satisfies LogLevel
  };
}

export function validateConfig(config: AppConfig): void {
  const seen = new Set<string>();

  for (const advisor of config.advisors) {
    if (seen.has(advisor.name)) {
      throw new ConfigurationError(`Duplicate advisor name: ${advisor.name}`, { name: advisor.name });
    }
    seen.add(advisor.name);

    if (!isTimerDelay(advisor.config.timeoutMs)) {
      throw new ConfigurationError(`Timeout for ${advisor.name} must be a positive integer up to ${MAX_TIMEOUT_MS}`, {
        name: advisor.name,
        timeoutMs: advisor.config.timeoutMs
      });
    }
  }

  if (config.advisors.length === 0) {
    throw new ConfigurationError('No valid advisors are configured', {
      rejected: config.rejectedAdvisors.length
    });
  }
}

function defaultAdvisors(env: NodeJS.ProcessEnv, timeoutMs: number): AdvisorIdentity[] {
  return DEFAULT_ADVISORS.map((advisor) => ({
    name: advisor.name,
    provider: advisor.provider,
    config: {
      model: env[advisor.modelEnv] || advisor.model,
      credentialRef: advisor.credentialRef,
      timeoutMs
    }
  }));
}

function readAdvisorsFile(
  filePath: string,
  defaultTimeoutMs: number
): { advisors: AdvisorIdentity[]; rejectedAdvisors: RejectedAdvisorEntry[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path.resolve(filePath), 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read advisors file ${filePath}`, {
      error: error instanceof Error ? error.message : 'Unknown error'
    });
  }

  if (!Array.isArray(raw)) {
    throw new ConfigurationError(`Advisors file ${filePath} must contain a JSON array`);
  }

  const advisors: AdvisorIdentity[] = [];
  const rejectedAdvisors: RejectedAdvisorEntry[] = [];

  raw.forEach((entry: unknown, index) => {
    const parsed = AdvisorFileEntrySchema.safeParse(entry);
    if (!parsed.success) {
      const name = typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string'
        ? entry.name
        : undefined;
      rejectedAdvisors.push({
        index,
        name,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
      return;
    }

    advisors.push({
      ...parsed.data,
      config: { ...parsed.data.config, timeoutMs: parsed.data.config.timeoutMs ?? defaultTimeoutMs }
    });
  });

  return { advisors, rejectedAdvisors };
}

function isTimerDelay(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_TIMEOUT_MS;
}

function parseTimerDelay(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!isTimerDelay(parsed)) {
    throw new ConfigurationError(`${name} must be a positive integer up to ${MAX_TIMEOUT_MS}`, { value });
  }
  return parsed;
}
