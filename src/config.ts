/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are read and validated here. `loadConfig` builds
 * one immutable config value at startup which is then handed to each
 * component; nothing else reads `process.env`.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';
import { ConfigError } from './utils/errors.js';

export type RelayMode = 'individual' | 'combined';

export interface MailAccountConfig {
  address: string;
  password: string;
}

export interface AppConfig {
  nodeEnv: string;
  mode: RelayMode;
  account: MailAccountConfig;
  /** Digits only; required in individual mode. */
  targetPhone: string | undefined;
  anthropicApiKey: string;
  imap: { host: string; port: number };
  smtp: { host: string; port: number };
  classifier: { modelId: string; maxTokens: number };
  fetchLimit: number;
  store: { sqlitePath: string; routeRecords: boolean };
  reply: { subject: string; confirmation: string };
  carriersFile: string;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Config helpers: required vs optional
// ---------------------------------------------------------------------------

/** Read a required env var. Returns '' if missing (caught by validateConfig). */
function required(env: Env, key: string): string {
  return env[key]?.trim() ?? '';
}

/** Read an optional string env var with a default. */
function optional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/** Read an optional integer env var with a default. Anything but an integer becomes NaN for validateConfig. */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key]?.trim();
  if (!raw) return defaultValue;
  return /^-?\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return defaultValue;
  return raw.toLowerCase() === 'true' || raw === '1';
}

/** Return a path that differs between dev and production. */
function dbPath(env: Env, envKey: string, prodPath: string, devPath: string): string {
  return env[envKey] || (env.NODE_ENV === 'production' ? prodPath : devPath);
}

function parseMode(raw: string): RelayMode | undefined {
  return raw === 'individual' || raw === 'combined' ? raw : undefined;
}

function normalizePhone(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  return trimmed.replace(/^\+/, '');
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Build the config from the environment and validate it.
 * Throws ConfigError naming every missing or invalid value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawMode = optional(env, 'RELAY_MODE', 'individual');
  const mode = parseMode(rawMode);
  if (!mode) {
    throw new ConfigError([`RELAY_MODE must be "individual" or "combined", got "${rawMode}"`]);
  }

  const config: AppConfig = {
    nodeEnv: optional(env, 'NODE_ENV', 'development'),
    mode,
    account: {
      address: required(env, 'EMAIL_ADDRESS'),
      password: required(env, 'EMAIL_PASSWORD'),
    },
    targetPhone: normalizePhone(env.TARGET_PHONE_NUMBER),
    anthropicApiKey: required(env, 'ANTHROPIC_API_KEY'),
    imap: {
      host: optional(env, 'IMAP_HOST', 'imap.gmail.com'),
      port: optionalInt(env, 'IMAP_PORT', 993),
    },
    smtp: {
      host: optional(env, 'SMTP_HOST', 'smtp.gmail.com'),
      port: optionalInt(env, 'SMTP_PORT', 587),
    },
    classifier: {
      modelId: optional(env, 'CLASSIFIER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
      maxTokens: optionalInt(env, 'CLASSIFIER_MAX_TOKENS', 512),
    },
    fetchLimit: optionalInt(env, 'FETCH_LIMIT', 10),
    store: {
      sqlitePath: dbPath(env, 'MESSAGE_DB_PATH', '/app/data/assistant.db', './data/assistant.db'),
      routeRecords: optionalBool(env, 'ROUTE_RECORDS', true),
    },
    reply: {
      subject: optional(env, 'REPLY_SUBJECT', ''),
      confirmation: optional(env, 'CONFIRMATION_MESSAGE', 'Got it! Your message has been logged.'),
    },
    carriersFile: optional(env, 'CARRIERS_FILE', './config/carriers.json'),
  };

  validateConfig(config);
  return config;
}

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!config.account.address) errors.push('EMAIL_ADDRESS is required');
  if (!config.account.password) errors.push('EMAIL_PASSWORD is required');
  if (!config.anthropicApiKey) errors.push('ANTHROPIC_API_KEY is required');

  if (config.mode === 'individual') {
    if (!config.targetPhone) {
      errors.push('TARGET_PHONE_NUMBER is required when RELAY_MODE=individual');
    } else if (!/^\d+$/.test(config.targetPhone)) {
      errors.push(`TARGET_PHONE_NUMBER must contain only digits, got "${config.targetPhone}"`);
    }
  }

  // Numeric bounds
  for (const [name, port] of [['IMAP_PORT', config.imap.port], ['SMTP_PORT', config.smtp.port]] as const) {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`${name} must be 1-65535, got ${port}`);
    }
  }
  if (!Number.isInteger(config.fetchLimit) || config.fetchLimit < 1 || config.fetchLimit > 100) {
    errors.push(`FETCH_LIMIT must be 1-100, got ${config.fetchLimit}`);
  }
  if (!Number.isInteger(config.classifier.maxTokens) || config.classifier.maxTokens < 1) {
    errors.push(`CLASSIFIER_MAX_TOKENS must be >= 1, got ${config.classifier.maxTokens}`);
  }
  if (!config.reply.confirmation.trim()) {
    errors.push('CONFIRMATION_MESSAGE must not be empty');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}
