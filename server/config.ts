/**
 * Server Configuration
 *
 * Parses process.env into a typed config object. The GitHub OAuth
 * credentials are optional at boot: a server without them still serves
 * the travel tools, and login attempts report a ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from './oauth/errors.js';

const DEFAULT_SCOPES = 'read:user user:email';

export const SERVICE_NAME = 'travel-itinerary-mcp';
export const SERVICE_VERSION = '1.0.0';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  BASE_URL: z.string().url().default('http://localhost:8000'),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
  GITHUB_CLIENT_ID: optionalString,
  GITHUB_CLIENT_SECRET: optionalString,
  GITHUB_REDIRECT_URI: optionalString,
  GITHUB_SCOPES: z.string().default(DEFAULT_SCOPES),
  OAUTH_STATE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  OAUTH_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WEATHER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

// Parsed on its own so error reporting starts even when the rest of the
// environment is malformed
const sentryEnvSchema = z.object({
  SENTRY_DSN: optionalString,
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).catch(1),
  NODE_ENV: optionalString,
});

export interface SentrySettings {
  dsn: string | undefined;
  enabled: boolean;
  environment: string;
  release: string;
  tracesSampleRate: number;
}

export interface GitHubOAuthSettings {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  scopes: string[];
}

export interface ServerConfig {
  port: number;
  baseUrl: string;
  transport: 'http' | 'stdio';
  github: GitHubOAuthSettings;
  stateTtlMs: number;
  oauthTimeoutMs: number;
  weatherTimeoutMs: number;
}

/**
 * Fully-populated GitHub OAuth credentials
 */
export interface GitHubConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
}

/**
 * Load server configuration from an environment map
 * @throws ZodError when a variable is present but malformed (e.g. PORT=abc)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);

  return {
    port: parsed.PORT,
    baseUrl: parsed.BASE_URL.replace(/\/+$/, ''),
    transport: parsed.MCP_TRANSPORT,
    github: {
      clientId: parsed.GITHUB_CLIENT_ID,
      clientSecret: parsed.GITHUB_CLIENT_SECRET,
      redirectUri: parsed.GITHUB_REDIRECT_URI,
      scopes: parsed.GITHUB_SCOPES.split(/\s+/).filter(Boolean),
    },
    stateTtlMs: parsed.OAUTH_STATE_TTL_MS,
    oauthTimeoutMs: parsed.OAUTH_HTTP_TIMEOUT_MS,
    weatherTimeoutMs: parsed.WEATHER_HTTP_TIMEOUT_MS,
  };
}

/**
 * Error-reporting settings; Sentry stays disabled without SENTRY_DSN
 */
export function loadSentrySettings(env: NodeJS.ProcessEnv = process.env): SentrySettings {
  const parsed = sentryEnvSchema.parse(env);
  return {
    dsn: parsed.SENTRY_DSN,
    enabled: parsed.SENTRY_DSN !== undefined,
    environment: parsed.NODE_ENV ?? 'development',
    release: `${SERVICE_NAME}@${SERVICE_VERSION}`,
    tracesSampleRate: parsed.SENTRY_TRACES_SAMPLE_RATE,
  };
}

/**
 * Narrow optional GitHub settings to a complete credential set
 * @throws ConfigurationError naming every missing variable
 */
export function requireGitHubConfig(settings: GitHubOAuthSettings): GitHubConfig {
  const missing: string[] = [];
  if (!settings.clientId) missing.push('GITHUB_CLIENT_ID');
  if (!settings.clientSecret) missing.push('GITHUB_CLIENT_SECRET');
  if (!settings.redirectUri) missing.push('GITHUB_REDIRECT_URI');

  if (!settings.clientId || !settings.clientSecret || !settings.redirectUri) {
    throw new ConfigurationError(
      'Missing GitHub OAuth configuration. Please set:\n' +
        missing.map((name) => `- ${name}`).join('\n'),
      missing,
    );
  }

  return {
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    redirectUri: settings.redirectUri,
    scopes: settings.scopes,
  };
}
