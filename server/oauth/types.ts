/**
 * OAuth Session Type Definitions
 */

import { z } from 'zod';

/**
 * The authenticated principal as described by the provider
 */
export interface Identity {
  readonly id: string;
  readonly login: string;
  readonly name?: string;
  readonly email?: string;
  readonly avatarUrl?: string;
  readonly bio?: string;
  readonly company?: string;
  readonly location?: string;
  readonly createdAt?: string;
}

export interface StateToken {
  value: string;
  issuedAt: number;
}

/**
 * Token endpoint result, held only for the duration of a callback
 */
export interface AccessToken {
  accessToken: string;
  tokenType: string;
  scope: string;
}

/**
 * Server-side session record. The access token stays inside the session store.
 */
export interface Session {
  readonly id: string;
  readonly identity: Identity;
  readonly accessToken: string;
  readonly tokenType: string;
  readonly scope: string;
  readonly createdAt: Date;
}

/**
 * Caller-facing projection of a session (everything but the access token)
 */
export type SessionView = Omit<Session, 'accessToken'>;

export type AuthStatus =
  | { authenticated: false }
  | { authenticated: true; session: SessionView };

export interface LogoutResult {
  loggedOut: boolean;
  login?: string;
}

export function toSessionView(session: Session): SessionView {
  return {
    id: session.id,
    identity: session.identity,
    tokenType: session.tokenType,
    scope: session.scope,
    createdAt: session.createdAt,
  };
}

const nullableString = z
  .string()
  .nullish()
  .transform((value) => (value === null || value === '' ? undefined : value));

/**
 * GitHub `GET /user` response (only the fields we keep)
 */
export const gitHubUserSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  login: z.string().min(1),
  name: nullableString,
  email: nullableString,
  avatar_url: nullableString,
  bio: nullableString,
  company: nullableString,
  location: nullableString,
  created_at: nullableString,
});

export type GitHubUser = z.infer<typeof gitHubUserSchema>;

export function identityFromGitHubUser(user: GitHubUser): Identity {
  return Object.freeze({
    id: user.id,
    login: user.login,
    name: user.name,
    email: user.email,
    avatarUrl: user.avatar_url,
    bio: user.bio,
    company: user.company,
    location: user.location,
    createdAt: user.created_at,
  });
}

/**
 * GitHub token endpoint response. GitHub answers HTTP 200 with an `error`
 * field when the code is bad, so both shapes are accepted here.
 */
export const gitHubTokenResponseSchema = z.object({
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});
