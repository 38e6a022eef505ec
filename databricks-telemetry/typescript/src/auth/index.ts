/**
 * Credentials for authenticated telemetry delivery.
 *
 * Telemetry reuses the connection's personal access token. When no token can be
 * resolved, the pipeline falls back to the unauthenticated endpoint.
 *
 * @example
 * ```typescript
 * const provider = resolveAuthProvider(context);
 * const header = await provider.getAuthorizationHeader();
 * ```
 */

import { getProperty, type ConnectionContext } from '../config/index.js';
import { InvalidArgument, MissingCredentials } from '../errors/index.js';

// ============================================================================
// Secure Token Handling
// ============================================================================

/**
 * SecretString class for secure handling of sensitive tokens.
 * Prevents accidental logging or serialization of secrets.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    if (!value || value.trim() === '') {
      throw new InvalidArgument('SecretString cannot be empty');
    }
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toJSON(): string {
    return '***REDACTED***';
  }

  toString(): string {
    return '***REDACTED***';
  }
}

// ============================================================================
// Providers
// ============================================================================

export interface AuthProvider {
  /**
   * Value for the Authorization header of a telemetry request
   */
  getAuthorizationHeader(): Promise<string>;
}

/**
 * Bearer authentication with a fixed personal access token
 */
export class StaticTokenAuthProvider implements AuthProvider {
  private readonly token: SecretString;

  constructor(token: string | SecretString) {
    this.token = typeof token === 'string' ? new SecretString(token) : token;
  }

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.token.expose()}`;
  }
}

/**
 * Resolves the credentials of a connection
 *
 * @throws MissingCredentials when the connection carries none
 */
export type AuthResolver = (context: ConnectionContext) => AuthProvider;

/** Authentication mechanism id for personal access tokens */
const PAT_AUTH_MECH = '3';

/**
 * Default resolver: a personal access token from the `PWD` or `token` property
 */
export const resolveAuthProvider: AuthResolver = (context) => {
  const authMech = getProperty(context, 'AuthMech');
  if (authMech !== undefined && authMech.trim() !== PAT_AUTH_MECH) {
    throw new MissingCredentials(context.connectionId);
  }

  const token = getProperty(context, 'PWD') ?? getProperty(context, 'token');
  if (token === undefined || token.trim() === '') {
    throw new MissingCredentials(context.connectionId);
  }

  return new StaticTokenAuthProvider(token);
};
