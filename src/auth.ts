/**
 * Credential handling for the GitLab API.
 * @module auth
 */

/**
 * Secret string wrapper to prevent accidental exposure in logs.
 *
 * The secret value can only be read through expose(); string conversion and
 * JSON serialization yield "[REDACTED]".
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Build the `Authorization` header value for a personal or project access token.
 */
export function bearerAuthorization(token: SecretString): string {
  return `Bearer ${token.expose()}`;
}
