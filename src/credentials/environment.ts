/**
 * Environment variable credential provider.
 *
 * @module credentials/environment
 */

import { CredentialError } from '../error/index.js';
import type { AwsCredentials, CredentialProvider } from './types.js';

/**
 * Standard environment variable names for credentials.
 */
export const AWS_ENV_VARS = {
  ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
  SESSION_TOKEN: 'AWS_SESSION_TOKEN',
} as const;

/**
 * Provider that reads credentials from `AWS_ACCESS_KEY_ID`,
 * `AWS_SECRET_ACCESS_KEY` and the optional `AWS_SESSION_TOKEN`.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  /**
   * @param env - Environment to read instead of process.env
   */
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /**
   * @throws {CredentialError} If a required variable is unset or empty
   */
  public async getCredentials(): Promise<AwsCredentials> {
    const accessKeyId = this.env[AWS_ENV_VARS.ACCESS_KEY_ID]?.trim();
    const secretAccessKey = this.env[AWS_ENV_VARS.SECRET_ACCESS_KEY]?.trim();
    const sessionToken = this.env[AWS_ENV_VARS.SESSION_TOKEN]?.trim();

    if (!accessKeyId) {
      throw new CredentialError(`${AWS_ENV_VARS.ACCESS_KEY_ID} environment variable not set or empty`);
    }

    if (!secretAccessKey) {
      throw new CredentialError(
        `${AWS_ENV_VARS.SECRET_ACCESS_KEY} environment variable not set or empty`
      );
    }

    const credentials: AwsCredentials = { accessKeyId, secretAccessKey };
    if (sessionToken) {
      credentials.sessionToken = sessionToken;
    }
    return credentials;
  }

  public isExpired(): boolean {
    return false;
  }
}
