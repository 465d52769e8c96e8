/**
 * Static credential provider.
 *
 * @module credentials/static
 */

import { CredentialError } from '../error/index.js';
import type { AwsCredentials, CredentialProvider } from './types.js';

/**
 * Provider that always returns the credentials it was built with.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: AwsCredentials;

  /**
   * @throws {CredentialError} If the access key id or secret is empty
   */
  constructor(credentials: AwsCredentials) {
    if (!credentials.accessKeyId || !credentials.secretAccessKey) {
      throw new CredentialError('Static credentials require accessKeyId and secretAccessKey');
    }
    this.credentials = { ...credentials };
  }

  public async getCredentials(): Promise<AwsCredentials> {
    if (this.isExpired()) {
      throw new CredentialError('Static credentials have expired');
    }
    return { ...this.credentials };
  }

  public isExpired(): boolean {
    const expiration = this.credentials.expiration;
    return expiration !== undefined && expiration.getTime() <= Date.now();
  }
}
