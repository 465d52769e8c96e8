/**
 * Chain credential provider.
 *
 * @module credentials/chain
 */

import { CredentialError } from '../error/index.js';
import { EnvironmentCredentialProvider } from './environment.js';
import type { AwsCredentials, CredentialProvider } from './types.js';

/**
 * Provider that tries each provider in order and returns the first
 * credentials obtained. The provider that succeeded is remembered until its
 * credentials expire or it fails.
 */
export class ChainCredentialProvider implements CredentialProvider {
  private cachedProvider: CredentialProvider | null = null;

  /**
   * @throws {CredentialError} If the provider list is empty
   */
  constructor(private readonly providers: CredentialProvider[]) {
    if (providers.length === 0) {
      throw new CredentialError('ChainCredentialProvider requires at least one provider');
    }
  }

  public async getCredentials(): Promise<AwsCredentials> {
    if (this.cachedProvider && !this.cachedProvider.isExpired?.()) {
      try {
        return await this.cachedProvider.getCredentials();
      } catch {
        this.cachedProvider = null;
      }
    }

    const failures: string[] = [];
    for (const [index, provider] of this.providers.entries()) {
      try {
        const credentials = await provider.getCredentials();
        this.cachedProvider = provider;
        return credentials;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        failures.push(`  ${index + 1}. ${provider.constructor.name}: ${reason}`);
      }
    }

    throw new CredentialError(
      `Could not load credentials from any provider in the chain:\n${failures.join('\n')}`
    );
  }

  public isExpired(): boolean {
    if (!this.cachedProvider) {
      return true;
    }
    return this.cachedProvider.isExpired?.() ?? false;
  }
}

/**
 * Default chain: environment variables only. Profile files and instance
 * metadata belong to the host application.
 */
export function defaultCredentialProvider(
  env: Record<string, string | undefined> = process.env
): ChainCredentialProvider {
  return new ChainCredentialProvider([new EnvironmentCredentialProvider(env)]);
}
