/**
 * Credential boundary consumed by request signing.
 *
 * @module credentials/types
 */

/**
 * Access key material used to sign requests.
 */
export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

/**
 * Opaque source of credentials. Refresh and expiry mechanics belong to the
 * provider; the signer only asks for credentials when it needs them.
 */
export interface CredentialProvider {
  /**
   * Retrieve credentials.
   *
   * @throws {CredentialError} If no credentials are available
   */
  getCredentials(): Promise<AwsCredentials>;

  /**
   * Whether the most recently returned credentials have expired.
   */
  isExpired?(): boolean;
}
