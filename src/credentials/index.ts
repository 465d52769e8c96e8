/**
 * Credentials module.
 *
 * Only the boundary and simple providers live here; acquiring credentials
 * from profiles, STS or instance metadata is the host's concern.
 *
 * @module credentials
 */

export type { AwsCredentials, CredentialProvider } from './types.js';
export { StaticCredentialProvider } from './static.js';
export { EnvironmentCredentialProvider, AWS_ENV_VARS } from './environment.js';
export { ChainCredentialProvider, defaultCredentialProvider } from './chain.js';
