/**
 * Request signer bound to one client.
 *
 * @module signing/signer
 */

import type { CredentialProvider } from '../credentials/types.js';
import { ConfigurationError, CredentialError } from '../error/index.js';
import type { EventEmitter } from '../events/emitter.js';
import type { EventHandler, SignEventPayload } from '../events/types.js';
import type { HttpRequest } from '../http/types.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { SigningKeyCache } from './cache.js';
import { signV4 } from './v4.js';

export const SIGNATURE_VERSIONS = ['v4', 's3v4', 'none'] as const;

export type SignatureVersion = (typeof SIGNATURE_VERSIONS)[number];

/**
 * Id under which a client registers its signer on `request-created`.
 */
export const SIGNER_HANDLER_ID = 'request-signer';

export function isSignatureVersion(value: string): value is SignatureVersion {
  return SIGNATURE_VERSIONS.some((version) => version === value);
}

function assertSignatureVersion(value: string): SignatureVersion {
  if (!isSignatureVersion(value)) {
    throw new ConfigurationError(
      `Unknown signature version: ${value} (supported: ${SIGNATURE_VERSIONS.join(', ')})`
    );
  }
  return value;
}

export interface RequestSignerOptions {
  /** Endpoint prefix, used as the event scope */
  serviceName: string;
  signingName: string;
  signatureVersion: string;
  regionName?: string;
  credentials?: CredentialProvider;
  /** Emitter for `before-sign` and `after-sign` */
  events: EventEmitter;
  logger?: Logger;
  /** Clock used for the signing time */
  now?: () => Date;
  keyCache?: SigningKeyCache;
}

/**
 * Signs requests for one client and announces each signature on the
 * emitter it was built with.
 *
 * `before-sign` handlers may change `signatureVersion`, `signingName` or
 * `regionName` on the payload for that one request.
 *
 * @example
 * ```typescript
 * const signer = new RequestSigner({
 *   serviceName: 'widgets',
 *   signingName: 'widgets',
 *   signatureVersion: 'v4',
 *   regionName: 'us-west-2',
 *   credentials: new StaticCredentialProvider({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' }),
 *   events,
 * });
 * events.register({ event: 'request-created', service: 'widgets' }, signer.handleRequestCreated, SIGNER_HANDLER_ID);
 * ```
 */
export class RequestSigner {
  private readonly options: RequestSignerOptions;
  private readonly version: SignatureVersion;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If the signature version is unknown
   */
  constructor(options: RequestSignerOptions) {
    this.version = assertSignatureVersion(options.signatureVersion);
    this.options = { ...options };
    this.logger = options.logger ?? new NoopLogger();
  }

  get signatureVersion(): SignatureVersion {
    return this.version;
  }

  get signingName(): string {
    return this.options.signingName;
  }

  get regionName(): string | undefined {
    return this.options.regionName;
  }

  get serviceName(): string {
    return this.options.serviceName;
  }

  /**
   * Signer with the same settings announcing on another emitter.
   */
  withEvents(events: EventEmitter): RequestSigner {
    return new RequestSigner({ ...this.options, events });
  }

  /**
   * `request-created` handler that signs the request.
   */
  readonly handleRequestCreated: EventHandler<'request-created'> = async ({ request, operationName }) => {
    await this.sign(operationName, request);
  };

  /**
   * Sign a request in place.
   *
   * @throws {ConfigurationError} If the version is unknown or no region is available
   * @throws {CredentialError} If the version needs credentials and none are configured
   */
  async sign(operationName: string, request: HttpRequest): Promise<void> {
    const scope = { service: this.options.serviceName, operation: operationName };
    const payload: SignEventPayload = {
      request,
      operationName,
      signatureVersion: this.version,
      signingName: this.options.signingName,
      regionName: this.options.regionName,
    };

    await this.options.events.emit('before-sign', scope, payload);

    const version = assertSignatureVersion(payload.signatureVersion);
    if (version !== 'none') {
      const region = payload.regionName;
      if (region === undefined) {
        throw new ConfigurationError(
          `NoRegion: a region must be specified to sign requests for ${this.options.serviceName}`
        );
      }
      const provider = this.options.credentials;
      if (!provider) {
        throw new CredentialError('Unable to locate credentials');
      }
      const credentials = await provider.getCredentials();
      signV4(request, {
        credentials,
        region,
        service: payload.signingName,
        date: this.options.now?.(),
        contentSha256Header: version === 's3v4',
        cache: this.options.keyCache,
      });
      this.logger.trace('Request signed', {
        operation: operationName,
        signatureVersion: version,
        region,
      });
    }

    await this.options.events.emit('after-sign', scope, payload);
  }
}
