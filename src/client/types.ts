/**
 * Client types.
 *
 * @module client/types
 */

import type { ClientConfig, ClientConfigInput, ScopedConfig } from '../config/index.js';
import type { CredentialProvider } from '../credentials/types.js';
import type { Endpoint } from '../endpoint/endpoint.js';
import type { EventEmitter } from '../events/emitter.js';
import type { ServiceModel } from '../model/service.js';
import type { ResponseMetadata, ResponseParser, Serializer } from '../protocol/types.js';
import type { RequestSigner } from '../signing/signer.js';

/**
 * Parsed output of a successful call.
 */
export type OperationOutput = Record<string, unknown> & { ResponseMetadata: ResponseMetadata };

/**
 * Bound operation, e.g. `client.operations.describeWidgets`.
 */
export type OperationMethod = (params?: Record<string, unknown>) => Promise<OperationOutput>;

/**
 * Collaborators a clone may replace.
 */
export interface ClientCollaborators {
  serializer: Serializer;
  endpoint: Endpoint;
  responseParser: ResponseParser;
  requestSigner: RequestSigner;
}

export type CloneOverrides = Partial<ClientCollaborators>;

/**
 * Per-instance parts a client type is instantiated with.
 *
 * `requestSigner` must announce on `events`.
 */
export interface ClientParts extends ClientCollaborators {
  events: EventEmitter;
  regionName?: string;
  config: ClientConfig;
  /** The endpoint's transport was built for this client; `close()` releases it */
  ownsTransport?: boolean;
}

/**
 * Introspection data exposed as `client.meta`.
 */
export interface ClientMeta {
  events: EventEmitter;
  serviceModel: ServiceModel;
  regionName?: string;
  endpointUrl: string;
  /** camelCase method name to operation name */
  methodToOperation: Readonly<Record<string, string>>;
  config: ClientConfig;
}

/**
 * Options for {@link ClientCreator.createClient}.
 */
export interface CreateClientOptions {
  /** Use https (default) or http when resolving the endpoint */
  isSecure?: boolean;
  /** Fixed base URL; skips endpoint resolution */
  endpointUrl?: string;
  /** Defaults to the environment credential chain */
  credentials?: CredentialProvider;
  /** Per-service sections keyed by endpoint prefix */
  scopedConfig?: ScopedConfig;
  clientConfig?: ClientConfigInput;
  apiVersion?: string;
}
