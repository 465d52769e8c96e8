/**
 * Client construction from service models.
 *
 * @module client/creator
 */

import {
  loadEnvironmentSettings,
  mergeClientConfig,
  resolveClientConfig,
  scopedSignatureVersion,
  userAgentFor,
  type ClientConfig,
  type ClientConfigInput,
  type ScopedConfig,
} from '../config/index.js';
import { defaultCredentialProvider } from '../credentials/chain.js';
import { Endpoint } from '../endpoint/endpoint.js';
import type { EndpointProperties, EndpointResolver } from '../endpoint/resolver.js';
import { DataNotFoundError } from '../error/index.js';
import { EventEmitter } from '../events/emitter.js';
import { UndiciTransport } from '../http/transport.js';
import type { Transport, TransportOptions } from '../http/types.js';
import type { Loader } from '../model/loader.js';
import { methodNameFor } from '../model/names.js';
import { ServiceModel } from '../model/service.js';
import { createDefaultLogger } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import { createResponseParser, createSerializer } from '../protocol/factory.js';
import { translateRetryConfig } from '../retry/config.js';
import { createRetryHandler, retryHandlerId } from '../retry/handler.js';
import type { Sleep } from '../retry/types.js';
import { RequestSigner } from '../signing/signer.js';
import { BaseClient, type ClientTypeState } from './base-client.js';
import type { ClientParts, CreateClientOptions } from './types.js';

export interface ClientCreatorOptions {
  loader: Loader;
  endpointResolver: EndpointResolver;
  /** Handlers every client starts with; each client gets a copy */
  events?: EventEmitter;
  /** Shared by every client; defaults to an undici transport per client */
  transport?: Transport;
  /** Builds the per-client transport when `transport` is not given */
  createTransport?: (options: TransportOptions) => Transport;
  /** Defaults applied under each client's own configuration */
  clientConfig?: ClientConfigInput;
  logger?: Logger;
  /** Pause used between retries and waiter attempts */
  sleep?: Sleep;
  /** Source of randomness for `rand` retry delays */
  random?: () => number;
  /** Clock used for signing */
  now?: () => Date;
  invocationId?: () => string;
  /** Environment consulted for a region or endpoint URL the caller leaves out */
  env?: Record<string, string | undefined>;
}

/**
 * A service's operation registry, shared by every client built from it.
 */
export class ClientType {
  constructor(private readonly state: ClientTypeState) {}

  get serviceModel(): ServiceModel {
    return this.state.serviceModel;
  }

  /**
   * camelCase method name to operation name.
   */
  get methodToOperation(): Readonly<Record<string, string>> {
    return this.state.methodToOperation;
  }

  get methodNames(): string[] {
    return Object.keys(this.state.methodToOperation);
  }

  instantiate(parts: ClientParts): BaseClient {
    return new BaseClient(this.state, parts);
  }
}

interface SignatureChoice {
  version: string;
  source: 'client-config' | 'endpoint' | 'scoped-config' | 'model';
}

/**
 * Builds clients from service models.
 *
 * Each service model is loaded once per creator. The first load of a service
 * also registers its retry handler on the creator's emitter, so every client
 * created afterwards inherits it.
 *
 * @example
 * ```typescript
 * const loader = new FileLoader(['./models', DEFAULT_DATA_PATH]);
 * const creator = new ClientCreator({
 *   loader,
 *   endpointResolver: EndpointResolver.fromRules(await loader.loadData('_endpoints')),
 * });
 *
 * const widgets = await creator.createClient('widgets', 'us-west-2', {
 *   credentials: new StaticCredentialProvider({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' }),
 * });
 * ```
 */
export class ClientCreator {
  private readonly events: EventEmitter;
  private readonly logger: Logger;
  private readonly classes = new Map<string, Promise<ClientType>>();

  constructor(private readonly options: ClientCreatorOptions) {
    this.events = options.events ?? new EventEmitter();
    this.logger = options.logger ?? createDefaultLogger();
  }

  /**
   * Emitter every new client copies.
   */
  get baseEvents(): EventEmitter {
    return this.events;
  }

  /**
   * Load a service model and build its operation registry.
   *
   * @param apiVersion - Defaults to the latest version the loader has
   * @throws {DataNotFoundError} If the loader has no such service
   * @throws {ConfigurationError} If the description or retry rules are malformed
   */
  createClientClass(serviceName: string, apiVersion?: string): Promise<ClientType> {
    const key = `${serviceName}@${apiVersion ?? 'latest'}`;
    const cached = this.classes.get(key);
    if (cached) {
      return cached;
    }
    const pending = this.buildClientClass(serviceName, apiVersion).catch((error: unknown) => {
      this.classes.delete(key);
      throw error;
    });
    this.classes.set(key, pending);
    return pending;
  }

  /**
   * Create a client for a service in a region.
   *
   * @param regionName - Falls back to `AWS_REGION` / `AWS_DEFAULT_REGION`
   * @throws {ConfigurationError} `NoRegion` / `UnknownEndpoint` from endpoint
   *   resolution, or an unknown protocol or signature version
   */
  async createClient(
    serviceName: string,
    regionName?: string,
    options: CreateClientOptions = {}
  ): Promise<BaseClient> {
    const clientType = await this.createClientClass(serviceName, options.apiVersion);
    const model = clientType.serviceModel;
    const prefix = model.endpointPrefix;

    const environment = loadEnvironmentSettings(model.metadata.serviceId ?? prefix, this.options.env);
    const region = regionName ?? environment.regionName;
    const config = mergeClientConfig(
      resolveClientConfig(this.options.clientConfig),
      options.clientConfig ?? {}
    );

    let url: string;
    let signingRegion: string | undefined;
    let properties: EndpointProperties = {};
    const fixedUrl = options.endpointUrl ?? environment.endpointUrl;
    if (fixedUrl !== undefined) {
      url = fixedUrl;
      signingRegion = region;
    } else {
      const resolved = this.options.endpointResolver.constructEndpoint(
        prefix,
        region,
        options.isSecure === false ? 'http' : 'https'
      );
      url = resolved.url;
      signingRegion = resolved.regionName;
      properties = resolved.properties;
    }

    const signature = this.chooseSignatureVersion(model, config, properties, options.scopedConfig);
    if (signature.source !== 'model') {
      this.logger.debug('Signature version overridden', {
        service: prefix,
        signatureVersion: signature.version,
        source: signature.source,
      });
    }

    const events = this.events.copy();
    const requestSigner = new RequestSigner({
      serviceName: prefix,
      signingName: model.signingName,
      signatureVersion: signature.version,
      regionName: signingRegion,
      credentials: options.credentials ?? defaultCredentialProvider(this.options.env),
      events,
      logger: this.logger,
      now: this.options.now,
    });

    const ownsTransport = this.options.transport === undefined;
    const endpoint = new Endpoint({
      host: url,
      transport: this.options.transport ?? this.createTransport(config),
      userAgent: userAgentFor(config),
      logger: this.logger,
      sleep: this.options.sleep,
      invocationId: this.options.invocationId,
    });

    return clientType.instantiate({
      serializer: createSerializer(model.protocol, { validate: config.parameterValidation }),
      endpoint,
      responseParser: createResponseParser(model.protocol),
      requestSigner,
      events,
      regionName: signingRegion,
      config,
      ownsTransport,
    });
  }

  private createTransport(config: ClientConfig): Transport {
    const options: TransportOptions = { timeout: config.timeout, connectTimeout: config.connectTimeout };
    return this.options.createTransport?.(options) ?? new UndiciTransport(options);
  }

  private async buildClientClass(serviceName: string, apiVersion?: string): Promise<ClientType> {
    const raw = await this.options.loader.loadServiceModel(serviceName, 'service', apiVersion);
    const serviceModel = ServiceModel.fromDescription(raw, serviceName);
    await this.registerRetryHandler(serviceModel);

    const methodToOperation: Record<string, string> = {};
    for (const operationName of serviceModel.operationNames) {
      methodToOperation[methodNameFor(operationName)] = operationName;
    }

    this.logger.debug('Loaded service model', {
      service: serviceName,
      apiVersion: serviceModel.apiVersion,
      operations: serviceModel.operationNames.length,
    });

    return new ClientType({
      serviceModel,
      methodToOperation: Object.freeze(methodToOperation),
      loader: this.options.loader,
      logger: this.logger,
      sleep: this.options.sleep,
    });
  }

  private async registerRetryHandler(model: ServiceModel): Promise<void> {
    const prefix = model.endpointPrefix;
    let rules: unknown;
    try {
      rules = await this.options.loader.loadData('_retry');
    } catch (error) {
      if (error instanceof DataNotFoundError) {
        this.logger.debug('No retry rules found', { service: prefix });
        return;
      }
      throw error;
    }

    const config = translateRetryConfig(rules, prefix);
    const registered = this.events.register(
      { event: 'needs-retry', service: prefix },
      createRetryHandler(config, { logger: this.logger, random: this.options.random }),
      retryHandlerId(prefix)
    );
    if (registered) {
      this.logger.debug('Registered retry handler', {
        service: prefix,
        handlerId: retryHandlerId(prefix),
        operationOverrides: config.operationOverrides,
      });
    }
  }

  /**
   * Highest first: client config, endpoint properties, scoped config, model.
   */
  private chooseSignatureVersion(
    model: ServiceModel,
    config: ClientConfig,
    properties: EndpointProperties,
    scopedConfig: ScopedConfig | undefined
  ): SignatureChoice {
    if (config.signatureVersion !== undefined) {
      return { version: config.signatureVersion, source: 'client-config' };
    }
    if (properties.signatureVersion !== undefined) {
      return { version: properties.signatureVersion, source: 'endpoint' };
    }
    const scoped = scopedSignatureVersion(scopedConfig, model.endpointPrefix);
    if (scoped !== undefined) {
      return { version: scoped, source: 'scoped-config' };
    }
    return { version: model.signatureVersion, source: 'model' };
  }
}
