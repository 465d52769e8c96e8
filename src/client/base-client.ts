/**
 * Client instances synthesized from a service model.
 *
 * @module client/base-client
 */

import type { Endpoint } from '../endpoint/endpoint.js';
import { CapabilityError, ConfigurationError, DataNotFoundError, ServiceError } from '../error/index.js';
import type { EventEmitter } from '../events/emitter.js';
import type { EventScope } from '../events/types.js';
import type { Loader } from '../model/loader.js';
import { methodNameFor, normalizeWaiterName } from '../model/names.js';
import {
  formatZodIssues,
  PaginationConfigSchema,
  WaiterConfigSchema,
  type PaginatorDefinition,
  type WaiterDefinition,
} from '../model/schema.js';
import type { ServiceModel } from '../model/service.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { Paginator } from '../paginate/paginator.js';
import type { ResponseMetadata, ResponseParser, Serializer } from '../protocol/types.js';
import type { Sleep } from '../retry/types.js';
import { SIGNER_HANDLER_ID, type RequestSigner } from '../signing/signer.js';
import { Waiter } from '../waiter/waiter.js';
import type {
  ClientMeta,
  ClientParts,
  CloneOverrides,
  OperationMethod,
  OperationOutput,
} from './types.js';

/**
 * State shared by every client of one client type.
 */
export interface ClientTypeState {
  serviceModel: ServiceModel;
  methodToOperation: Readonly<Record<string, string>>;
  loader: Loader;
  logger?: Logger;
  /** Pause between waiter attempts */
  sleep?: Sleep;
}

interface NamedWaiter {
  name: string;
  definition: WaiterDefinition;
}

/**
 * A service client. Obtain one from {@link ClientCreator.createClient}.
 *
 * @example
 * ```typescript
 * const client = await creator.createClient('widgets', 'us-west-2');
 *
 * const { Widgets } = await client.call('DescribeWidgets', { MaxResults: 10 });
 * await client.operations.getWidget({ WidgetId: 'w-1' });
 *
 * const waiter = await client.getWaiter('widget_available');
 * await waiter.wait({ Filters: [{ Name: 'id', Values: ['w-1'] }] });
 * ```
 */
export class BaseClient {
  /**
   * One bound method per operation, keyed by camelCase name.
   */
  readonly operations: Readonly<Record<string, OperationMethod>>;

  private readonly serializer: Serializer;
  private readonly endpoint: Endpoint;
  private readonly responseParser: ResponseParser;
  private readonly requestSigner: RequestSigner;
  private readonly events: EventEmitter;
  private readonly logger: Logger;

  private pageConfigLoad?: Promise<Record<string, PaginatorDefinition>>;
  private waiterConfigLoad?: Promise<Map<string, NamedWaiter>>;
  private closed = false;

  constructor(
    private readonly type: ClientTypeState,
    private readonly parts: ClientParts
  ) {
    this.serializer = parts.serializer;
    this.endpoint = parts.endpoint;
    this.responseParser = parts.responseParser;
    this.requestSigner = parts.requestSigner;
    this.events = parts.events;
    this.logger = type.logger ?? new NoopLogger();

    const pattern = { event: 'request-created' as const, service: type.serviceModel.endpointPrefix };
    this.events.unregister(pattern, SIGNER_HANDLER_ID);
    this.events.register(pattern, this.requestSigner.handleRequestCreated, SIGNER_HANDLER_ID);

    const operations: Record<string, OperationMethod> = {};
    for (const [method, operationName] of Object.entries(type.methodToOperation)) {
      operations[method] = (params = {}) => this.call(operationName, params);
    }
    this.operations = Object.freeze(operations);
  }

  get meta(): ClientMeta {
    return {
      events: this.events,
      serviceModel: this.type.serviceModel,
      regionName: this.parts.regionName,
      endpointUrl: this.endpoint.host,
      methodToOperation: this.type.methodToOperation,
      config: this.parts.config,
    };
  }

  /**
   * Invoke an operation by operation name or method name.
   *
   * @throws {ParamValidationError} If the parameters fail the input shape
   * @throws {ServiceError} If the service answers with status 300 or above
   * @throws {TransportError} If the last attempt failed in transport
   */
  async call(name: string, params: Record<string, unknown> = {}): Promise<OperationOutput> {
    const operation = this.type.serviceModel.operationModel(this.operationNameFor(name));
    const scope: EventScope = {
      service: this.type.serviceModel.endpointPrefix,
      operation: operation.name,
    };

    const requestParams = { ...params };
    await this.events.emit('before-parameter-build', scope, { params: requestParams, model: operation });

    const envelope = this.serializer.serialize(requestParams, operation);
    await this.events.emit('before-call', scope, {
      params: envelope,
      model: operation,
      requestSigner: this.requestSigner,
    });

    this.logger.trace('Calling operation', { service: scope.service, operation: operation.name });
    const { http, parsed, attempts } = await this.endpoint.makeRequest({
      operation,
      envelope,
      parser: this.responseParser,
      events: this.events,
      scope,
    });

    await this.events.emit('after-call', scope, { httpResponse: http, parsed, model: operation });

    const metadata: ResponseMetadata = {
      RequestId: parsed.requestId,
      HTTPStatusCode: http.status,
      HTTPHeaders: http.headers,
      RetryAttempts: attempts - 1,
    };

    if (http.status >= 300) {
      const code = parsed.error?.code ?? String(http.status);
      const message = parsed.error?.message ?? '';
      throw new ServiceError({
        code,
        message,
        statusCode: http.status,
        operationName: operation.name,
        requestId: parsed.requestId,
        type: parsed.error?.type,
        response: { Error: { Code: code, Message: message }, ResponseMetadata: metadata },
      });
    }

    return { ...parsed.output, ResponseMetadata: metadata };
  }

  /**
   * Whether the operation has a pagination config.
   */
  async canPaginate(name: string): Promise<boolean> {
    const config = await this.loadPageConfig();
    return Object.hasOwn(config, this.operationNameFor(name));
  }

  /**
   * @throws {CapabilityError} If the operation cannot be paginated
   */
  async getPaginator(name: string): Promise<Paginator> {
    const operationName = this.operationNameFor(name);
    const config = await this.loadPageConfig();
    const definition = Object.hasOwn(config, operationName) ? config[operationName] : undefined;
    if (!definition) {
      throw new CapabilityError('pagination', name);
    }
    return new Paginator((params) => this.call(operationName, params), definition, operationName);
  }

  /**
   * camelCase names of the service's waiters, sorted.
   */
  async waiterNames(): Promise<string[]> {
    const waiters = await this.loadWaiterConfig();
    return [...waiters.values()].map(({ name }) => methodNameFor(name)).sort();
  }

  /**
   * @param name - Any casing: `widgetAvailable`, `WidgetAvailable`, `widget_available`
   * @throws {CapabilityError} If the service has no waiter by that name
   */
  async getWaiter(name: string): Promise<Waiter> {
    const waiters = await this.loadWaiterConfig();
    const found = waiters.get(normalizeWaiterName(name));
    if (!found) {
      throw new CapabilityError('waiter', name);
    }
    return new Waiter(
      found.name,
      found.definition,
      (params) => this.call(found.definition.operation, params),
      { sleep: this.type.sleep, logger: this.type.logger }
    );
  }

  /**
   * Client sharing this one's collaborators but owning a copy of its event
   * emitter. Handlers registered on either side afterwards stay local.
   *
   * Without a `requestSigner` override the clone signs with this client's
   * settings, announcing on its own emitter. A clone never owns its
   * transport, so closing it leaves the endpoint's connections open.
   */
  clone(overrides: CloneOverrides = {}): BaseClient {
    const events = this.events.copy();
    return new BaseClient(this.type, {
      ...this.parts,
      serializer: overrides.serializer ?? this.serializer,
      endpoint: overrides.endpoint ?? this.endpoint,
      responseParser: overrides.responseParser ?? this.responseParser,
      requestSigner: overrides.requestSigner ?? this.requestSigner.withEvents(events),
      events,
      ownsTransport: false,
    });
  }

  /**
   * Release the connections of a transport built for this client.
   *
   * A transport passed to the creator is shared and left open. Calling
   * `close()` again does nothing.
   *
   * @example
   * ```typescript
   * const client = await creator.createClient('widgets', 'us-west-2');
   * // ... use client ...
   * await client.close();
   * ```
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.parts.ownsTransport) {
      await this.endpoint.transport.close?.();
    }
  }

  private operationNameFor(name: string): string {
    const { methodToOperation } = this.type;
    return Object.hasOwn(methodToOperation, name) ? methodToOperation[name] : name;
  }

  private loadPageConfig(): Promise<Record<string, PaginatorDefinition>> {
    this.pageConfigLoad ??= this.loadOptionalModel('paginators').then((raw): Record<string, PaginatorDefinition> => {
      if (raw === undefined) {
        return {};
      }
      const parsed = PaginationConfigSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid pagination config for ${this.type.serviceModel.serviceName}: ${formatZodIssues(parsed.error)}`
        );
      }
      return parsed.data.pagination;
    }).catch((error: unknown) => {
      this.pageConfigLoad = undefined;
      throw error;
    });
    return this.pageConfigLoad;
  }

  private loadWaiterConfig(): Promise<Map<string, NamedWaiter>> {
    this.waiterConfigLoad ??= this.loadOptionalModel('waiters').then((raw) => {
      const waiters = new Map<string, NamedWaiter>();
      if (raw === undefined) {
        return waiters;
      }
      const parsed = WaiterConfigSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid waiter config for ${this.type.serviceModel.serviceName}: ${formatZodIssues(parsed.error)}`
        );
      }
      for (const [name, definition] of Object.entries(parsed.data.waiters)) {
        waiters.set(normalizeWaiterName(name), { name, definition });
      }
      return waiters;
    }).catch((error: unknown) => {
      this.waiterConfigLoad = undefined;
      throw error;
    });
    return this.waiterConfigLoad;
  }

  /**
   * Load an auxiliary document; `undefined` when the service has none.
   */
  private async loadOptionalModel(type: 'paginators' | 'waiters'): Promise<unknown> {
    const model = this.type.serviceModel;
    try {
      return await this.type.loader.loadServiceModel(model.serviceName, type, model.apiVersion);
    } catch (error) {
      if (error instanceof DataNotFoundError) {
        this.logger.debug('No auxiliary model', { service: model.serviceName, type });
        return undefined;
      }
      throw error;
    }
  }
}
