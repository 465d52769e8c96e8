/**
 * Service and operation model views.
 *
 * @module model/service
 */

import { ConfigurationError } from '../error/index.js';
import type { HttpMethod } from '../http/types.js';
import {
  formatZodIssues,
  ServiceDescriptionSchema,
  type OperationDefinition,
  type ServiceDescription,
  type ServiceMetadata,
} from './schema.js';
import { Shape, ShapeResolver } from './shapes.js';

/**
 * HTTP binding of an operation.
 */
export interface HttpBinding {
  method: HttpMethod;
  requestUri: string;
  responseCode?: number;
}

/**
 * Read-only view of one operation.
 */
export class OperationModel {
  constructor(
    private readonly definition: OperationDefinition,
    private readonly service: ServiceModel,
    private readonly resolver: ShapeResolver
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get http(): HttpBinding {
    return this.definition.http;
  }

  get serviceModel(): ServiceModel {
    return this.service;
  }

  get inputShape(): Shape | undefined {
    const ref = this.definition.input;
    return ref ? this.resolver.getShape(ref.shape).withRef(ref) : undefined;
  }

  get outputShape(): Shape | undefined {
    const ref = this.definition.output;
    return ref ? this.resolver.getShape(ref.shape).withRef(ref) : undefined;
  }

  /**
   * Element the query protocol wraps the output in, e.g. `DescribeWidgetsResult`.
   */
  get resultWrapper(): string | undefined {
    return this.definition.output?.resultWrapper;
  }

  get errorShapes(): Shape[] {
    return (this.definition.errors ?? []).map((ref) => this.resolver.getShape(ref.shape));
  }

  get deprecated(): boolean {
    return this.definition.deprecated ?? false;
  }
}

/**
 * Immutable view over one service description.
 *
 * Built once per service and shared by every client created from it.
 *
 * @example
 * ```typescript
 * const model = ServiceModel.fromDescription(description, 'widgets');
 * model.operationNames;                       // ['CreateWidget', 'DescribeWidgets', ...]
 * model.operationModel('DescribeWidgets').inputShape?.members;
 * ```
 */
export class ServiceModel {
  private readonly resolver: ShapeResolver;
  private readonly operations = new Map<string, OperationModel>();

  constructor(
    private readonly description: ServiceDescription,
    private readonly name?: string
  ) {
    this.resolver = new ShapeResolver(description.shapes);
  }

  /**
   * Validate a raw description and build the model.
   *
   * @throws {ConfigurationError} If the description is malformed
   */
  static fromDescription(raw: unknown, serviceName?: string): ServiceModel {
    const result = ServiceDescriptionSchema.safeParse(raw);
    if (!result.success) {
      const label = serviceName ?? 'service';
      throw new ConfigurationError(
        `Invalid service description for ${label}: ${formatZodIssues(result.error)}`
      );
    }
    return new ServiceModel(result.data, serviceName);
  }

  get metadata(): ServiceMetadata {
    return this.description.metadata;
  }

  /**
   * Name the service was loaded under; defaults to the endpoint prefix.
   */
  get serviceName(): string {
    return this.name ?? this.description.metadata.endpointPrefix;
  }

  get endpointPrefix(): string {
    return this.description.metadata.endpointPrefix;
  }

  get signingName(): string {
    return this.description.metadata.signingName ?? this.description.metadata.endpointPrefix;
  }

  get apiVersion(): string {
    return this.description.metadata.apiVersion;
  }

  get protocol(): string {
    return this.description.metadata.protocol;
  }

  get signatureVersion(): string {
    return this.description.metadata.signatureVersion;
  }

  get operationNames(): string[] {
    return Object.keys(this.description.operations);
  }

  get shapeNames(): string[] {
    return this.resolver.shapeNames;
  }

  hasOperation(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.description.operations, name);
  }

  /**
   * @throws {ConfigurationError} If the operation does not exist
   */
  operationModel(name: string): OperationModel {
    const cached = this.operations.get(name);
    if (cached) {
      return cached;
    }
    if (!this.hasOperation(name)) {
      throw new ConfigurationError(`Operation not found: ${this.serviceName}.${name}`);
    }
    const operation = new OperationModel(this.description.operations[name], this, this.resolver);
    this.operations.set(name, operation);
    return operation;
  }

  /**
   * @throws {ConfigurationError} If the shape does not exist
   */
  shapeFor(name: string): Shape {
    return this.resolver.getShape(name);
  }
}
