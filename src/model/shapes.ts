/**
 * Read-only shape views with lazy member resolution.
 *
 * @module model/shapes
 */

import { ConfigurationError } from '../error/index.js';
import type { ShapeDefinition, ShapeRef, ShapeType } from './schema.js';

/**
 * Where a member is placed in an HTTP request or read from a response.
 */
export type MemberLocation = 'uri' | 'querystring' | 'header' | 'headers' | 'statusCode';

/**
 * Resolves shape names to shapes. Implemented by {@link ShapeResolver}.
 */
export interface ShapeLookup {
  getShape(name: string): Shape;
}

/**
 * A named shape, possibly seen through a member reference that adds
 * location and naming details.
 */
export class Shape {
  private membersCache?: ReadonlyMap<string, Shape>;

  constructor(
    public readonly name: string,
    private readonly definition: ShapeDefinition,
    private readonly lookup: ShapeLookup,
    private readonly ref: Partial<ShapeRef> = {}
  ) {}

  get type(): ShapeType {
    return this.definition.type;
  }

  get location(): MemberLocation | undefined {
    return this.ref.location;
  }

  /**
   * Wire name from the reference, when it differs from the member name.
   */
  get locationName(): string | undefined {
    return this.ref.locationName;
  }

  /**
   * Whether a list or map is flattened (query protocol serialization).
   */
  get flattened(): boolean {
    return this.ref.flattened ?? this.definition.flattened ?? false;
  }

  get required(): readonly string[] {
    return this.definition.required ?? [];
  }

  get min(): number | undefined {
    return this.definition.min;
  }

  get max(): number | undefined {
    return this.definition.max;
  }

  get enum(): readonly string[] | undefined {
    return this.definition.enum;
  }

  /**
   * Member sent as the whole body (`rest-json`), when the structure names one.
   */
  get payloadMember(): string | undefined {
    return this.definition.payload;
  }

  get timestampFormat(): 'iso8601' | 'unixTimestamp' | 'rfc822' | undefined {
    return this.definition.timestampFormat;
  }

  /**
   * Error code declared on an exception shape, defaulting to its name.
   */
  get errorCode(): string | undefined {
    if (!this.definition.exception) {
      return undefined;
    }
    return this.definition.error?.code ?? this.name;
  }

  /**
   * Structure members in declaration order. Resolved on first access so
   * recursive shapes are allowed.
   */
  get members(): ReadonlyMap<string, Shape> {
    if (!this.membersCache) {
      const members = new Map<string, Shape>();
      for (const [memberName, memberRef] of Object.entries(this.definition.members ?? {})) {
        members.set(memberName, this.resolveRef(memberRef));
      }
      this.membersCache = members;
    }
    return this.membersCache;
  }

  /**
   * List element shape.
   *
   * @throws {ConfigurationError} If this is not a list
   */
  get member(): Shape {
    if (this.definition.type !== 'list' || !this.definition.member) {
      throw new ConfigurationError(`Shape ${this.name} is not a list`);
    }
    return this.resolveRef(this.definition.member);
  }

  /**
   * Map key shape.
   *
   * @throws {ConfigurationError} If this is not a map
   */
  get key(): Shape {
    if (this.definition.type !== 'map' || !this.definition.key) {
      throw new ConfigurationError(`Shape ${this.name} is not a map`);
    }
    return this.resolveRef(this.definition.key);
  }

  /**
   * Map value shape.
   *
   * @throws {ConfigurationError} If this is not a map
   */
  get value(): Shape {
    if (this.definition.type !== 'map' || !this.definition.value) {
      throw new ConfigurationError(`Shape ${this.name} is not a map`);
    }
    return this.resolveRef(this.definition.value);
  }

  private resolveRef(ref: ShapeRef): Shape {
    const target = this.lookup.getShape(ref.shape);
    return target.withRef(ref);
  }

  /**
   * View of this shape through a member reference.
   */
  withRef(ref: Partial<ShapeRef>): Shape {
    return new Shape(this.name, this.definition, this.lookup, ref);
  }
}

/**
 * Lazily builds {@link Shape} views from a service's shape table.
 */
export class ShapeResolver implements ShapeLookup {
  private readonly cache = new Map<string, Shape>();

  constructor(private readonly definitions: Readonly<Record<string, ShapeDefinition>>) {}

  /**
   * @throws {ConfigurationError} If the shape is not defined
   */
  getShape(name: string): Shape {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }
    const definition = this.definitions[name];
    if (!definition) {
      throw new ConfigurationError(`Shape not found: ${name}`);
    }
    const shape = new Shape(name, definition, this);
    this.cache.set(name, shape);
    return shape;
  }

  get shapeNames(): string[] {
    return Object.keys(this.definitions);
  }
}
