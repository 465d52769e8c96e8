/**
 * Parameter validation against an operation's input shape.
 *
 * @module validation/validator
 */

import { ParamValidationError, type ValidationIssue } from '../error/index.js';
import type { Shape } from '../model/shapes.js';
import { isRecord } from '../protocol/values.js';

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return typeof value;
}

/**
 * Collects every problem with a parameter tree in one pass.
 *
 * `undefined` members are treated as absent; `null` is never valid.
 *
 * @example
 * ```typescript
 * const validator = new ParamValidator();
 * const issues = validator.validate({ Filters: [{}] }, operation.inputShape);
 * // [{ path: 'Filters[0].Name', message: 'Missing required parameter' }]
 * ```
 */
export class ParamValidator {
  /**
   * @returns Every issue found, in traversal order
   */
  validate(params: Record<string, unknown>, shape: Shape | undefined): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    if (!shape) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          issues.push({ path: key, message: 'Unknown parameter: operation takes no input' });
        }
      }
      return issues;
    }
    this.validateStructure(params, shape, '', issues);
    return issues;
  }

  /**
   * @throws {ParamValidationError} If any issue is found
   */
  assertValid(params: Record<string, unknown>, shape: Shape | undefined): void {
    const issues = this.validate(params, shape);
    if (issues.length > 0) {
      throw new ParamValidationError(issues);
    }
  }

  private validateValue(value: unknown, shape: Shape, path: string, issues: ValidationIssue[]): void {
    if (value === null) {
      issues.push({ path, message: `Invalid type: expected ${shape.type}, got null` });
      return;
    }

    switch (shape.type) {
      case 'structure':
        if (!isRecord(value)) {
          issues.push({ path, message: `Invalid type: expected structure, got ${describeType(value)}` });
          return;
        }
        this.validateStructure(value, shape, path, issues);
        return;

      case 'list':
        if (!Array.isArray(value)) {
          issues.push({ path, message: `Invalid type: expected list, got ${describeType(value)}` });
          return;
        }
        this.validateRange(value.length, shape, path, issues, 'length');
        value.forEach((item, index) => {
          this.validateValue(item, shape.member, `${path}[${index}]`, issues);
        });
        return;

      case 'map':
        if (!isRecord(value)) {
          issues.push({ path, message: `Invalid type: expected map, got ${describeType(value)}` });
          return;
        }
        for (const [key, entry] of Object.entries(value)) {
          if (entry !== undefined) {
            this.validateValue(entry, shape.value, `${path}.${key}`, issues);
          }
        }
        return;

      case 'string':
        if (typeof value !== 'string') {
          issues.push({ path, message: `Invalid type: expected string, got ${describeType(value)}` });
          return;
        }
        this.validateRange(value.length, shape, path, issues, 'length');
        if (shape.enum && !shape.enum.includes(value)) {
          issues.push({ path, message: `Invalid value "${value}": expected one of ${shape.enum.join(', ')}` });
        }
        return;

      case 'integer':
      case 'long':
        if (typeof value !== 'number' || !Number.isFinite(value) || !Number.isInteger(value)) {
          issues.push({ path, message: `Invalid type: expected integer, got ${describeType(value)}` });
          return;
        }
        this.validateRange(value, shape, path, issues, 'value');
        return;

      case 'float':
      case 'double':
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          issues.push({ path, message: `Invalid type: expected number, got ${describeType(value)}` });
          return;
        }
        this.validateRange(value, shape, path, issues, 'value');
        return;

      case 'boolean':
        if (typeof value !== 'boolean') {
          issues.push({ path, message: `Invalid type: expected boolean, got ${describeType(value)}` });
        }
        return;

      case 'timestamp':
        if (value instanceof Date) {
          if (Number.isNaN(value.getTime())) {
            issues.push({ path, message: 'Invalid timestamp: invalid date' });
          }
        } else if (typeof value === 'string') {
          if (Number.isNaN(Date.parse(value))) {
            issues.push({ path, message: `Invalid timestamp "${value}"` });
          }
        } else if (typeof value !== 'number' || !Number.isFinite(value)) {
          issues.push({ path, message: `Invalid type: expected timestamp, got ${describeType(value)}` });
        }
        return;

      case 'blob':
        if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
          issues.push({ path, message: `Invalid type: expected blob, got ${describeType(value)}` });
        }
        return;
    }
  }

  private validateStructure(
    value: Record<string, unknown>,
    shape: Shape,
    path: string,
    issues: ValidationIssue[]
  ): void {
    const prefix = path === '' ? '' : `${path}.`;
    for (const name of shape.required) {
      if (value[name] === undefined) {
        issues.push({ path: `${prefix}${name}`, message: 'Missing required parameter' });
      }
    }
    const members = shape.members;
    for (const [name, memberValue] of Object.entries(value)) {
      if (memberValue === undefined) {
        continue;
      }
      const member = members.get(name);
      if (!member) {
        issues.push({
          path: `${prefix}${name}`,
          message: `Unknown parameter, must be one of: ${[...members.keys()].join(', ')}`,
        });
        continue;
      }
      this.validateValue(memberValue, member, `${prefix}${name}`, issues);
    }
  }

  private validateRange(
    measured: number,
    shape: Shape,
    path: string,
    issues: ValidationIssue[],
    what: 'length' | 'value'
  ): void {
    if (shape.min !== undefined && measured < shape.min) {
      issues.push({ path, message: `Invalid ${what}: ${measured}, must be >= ${shape.min}` });
    }
    if (shape.max !== undefined && measured > shape.max) {
      issues.push({ path, message: `Invalid ${what}: ${measured}, must be <= ${shape.max}` });
    }
  }
}
