/**
 * `json` protocol: POST to `/` with an `X-Amz-Target` header.
 *
 * @module protocol/json
 */

import type { HttpResponse } from '../http/types.js';
import type { OperationModel } from '../model/service.js';
import type { Shape } from '../model/shapes.js';
import type {
  ParsedError,
  ParsedResponse,
  RequestEnvelope,
  ResponseParser,
  Serializer,
} from './types.js';
import {
  decodeBlob,
  encodeBlob,
  isRecord,
  normalizeErrorCode,
  parseJsonBody,
  toDate,
  toEpochSeconds,
} from './values.js';

/**
 * Convert a parameter value to its JSON wire form.
 */
export function serializeJsonValue(value: unknown, shape: Shape): unknown {
  switch (shape.type) {
    case 'structure': {
      if (!isRecord(value)) {
        return value;
      }
      const result: Record<string, unknown> = {};
      for (const [name, member] of shape.members) {
        const memberValue = value[name];
        if (memberValue !== undefined) {
          result[member.locationName ?? name] = serializeJsonValue(memberValue, member);
        }
      }
      return result;
    }
    case 'list':
      return Array.isArray(value) ? value.map((item) => serializeJsonValue(item, shape.member)) : value;
    case 'map': {
      if (!isRecord(value)) {
        return value;
      }
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        if (entry !== undefined) {
          result[key] = serializeJsonValue(entry, shape.value);
        }
      }
      return result;
    }
    case 'timestamp': {
      const date = toDate(value);
      return date ? toEpochSeconds(date) : value;
    }
    case 'blob':
      return encodeBlob(value);
    default:
      return value;
  }
}

/**
 * Convert a JSON wire value to its output form: timestamps become Dates and
 * blobs become Buffers. Members not in the shape are dropped.
 */
export function parseJsonValue(value: unknown, shape: Shape): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  switch (shape.type) {
    case 'structure': {
      if (!isRecord(value)) {
        return undefined;
      }
      const result: Record<string, unknown> = {};
      for (const [name, member] of shape.members) {
        const parsed = parseJsonValue(value[member.locationName ?? name], member);
        if (parsed !== undefined) {
          result[name] = parsed;
        }
      }
      return result;
    }
    case 'list':
      return Array.isArray(value) ? value.map((item) => parseJsonValue(item, shape.member)) : undefined;
    case 'map': {
      if (!isRecord(value)) {
        return undefined;
      }
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = parseJsonValue(entry, shape.value);
      }
      return result;
    }
    case 'timestamp':
      return toDate(value);
    case 'blob':
      return decodeBlob(value);
    default:
      return value;
  }
}

/**
 * Parse the output structure of a JSON body.
 */
export function parseJsonOutput(body: unknown, shape: Shape | undefined): Record<string, unknown> {
  if (!shape) {
    return {};
  }
  const parsed = parseJsonValue(body, shape);
  return isRecord(parsed) ? parsed : {};
}

/**
 * Read the error code and message of a JSON error response.
 */
export function parseJsonError(response: HttpResponse, body: unknown): ParsedError {
  const fields = isRecord(body) ? body : {};
  const rawCode =
    response.headers['x-amzn-errortype'] ??
    stringField(fields, '__type') ??
    stringField(fields, 'code') ??
    stringField(fields, 'Code') ??
    String(response.status);
  const message =
    stringField(fields, 'message') ?? stringField(fields, 'Message') ?? stringField(fields, 'errorMessage') ?? '';
  return { code: normalizeErrorCode(rawCode), message };
}

function stringField(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read an error body without failing on malformed content.
 */
export function readErrorBody(body: string): unknown {
  try {
    return parseJsonBody(body);
  } catch {
    return { message: body };
  }
}

/**
 * @example
 * ```typescript
 * const envelope = new JsonSerializer().serialize({ MaxResults: 5 }, operation);
 * envelope.headers['x-amz-target']; // 'WidgetService_20240101.DescribeWidgets'
 * envelope.body;                    // '{"MaxResults":5}'
 * ```
 */
export class JsonSerializer implements Serializer {
  serialize(params: Record<string, unknown>, operation: OperationModel): RequestEnvelope {
    const metadata = operation.serviceModel.metadata;
    const jsonVersion = metadata.jsonVersion ?? '1.0';
    const headers: Record<string, string> = {
      'content-type': `application/x-amz-json-${jsonVersion}`,
    };
    if (metadata.targetPrefix) {
      headers['x-amz-target'] = `${metadata.targetPrefix}.${operation.name}`;
    }

    const input = operation.inputShape;
    const body = input ? serializeJsonValue(params, input) : {};

    return {
      method: 'POST',
      urlPath: '/',
      query: {},
      headers,
      body: JSON.stringify(body ?? {}),
    };
  }
}

export class JsonResponseParser implements ResponseParser {
  parse(response: HttpResponse, operation: OperationModel): ParsedResponse {
    const requestId = response.headers['x-amzn-requestid'];

    if (response.status >= 300) {
      return {
        output: {},
        error: parseJsonError(response, readErrorBody(response.body)),
        requestId,
      };
    }

    return {
      output: parseJsonOutput(parseJsonBody(response.body), operation.outputShape),
      requestId,
    };
  }
}
