/**
 * `rest-json` protocol: members bound to the URI, query string and headers,
 * the rest sent as a JSON body.
 *
 * @module protocol/rest-json
 */

import type { HttpResponse } from '../http/types.js';
import type { OperationModel } from '../model/service.js';
import type { Shape } from '../model/shapes.js';
import type { ParsedResponse, RequestEnvelope, ResponseParser, Serializer } from './types.js';
import {
  parseJsonError,
  parseJsonOutput,
  parseJsonValue,
  readErrorBody,
  serializeJsonValue,
} from './json.js';
import { isRecord, parseJsonBody, toDate, toIso8601 } from './values.js';

function scalarToString(value: unknown, shape: Shape): string {
  if (shape.type === 'timestamp') {
    const date = toDate(value);
    return date ? toIso8601(date) : String(value);
  }
  return String(value);
}

function encodePathSegment(value: string, greedy: boolean): string {
  const encoded = encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
  return greedy ? encoded.replace(/%2F/g, '/') : encoded;
}

/**
 * @example
 * ```typescript
 * // requestUri: '/widgets/{WidgetId}', WidgetId bound to the URI
 * new RestJsonSerializer().serialize({ WidgetId: 'w-1' }, operation).urlPath; // '/widgets/w-1'
 * ```
 */
export class RestJsonSerializer implements Serializer {
  serialize(params: Record<string, unknown>, operation: OperationModel): RequestEnvelope {
    const [pathTemplate, fixedQuery] = splitRequestUri(operation.http.requestUri);
    const query: Record<string, string | string[]> = { ...fixedQuery };
    const headers: Record<string, string> = {};
    const uriValues: Record<string, string> = {};
    const bodyParams: Record<string, unknown> = {};

    const input = operation.inputShape;
    const members = input ? input.members : new Map<string, Shape>();

    for (const [name, member] of members) {
      const value = params[name];
      if (value === undefined) {
        continue;
      }
      const wireName = member.locationName ?? name;
      switch (member.location) {
        case 'uri':
          uriValues[wireName] = scalarToString(value, member);
          break;
        case 'querystring':
          addQueryValue(query, wireName, value, member);
          break;
        case 'header':
          headers[wireName.toLowerCase()] = scalarToString(value, member);
          break;
        case 'headers':
          if (isRecord(value)) {
            for (const [key, entry] of Object.entries(value)) {
              headers[`${wireName}${key}`.toLowerCase()] = String(entry);
            }
          }
          break;
        default:
          bodyParams[name] = value;
      }
    }

    const urlPath = pathTemplate.replace(/\{([^}+]+)(\+?)\}/g, (_match, key: string, greedy: string) => {
      const value = uriValues[key];
      return value === undefined ? '' : encodePathSegment(value, greedy === '+');
    });

    let body = '';
    const payloadName = input?.payloadMember;
    if (payloadName !== undefined) {
      const payloadShape = members.get(payloadName);
      const payloadValue = bodyParams[payloadName];
      if (payloadShape && payloadValue !== undefined) {
        body = JSON.stringify(serializeJsonValue(payloadValue, payloadShape));
      }
    } else if (input && Object.keys(bodyParams).length > 0) {
      body = JSON.stringify(serializeJsonValue(bodyParams, input));
    }
    if (body !== '') {
      headers['content-type'] = 'application/json';
    }

    return {
      method: operation.http.method,
      urlPath,
      query,
      headers,
      body,
    };
  }
}

function splitRequestUri(requestUri: string): [string, Record<string, string>] {
  const index = requestUri.indexOf('?');
  if (index === -1) {
    return [requestUri, {}];
  }
  const fixed: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(requestUri.slice(index + 1))) {
    fixed[key] = value;
  }
  return [requestUri.slice(0, index), fixed];
}

function addQueryValue(
  query: Record<string, string | string[]>,
  name: string,
  value: unknown,
  shape: Shape
): void {
  if (shape.type === 'list' && Array.isArray(value)) {
    query[name] = value.map((item) => scalarToString(item, shape.member));
  } else if (shape.type === 'map' && isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      query[key] = Array.isArray(entry) ? entry.map(String) : String(entry);
    }
  } else {
    query[name] = scalarToString(value, shape);
  }
}

function parseHeaderValue(raw: string, shape: Shape): unknown {
  switch (shape.type) {
    case 'integer':
    case 'long': {
      const parsed = Number.parseInt(raw, 10);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case 'float':
    case 'double': {
      const parsed = Number.parseFloat(raw);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case 'boolean':
      return raw.toLowerCase() === 'true';
    case 'timestamp':
      return toDate(raw);
    default:
      return raw;
  }
}

export class RestJsonResponseParser implements ResponseParser {
  parse(response: HttpResponse, operation: OperationModel): ParsedResponse {
    const requestId = response.headers['x-amzn-requestid'];

    if (response.status >= 300) {
      return {
        output: {},
        error: parseJsonError(response, readErrorBody(response.body)),
        requestId,
      };
    }

    const shape = operation.outputShape;
    if (!shape) {
      return { output: {}, requestId };
    }

    const body = parseJsonBody(response.body);
    const payloadName = shape.payloadMember;
    const output: Record<string, unknown> = {};
    const bodyMembers: Record<string, unknown> = {};

    if (payloadName !== undefined) {
      const payloadShape = shape.members.get(payloadName);
      if (payloadShape) {
        const parsed = parseJsonValue(body, payloadShape);
        if (parsed !== undefined) {
          output[payloadName] = parsed;
        }
      }
    } else {
      Object.assign(bodyMembers, parseJsonOutput(body, shape));
    }

    for (const [name, member] of shape.members) {
      const wireName = member.locationName ?? name;
      if (member.location === 'header') {
        const raw = response.headers[wireName.toLowerCase()];
        if (raw !== undefined) {
          const parsed = parseHeaderValue(raw, member);
          if (parsed !== undefined) {
            output[name] = parsed;
          }
        }
      } else if (member.location === 'headers') {
        const prefix = wireName.toLowerCase();
        const collected: Record<string, string> = {};
        for (const [key, value] of Object.entries(response.headers)) {
          if (key.startsWith(prefix)) {
            collected[key.slice(prefix.length)] = value;
          }
        }
        if (Object.keys(collected).length > 0) {
          output[name] = collected;
        }
      } else if (member.location === 'statusCode') {
        output[name] = response.status;
      } else if (bodyMembers[name] !== undefined) {
        output[name] = bodyMembers[name];
      }
    }

    return { output, requestId };
  }
}
