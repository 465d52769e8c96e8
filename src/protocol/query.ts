/**
 * `query` protocol: form-encoded requests, XML responses.
 *
 * @module protocol/query
 */

import { XMLParser } from 'fast-xml-parser';
import { TransportError } from '../error/index.js';
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
import { decodeBlob, encodeBlob, isRecord, toDate, toIso8601 } from './values.js';

/**
 * Parser options for query protocol responses
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  removeNSPrefix: true,
};

/**
 * Flatten parameters into form fields.
 *
 * Lists become `Name.member.N` (or `Name.N` when flattened), maps become
 * `Name.entry.N.key` / `Name.entry.N.value` (or `Name.N.key` when
 * flattened); N starts at 1.
 *
 * @example
 * ```typescript
 * flattenQueryParams({ Ids: ['a', 'b'] }, shape);
 * // { 'Ids.member.1': 'a', 'Ids.member.2': 'b' }
 * ```
 */
export function flattenQueryParams(
  params: Record<string, unknown>,
  shape: Shape
): Record<string, string> {
  const fields: Record<string, string> = {};
  serializeValue(params, shape, '', fields);
  return fields;
}

function join(prefix: string, name: string): string {
  return prefix === '' ? name : `${prefix}.${name}`;
}

function serializeValue(value: unknown, shape: Shape, prefix: string, fields: Record<string, string>): void {
  if (value === undefined || value === null) {
    return;
  }
  switch (shape.type) {
    case 'structure':
      if (isRecord(value)) {
        for (const [name, member] of shape.members) {
          serializeValue(value[name], member, join(prefix, member.locationName ?? name), fields);
        }
      }
      return;
    case 'list': {
      if (!Array.isArray(value)) {
        return;
      }
      if (value.length === 0) {
        fields[prefix] = '';
        return;
      }
      const itemPrefix = shape.flattened ? prefix : join(prefix, shape.member.locationName ?? 'member');
      value.forEach((item, index) => {
        serializeValue(item, shape.member, `${itemPrefix}.${index + 1}`, fields);
      });
      return;
    }
    case 'map': {
      if (!isRecord(value)) {
        return;
      }
      const entryPrefix = shape.flattened ? prefix : join(prefix, 'entry');
      const keyName = shape.key.locationName ?? 'key';
      const valueName = shape.value.locationName ?? 'value';
      Object.entries(value).forEach(([key, entry], index) => {
        const base = `${entryPrefix}.${index + 1}`;
        fields[`${base}.${keyName}`] = key;
        serializeValue(entry, shape.value, `${base}.${valueName}`, fields);
      });
      return;
    }
    case 'timestamp': {
      const date = toDate(value);
      fields[prefix] = date ? toIso8601(date) : String(value);
      return;
    }
    case 'blob':
      fields[prefix] = encodeBlob(value);
      return;
    case 'boolean':
      fields[prefix] = value ? 'true' : 'false';
      return;
    default:
      fields[prefix] = String(value);
  }
}

/**
 * @example
 * ```typescript
 * new QuerySerializer().serialize({ Ids: ['a'] }, operation).body;
 * // 'Action=DescribeGadgets&Version=2024-01-01&Ids.member.1=a'
 * ```
 */
export class QuerySerializer implements Serializer {
  serialize(params: Record<string, unknown>, operation: OperationModel): RequestEnvelope {
    const form = new URLSearchParams();
    form.set('Action', operation.name);
    form.set('Version', operation.serviceModel.apiVersion);

    const input = operation.inputShape;
    if (input) {
      for (const [key, value] of Object.entries(flattenQueryParams(params, input))) {
        form.append(key, value);
      }
    }

    return {
      method: 'POST',
      urlPath: '/',
      query: {},
      headers: { 'content-type': 'application/x-www-form-urlencoded; charset=utf-8' },
      body: form.toString(),
    };
  }
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Convert a parsed XML node to its output form according to a shape.
 */
export function parseXmlValue(node: unknown, shape: Shape): unknown {
  if (node === undefined || node === null) {
    return undefined;
  }
  switch (shape.type) {
    case 'structure': {
      if (!isRecord(node)) {
        return undefined;
      }
      const result: Record<string, unknown> = {};
      for (const [name, member] of shape.members) {
        const wireName = member.locationName ?? name;
        const parsed =
          member.type === 'list' && member.flattened
            ? parseXmlValue(toArray(node[wireName]), member)
            : parseXmlValue(node[wireName], member);
        if (parsed !== undefined) {
          result[name] = parsed;
        }
      }
      return result;
    }
    case 'list': {
      const items = Array.isArray(node)
        ? node
        : isRecord(node)
          ? toArray(node[shape.member.locationName ?? 'member'])
          : [];
      return items.map((item) => parseXmlValue(item, shape.member));
    }
    case 'map': {
      const entries = shape.flattened ? toArray(node) : isRecord(node) ? toArray(node.entry) : [];
      const keyName = shape.key.locationName ?? 'key';
      const valueName = shape.value.locationName ?? 'value';
      const result: Record<string, unknown> = {};
      for (const entry of entries) {
        if (isRecord(entry)) {
          result[String(entry[keyName])] = parseXmlValue(entry[valueName], shape.value);
        }
      }
      return result;
    }
    case 'integer':
    case 'long': {
      const parsed = Number.parseInt(String(node), 10);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case 'float':
    case 'double': {
      const parsed = Number.parseFloat(String(node));
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case 'boolean':
      return String(node).toLowerCase() === 'true';
    case 'timestamp':
      return toDate(String(node));
    case 'blob':
      return decodeBlob(node);
    case 'string':
      return typeof node === 'string' ? node : String(node);
  }
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Parses `query` protocol XML responses.
 */
export class QueryResponseParser implements ResponseParser {
  private readonly parser = new XMLParser(PARSER_OPTIONS);

  parse(response: HttpResponse, operation: OperationModel): ParsedResponse {
    const document = this.parseDocument(response);

    if (response.status >= 300) {
      return this.parseError(document, response);
    }

    const root = isRecord(document) ? document[`${operation.name}Response`] : undefined;
    const rootRecord = isRecord(root) ? root : {};
    const metadata = rootRecord.ResponseMetadata;
    const requestId = isRecord(metadata) ? textOf(metadata.RequestId) : undefined;

    const shape = operation.outputShape;
    if (!shape) {
      return { output: {}, requestId };
    }
    const wrapper = operation.resultWrapper;
    const resultNode = wrapper ? rootRecord[wrapper] : rootRecord;
    const parsed = parseXmlValue(resultNode === '' ? {} : resultNode, shape);

    return { output: isRecord(parsed) ? parsed : {}, requestId };
  }

  private parseDocument(response: HttpResponse): unknown {
    if (response.body.trim() === '') {
      return {};
    }
    try {
      const document: unknown = this.parser.parse(response.body, true);
      return document;
    } catch (error) {
      if (response.status >= 300) {
        return {};
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Malformed XML response body: ${reason}`, 'malformed-response', error);
    }
  }

  private parseError(document: unknown, response: HttpResponse): ParsedResponse {
    const fallback: ParsedError = { code: String(response.status), message: '' };
    if (!isRecord(document)) {
      return { output: {}, error: fallback };
    }

    // <ErrorResponse><Error>..</Error><RequestId/></ErrorResponse>
    // or <Response><Errors><Error>..</Error></Errors><RequestID/></Response>
    let errorNode: unknown;
    let requestId: string | undefined;
    const errorResponse = document.ErrorResponse;
    const legacy = document.Response;
    if (isRecord(errorResponse)) {
      errorNode = errorResponse.Error;
      requestId = textOf(errorResponse.RequestId);
    } else if (isRecord(legacy)) {
      const errors = legacy.Errors;
      errorNode = isRecord(errors) ? toArray(errors.Error)[0] : undefined;
      requestId = textOf(legacy.RequestID) ?? textOf(legacy.RequestId);
    }

    if (!isRecord(errorNode)) {
      return { output: {}, error: fallback, requestId };
    }

    const error: ParsedError = {
      code: textOf(errorNode.Code) ?? fallback.code,
      message: textOf(errorNode.Message) ?? '',
    };
    const type = textOf(errorNode.Type);
    if (type !== undefined) {
      error.type = type;
    }
    return { output: {}, error, requestId };
  }
}
