/**
 * Tests for operation dispatch, retries and cloning
 */

import { describe, it, expect, vi } from 'vitest';
import { createTestClient, createTestCreator, testCredentials } from './helpers.js';
import {
  ConfigurationError,
  ParamValidationError,
  ServiceError,
  TransportError,
} from '../../error/index.js';
import { SIGNER_HANDLER_ID } from '../../signing/signer.js';
import { MockReply } from '../../testing/mock-transport.js';
import { widgetsLoader } from '../../__fixtures__/index.js';

const serviceUnavailable = MockReply.json(503, {
  __type: 'ServiceUnavailable',
  message: 'Service is busy',
});

describe('BaseClient', () => {
  describe('call', () => {
    it('should return parsed output with response metadata', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(
        MockReply.json(
          200,
          { Widgets: [{ WidgetId: 'w-1', State: 'available' }] },
          { 'x-amzn-requestid': 'req-1' }
        )
      );

      const result = await client.call('DescribeWidgets', {});

      expect(result).toEqual({
        Widgets: [{ WidgetId: 'w-1', State: 'available' }],
        ResponseMetadata: {
          RequestId: 'req-1',
          HTTPStatusCode: 200,
          HTTPHeaders: { 'content-type': 'application/x-amz-json-1.1', 'x-amzn-requestid': 'req-1' },
          RetryAttempts: 0,
        },
      });
    });

    it('should send a signed protocol request', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(MockReply.json(200, {}));

      await client.call('GetWidget', { WidgetId: 'w-1' });

      const [request] = transport.requests;
      expect(request?.url).toBe('https://widgets.us-west-2.amazonaws.com/');
      expect(request?.body).toBe('{"WidgetId":"w-1"}');
      expect(request?.headers['x-amz-target']).toBe('WidgetService_20240101.GetWidget');
      expect(request?.headers['x-amz-date']).toBe('20240102T030405Z');
      expect(request?.headers['amz-sdk-invocation-id']).toBe('test-invocation');
      expect(request?.headers['amz-sdk-request']).toBe('attempt=1');
      expect(request?.headers.authorization).toMatch(
        /^AWS4-HMAC-SHA256 Credential=test-access-key\/20240102\/us-west-2\/widgets\/aws4_request, SignedHeaders=/
      );
    });

    it('should expose one method per operation', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, { Widget: { WidgetId: 'w-1' } }));

      expect(Object.keys(client.operations).sort()).toEqual([
        'createWidget',
        'deleteWidget',
        'describeWidgets',
        'getWidget',
      ]);
      const viaMethod = await client.operations.getWidget({ WidgetId: 'w-1' });
      const viaMethodName = await client.call('getWidget', { WidgetId: 'w-1' });

      expect(viaMethod.Widget).toEqual({ WidgetId: 'w-1' });
      expect(viaMethodName.Widget).toEqual({ WidgetId: 'w-1' });
      expect(transport.callCount).toBe(2);
    });

    it('should reject unknown operations before sending', async () => {
      const { client, transport } = await createTestClient();

      await expect(client.call('ExplodeWidget', {})).rejects.toThrow(
        'Operation not found: widgets.ExplodeWidget'
      );
      expect(transport.callCount).toBe(0);
    });

    it('should keep service error codes and messages verbatim', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(
        MockReply.json(
          400,
          { __type: 'com.example.widgets#WidgetNotFound', message: 'Widget w-9 does not exist.' },
          { 'x-amzn-requestid': 'req-404' }
        )
      );

      const failure = await client.call('GetWidget', { WidgetId: 'w-9' }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ServiceError);
      expect(failure).toMatchObject({
        code: 'WidgetNotFound',
        message: 'Widget w-9 does not exist.',
        statusCode: 400,
        operationName: 'GetWidget',
        requestId: 'req-404',
      });
    });

    it('should fail parameter validation without sending', async () => {
      const { client, transport } = await createTestClient();

      const failure = await client.call('GetWidget', {}).catch((error: unknown) => error);

      if (!(failure instanceof ParamValidationError)) {
        throw new Error('expected a ParamValidationError');
      }
      expect(failure.paths).toEqual(['WidgetId']);
      expect(transport.callCount).toBe(0);
    });

    it('should send nothing when a number is not finite', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, {}));

      const failure = await client
        .call('CreateWidget', { Name: 'gear', Size: Infinity })
        .catch((error: unknown) => error);

      if (!(failure instanceof ParamValidationError)) {
        throw new Error('expected a ParamValidationError');
      }
      expect(failure.issues).toEqual([
        { path: 'Size', message: 'Invalid type: expected integer, got Infinity' },
      ]);
      expect(transport.callCount).toBe(0);
    });

    it('should skip validation when the client config disables it', async () => {
      const { client, transport } = await createTestClient({
        clientConfig: { parameterValidation: false },
      });
      transport.enqueue(MockReply.json(200, {}));

      await client.call('GetWidget', {});

      expect(transport.requests[0]?.body).toBe('{}');
    });
  });

  describe('retries', () => {
    it('should return after exactly four transport calls when three 503s precede success', async () => {
      const { client, transport, sleep } = await createTestClient();
      transport.enqueue(
        serviceUnavailable,
        serviceUnavailable,
        serviceUnavailable,
        MockReply.json(200, { Widgets: [] })
      );

      const result = await client.call('DescribeWidgets', {});

      expect(transport.callCount).toBe(4);
      expect(result.Widgets).toEqual([]);
      expect(result.ResponseMetadata.RetryAttempts).toBe(3);
      expect(sleep.mock.calls).toEqual([[0], [0], [0]]);
      expect(transport.requests.map((request) => request.headers['amz-sdk-request'])).toEqual([
        'attempt=1',
        'attempt=2',
        'attempt=3',
        'attempt=4',
      ]);
    });

    it('should raise the last service error once attempts run out', async () => {
      const { client, transport } = await createTestClient();
      transport.always(serviceUnavailable);

      const failure = await client.call('DescribeWidgets', {}).catch((error: unknown) => error);

      expect(transport.callCount).toBe(4);
      expect(failure).toMatchObject({ code: 'ServiceUnavailable', statusCode: 503, retryable: true });
    });

    it('should raise the last transport error unchanged', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.failure('timeout'));

      const failure = await client.call('DescribeWidgets', {}).catch((error: unknown) => error);

      expect(transport.callCount).toBe(4);
      expect(failure).toBeInstanceOf(TransportError);
      expect(failure).toMatchObject({ reason: 'timeout', message: 'simulated timeout failure' });
    });

    it('should not retry errors no policy covers', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(400, { __type: 'ValidationException', message: 'bad' }));

      await expect(client.call('DescribeWidgets', {})).rejects.toMatchObject({ code: 'ValidationException' });
      expect(transport.callCount).toBe(1);
    });

    it('should make a single attempt without retry rules', async () => {
      const { client, transport } = await createTestClient({}, { loader: widgetsLoader({ retry: null }) });
      transport.always(serviceUnavailable);

      await expect(client.call('DescribeWidgets', {})).rejects.toBeInstanceOf(ServiceError);
      expect(transport.callCount).toBe(1);
    });
  });

  describe('events', () => {
    it('should let before-parameter-build handlers change parameters', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(MockReply.json(200, {}));
      client.meta.events.register({ event: 'before-parameter-build', operation: 'DescribeWidgets' }, ({ params }) => {
        params.MaxResults = 5;
      });

      await client.call('DescribeWidgets', {});

      expect(transport.jsonBody(0)).toEqual({ MaxResults: 5 });
    });

    it('should emit lifecycle events in order', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(MockReply.json(200, {}));
      const seen: string[] = [];
      const { events } = client.meta;
      events.register({ event: 'before-parameter-build' }, () => void seen.push('before-parameter-build'));
      events.register({ event: 'before-call' }, () => void seen.push('before-call'));
      events.register({ event: 'request-created' }, () => void seen.push('request-created'));
      events.register({ event: 'before-sign' }, () => void seen.push('before-sign'));
      events.register({ event: 'after-sign' }, () => void seen.push('after-sign'));
      events.register({ event: 'after-call' }, ({ httpResponse }) => void seen.push(`after-call:${httpResponse.status}`));

      await client.call('GetWidget', { WidgetId: 'w-1' });

      expect(seen).toEqual([
        'before-parameter-build',
        'before-call',
        'request-created',
        'before-sign',
        'after-sign',
        'after-call:200',
      ]);
    });

    it('should register a handler id only once', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, {}));
      const first = vi.fn();
      const second = vi.fn();
      const pattern = { event: 'before-call' as const, service: 'widgets' };

      expect(client.meta.events.register(pattern, first, 'audit')).toBe(true);
      expect(client.meta.events.register(pattern, second, 'audit')).toBe(false);
      await client.call('DescribeWidgets', {});

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
    });

    it('should keep exactly one signer registered', async () => {
      const { client } = await createTestClient();

      const signers = client.meta.events
        .handlersFor('request-created', { service: 'widgets' })
        .filter((entry) => entry.handlerId === SIGNER_HANDLER_ID);

      expect(signers).toHaveLength(1);
    });
  });

  describe('clone', () => {
    it('should keep handlers registered on the clone away from the original', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, {}));
      const clone = client.clone();
      const onClone = vi.fn();
      clone.meta.events.register({ event: 'before-call', service: 'widgets' }, onClone);

      await client.call('DescribeWidgets', {});
      expect(onClone).not.toHaveBeenCalled();

      await clone.call('DescribeWidgets', {});
      expect(onClone).toHaveBeenCalledTimes(1);
    });

    it('should keep handlers registered on the original after cloning away from the clone', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, {}));
      const clone = client.clone();
      const onOriginal = vi.fn();
      client.meta.events.register({ event: 'before-sign' }, onOriginal);

      await clone.call('DescribeWidgets', {});
      expect(onOriginal).not.toHaveBeenCalled();

      await client.call('DescribeWidgets', {});
      expect(onOriginal).toHaveBeenCalledTimes(1);
    });

    it('should announce signing on the clone emitter', async () => {
      const { client, transport } = await createTestClient();
      transport.always(MockReply.json(200, {}));
      const clone = client.clone();
      const onSign = vi.fn();
      clone.meta.events.register({ event: 'after-sign', service: 'widgets' }, onSign);

      await clone.call('DescribeWidgets', {});

      expect(onSign).toHaveBeenCalledTimes(1);
      expect(transport.requests[0]?.headers.authorization).toMatch(/^AWS4-HMAC-SHA256 /);
    });

    it('should share collaborators and keep one signer registration', async () => {
      const { client } = await createTestClient();
      const clone = client.clone();

      expect(clone.meta.endpointUrl).toBe(client.meta.endpointUrl);
      expect(clone.meta.serviceModel).toBe(client.meta.serviceModel);
      expect(clone.meta.events).not.toBe(client.meta.events);
      expect(
        clone.meta.events
          .handlersFor('request-created', { service: 'widgets' })
          .filter((entry) => entry.handlerId === SIGNER_HANDLER_ID)
      ).toHaveLength(1);
    });

    it('should inherit the retry handler', async () => {
      const { client, transport } = await createTestClient();
      transport.enqueue(serviceUnavailable, MockReply.json(200, {}));

      const result = await client.clone().call('DescribeWidgets', {});

      expect(result.ResponseMetadata.RetryAttempts).toBe(1);
      expect(transport.callCount).toBe(2);
    });
  });

  describe('signing', () => {
    it('should fail to sign without a region', async () => {
      const { creator, transport } = createTestCreator();
      transport.always(MockReply.json(200, {}));
      const client = await creator.createClient('widgets', undefined, {
        endpointUrl: 'http://localhost:4566',
        credentials: testCredentials,
      });

      const failure = await client.call('DescribeWidgets', {}).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ConfigurationError);
      expect(transport.callCount).toBe(0);
    });
  });
});
