/**
 * Tests for service model views
 */

import { describe, it, expect } from 'vitest';
import { ServiceModel } from '../service.js';
import { methodNameFor, normalizeWaiterName, splitWords } from '../names.js';
import { ConfigurationError } from '../../error/index.js';
import { widgetsDescription } from '../../__fixtures__/index.js';

describe('ServiceModel', () => {
  const model = ServiceModel.fromDescription(widgetsDescription, 'widgets');

  describe('metadata', () => {
    it('should expose service metadata', () => {
      expect(model.serviceName).toBe('widgets');
      expect(model.endpointPrefix).toBe('widgets');
      expect(model.apiVersion).toBe('2024-01-01');
      expect(model.protocol).toBe('json');
      expect(model.signatureVersion).toBe('v4');
      expect(model.metadata.targetPrefix).toBe('WidgetService_20240101');
    });

    it('should default signing name to endpoint prefix', () => {
      expect(model.signingName).toBe('widgets');
    });

    it('should list operations in declaration order', () => {
      expect(model.operationNames).toEqual([
        'CreateWidget',
        'DeleteWidget',
        'DescribeWidgets',
        'GetWidget',
      ]);
    });

    it('should default signature version to v4 when absent', () => {
      const minimal = ServiceModel.fromDescription({
        metadata: { apiVersion: '1', endpointPrefix: 'mini', protocol: 'json' },
        operations: {},
      });
      expect(minimal.signatureVersion).toBe('v4');
      expect(minimal.serviceName).toBe('mini');
    });
  });

  describe('validation', () => {
    it('should reject descriptions without metadata', () => {
      expect(() => ServiceModel.fromDescription({ operations: {} }, 'broken')).toThrow(
        ConfigurationError
      );
    });

    it('should name the offending field', () => {
      expect(() =>
        ServiceModel.fromDescription(
          {
            metadata: { apiVersion: '1', endpointPrefix: 'x', protocol: 'json' },
            operations: {},
            shapes: { Items: { type: 'list' } },
          },
          'broken'
        )
      ).toThrow(/shapes\.Items: list shapes require "member"/);
    });
  });

  describe('operationModel', () => {
    it('should resolve input and output shapes', () => {
      const operation = model.operationModel('DescribeWidgets');

      expect(operation.name).toBe('DescribeWidgets');
      expect(operation.http).toEqual({ method: 'POST', requestUri: '/' });
      expect([...(operation.inputShape?.members.keys() ?? [])]).toEqual([
        'Filters',
        'MaxResults',
        'NextToken',
      ]);
      expect(operation.outputShape?.name).toBe('DescribeWidgetsResponse');
    });

    it('should return the same instance on repeated lookups', () => {
      expect(model.operationModel('GetWidget')).toBe(model.operationModel('GetWidget'));
    });

    it('should report declared error codes', () => {
      const codes = model.operationModel('GetWidget').errorShapes.map((shape) => shape.errorCode);
      expect(codes).toEqual(['WidgetNotFound']);
    });

    it('should leave output undefined for operations without one', () => {
      expect(model.operationModel('DeleteWidget').outputShape).toBeUndefined();
    });

    it('should throw for unknown operations', () => {
      expect(() => model.operationModel('LaunchRocket')).toThrow(
        'Operation not found: widgets.LaunchRocket'
      );
    });
  });

  describe('shapes', () => {
    it('should resolve recursive shapes lazily', () => {
      const widget = model.shapeFor('Widget');
      const children = widget.members.get('Children');

      expect(children?.type).toBe('list');
      expect(children?.member.name).toBe('Widget');
      expect(children?.member.members.get('Children')?.member.name).toBe('Widget');
    });

    it('should expose constraints', () => {
      const name = model.shapeFor('WidgetName');
      expect(name.min).toBe(1);
      expect(name.max).toBe(64);
      expect(model.shapeFor('Color').enum).toEqual(['red', 'green', 'blue']);
      expect(model.shapeFor('CreateWidgetRequest').required).toEqual(['Name']);
    });

    it('should expose map key and value shapes', () => {
      const tags = model.shapeFor('TagMap');
      expect(tags.key.type).toBe('string');
      expect(tags.value.type).toBe('string');
    });

    it('should throw when a non-list shape is asked for its member', () => {
      expect(() => model.shapeFor('String').member).toThrow('Shape String is not a list');
    });

    it('should throw for unknown shapes', () => {
      expect(() => model.shapeFor('Gizmo')).toThrow('Shape not found: Gizmo');
    });
  });
});

describe('names', () => {
  it('should convert operation names to method names', () => {
    expect(methodNameFor('DescribeWidgets')).toBe('describeWidgets');
    expect(methodNameFor('DescribeDBInstances')).toBe('describeDbInstances');
    expect(methodNameFor('ListV2Objects')).toBe('listV2Objects');
    expect(methodNameFor('GetWidget')).toBe('getWidget');
  });

  it('should split on case boundaries and separators', () => {
    expect(splitWords('HTTPResponseCode')).toEqual(['HTTP', 'Response', 'Code']);
    expect(splitWords('widget_ready')).toEqual(['widget', 'ready']);
  });

  it('should normalize waiter names regardless of format', () => {
    expect(normalizeWaiterName('widgetReady')).toBe('widgetready');
    expect(normalizeWaiterName('WidgetReady')).toBe('widgetready');
    expect(normalizeWaiterName('widget_ready')).toBe('widgetready');
  });
});
