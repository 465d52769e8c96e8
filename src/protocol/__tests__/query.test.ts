import { describe, it, expect } from 'vitest';
import { QueryResponseParser, QuerySerializer, flattenQueryParams } from '../query.js';
import { ServiceModel } from '../../model/service.js';
import { TransportError } from '../../error/index.js';

const gadgets = ServiceModel.fromDescription(
  {
    metadata: {
      apiVersion: '2010-12-01',
      endpointPrefix: 'gadgets',
      protocol: 'query',
      xmlNamespace: 'http://gadgets.example.com/doc/2010-12-01/',
    },
    operations: {
      DescribeGadgets: {
        name: 'DescribeGadgets',
        input: { shape: 'DescribeGadgetsMessage' },
        output: { shape: 'GadgetsDescription', resultWrapper: 'DescribeGadgetsResult' },
      },
      RebootGadget: {
        name: 'RebootGadget',
        input: { shape: 'RebootGadgetMessage' },
      },
    },
    shapes: {
      DescribeGadgetsMessage: {
        type: 'structure',
        members: {
          GadgetIds: { shape: 'IdList' },
          Tags: { shape: 'TagMap' },
          Since: { shape: 'Timestamp' },
          Enabled: { shape: 'Boolean' },
          Names: { shape: 'NameList' },
        },
      },
      RebootGadgetMessage: {
        type: 'structure',
        required: ['GadgetId'],
        members: { GadgetId: { shape: 'String' } },
      },
      GadgetsDescription: {
        type: 'structure',
        members: {
          Gadgets: { shape: 'GadgetList' },
          NextToken: { shape: 'String' },
        },
      },
      Gadget: {
        type: 'structure',
        members: {
          Name: { shape: 'String' },
          Count: { shape: 'Integer' },
          CreatedAt: { shape: 'Timestamp' },
          Active: { shape: 'Boolean' },
        },
      },
      GadgetList: { type: 'list', member: { shape: 'Gadget' } },
      IdList: { type: 'list', member: { shape: 'String' } },
      NameList: { type: 'list', member: { shape: 'String' }, flattened: true },
      TagMap: { type: 'map', key: { shape: 'String' }, value: { shape: 'String' } },
      String: { type: 'string' },
      Integer: { type: 'integer' },
      Boolean: { type: 'boolean' },
      Timestamp: { type: 'timestamp' },
    },
  },
  'gadgets'
);

const describeGadgets = gadgets.operationModel('DescribeGadgets');

function formFields(body: string): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body));
}

describe('flattenQueryParams', () => {
  const input = describeGadgets.inputShape;

  it('should number list members and map entries from 1', () => {
    expect(input).toBeDefined();
    if (!input) return;

    expect(
      flattenQueryParams(
        {
          GadgetIds: ['a', 'b'],
          Tags: { env: 'prod' },
          Since: new Date('2024-01-02T03:04:05Z'),
          Enabled: true,
          Names: ['x'],
        },
        input
      )
    ).toEqual({
      'GadgetIds.member.1': 'a',
      'GadgetIds.member.2': 'b',
      'Tags.entry.1.key': 'env',
      'Tags.entry.1.value': 'prod',
      Since: '2024-01-02T03:04:05Z',
      Enabled: 'true',
      'Names.1': 'x',
    });
  });

  it('should send an empty list as an empty field', () => {
    if (!input) return;
    expect(flattenQueryParams({ GadgetIds: [] }, input)).toEqual({ GadgetIds: '' });
  });
});

describe('QuerySerializer', () => {
  it('should put the action and version first', () => {
    const envelope = new QuerySerializer().serialize({ GadgetIds: ['g-1'] }, describeGadgets);

    expect(envelope.method).toBe('POST');
    expect(envelope.urlPath).toBe('/');
    expect(envelope.headers).toEqual({
      'content-type': 'application/x-www-form-urlencoded; charset=utf-8',
    });
    expect(envelope.body).toBe('Action=DescribeGadgets&Version=2010-12-01&GadgetIds.member.1=g-1');
  });

  it('should encode timestamps in ISO 8601', () => {
    const envelope = new QuerySerializer().serialize(
      { Since: new Date('2024-01-02T03:04:05Z') },
      describeGadgets
    );

    expect(formFields(envelope.body)).toEqual({
      Action: 'DescribeGadgets',
      Version: '2010-12-01',
      Since: '2024-01-02T03:04:05Z',
    });
  });
});

describe('QueryResponseParser', () => {
  const parser = new QueryResponseParser();

  it('should unwrap the result element and convert scalars', () => {
    const body = `<?xml version="1.0" encoding="UTF-8"?>
<DescribeGadgetsResponse xmlns="http://gadgets.example.com/doc/2010-12-01/">
  <DescribeGadgetsResult>
    <Gadgets>
      <member>
        <Name>one</Name>
        <Count>3</Count>
        <CreatedAt>2024-01-02T03:04:05Z</CreatedAt>
        <Active>true</Active>
      </member>
      <member>
        <Name>two</Name>
        <Count>0</Count>
        <Active>false</Active>
      </member>
    </Gadgets>
    <NextToken>tok</NextToken>
  </DescribeGadgetsResult>
  <ResponseMetadata>
    <RequestId>req-9</RequestId>
  </ResponseMetadata>
</DescribeGadgetsResponse>`;

    const parsed = parser.parse({ status: 200, headers: {}, body }, describeGadgets);

    expect(parsed).toEqual({
      output: {
        Gadgets: [
          { Name: 'one', Count: 3, CreatedAt: new Date('2024-01-02T03:04:05Z'), Active: true },
          { Name: 'two', Count: 0, Active: false },
        ],
        NextToken: 'tok',
      },
      requestId: 'req-9',
    });
  });

  it('should read a single list member as a one-element list', () => {
    const body =
      '<DescribeGadgetsResponse><DescribeGadgetsResult><Gadgets><member><Name>solo</Name></member>' +
      '</Gadgets></DescribeGadgetsResult></DescribeGadgetsResponse>';

    const parsed = parser.parse({ status: 200, headers: {}, body }, describeGadgets);

    expect(parsed.output).toEqual({ Gadgets: [{ Name: 'solo' }] });
  });

  it('should return empty output for operations without one', () => {
    const body =
      '<RebootGadgetResponse><ResponseMetadata><RequestId>req-3</RequestId></ResponseMetadata></RebootGadgetResponse>';

    const parsed = parser.parse({ status: 200, headers: {}, body }, gadgets.operationModel('RebootGadget'));

    expect(parsed).toEqual({ output: {}, requestId: 'req-3' });
  });

  it('should parse ErrorResponse documents', () => {
    const body =
      '<ErrorResponse><Error><Type>Sender</Type><Code>InvalidParameterValue</Code>' +
      '<Message>Gadget name is invalid</Message></Error><RequestId>req-err</RequestId></ErrorResponse>';

    const parsed = parser.parse({ status: 400, headers: {}, body }, describeGadgets);

    expect(parsed).toEqual({
      output: {},
      error: { code: 'InvalidParameterValue', message: 'Gadget name is invalid', type: 'Sender' },
      requestId: 'req-err',
    });
  });

  it('should parse legacy Response/Errors documents', () => {
    const body =
      '<Response><Errors><Error><Code>InvalidGadgetID.NotFound</Code><Message>missing</Message></Error>' +
      '</Errors><RequestID>req-legacy</RequestID></Response>';

    const parsed = parser.parse({ status: 400, headers: {}, body }, describeGadgets);

    expect(parsed.error).toEqual({ code: 'InvalidGadgetID.NotFound', message: 'missing' });
    expect(parsed.requestId).toBe('req-legacy');
  });

  it('should fall back to the status code when the error body is not XML', () => {
    const parsed = parser.parse({ status: 503, headers: {}, body: '' }, describeGadgets);
    expect(parsed.error).toEqual({ code: '503', message: '' });
  });

  it('should raise a malformed-response transport error for broken success bodies', () => {
    const body = '<DescribeGadgetsResponse><Unclosed></DescribeGadgetsResponse>';

    expect(() => parser.parse({ status: 200, headers: {}, body }, describeGadgets)).toThrow(TransportError);
  });
});
