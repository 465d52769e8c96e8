/**
 * Shared setup for client tests.
 */

import { vi } from 'vitest';
import { ClientCreator, type ClientCreatorOptions } from '../creator.js';
import type { CreateClientOptions } from '../types.js';
import { EndpointResolver } from '../../endpoint/resolver.js';
import { StaticCredentialProvider } from '../../credentials/static.js';
import { NoopLogger } from '../../observability/logging.js';
import { MockTransport } from '../../testing/mock-transport.js';
import { widgetsLoader } from '../../__fixtures__/index.js';

export const testEndpointRules = {
  _default: [{ uri: '{scheme}://{service}.{region}.amazonaws.com' }],
  widgets: [
    {
      uri: '{scheme}://widgets.legacy.{region}.amazonaws.com',
      constraints: [['region', 'equals', 'eu-legacy-1']],
      properties: { signatureVersion: 's3v4' },
    },
  ],
};

export const testCredentials = new StaticCredentialProvider({
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
});

export const SIGNING_TIME = new Date('2024-01-02T03:04:05Z');

/**
 * Creator wired to a mock transport, a recording sleep and a fixed clock.
 */
export function createTestCreator(overrides: Partial<ClientCreatorOptions> = {}) {
  const transport = new MockTransport();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const creator = new ClientCreator({
    loader: widgetsLoader(),
    endpointResolver: EndpointResolver.fromRules(testEndpointRules),
    transport,
    sleep,
    logger: new NoopLogger(),
    now: () => SIGNING_TIME,
    invocationId: () => 'test-invocation',
    env: {},
    ...overrides,
  });
  return { creator, transport, sleep };
}

/**
 * A widgets client in us-west-2 signing with the test credentials.
 */
export async function createTestClient(
  options: CreateClientOptions = {},
  creatorOverrides: Partial<ClientCreatorOptions> = {}
) {
  const setup = createTestCreator(creatorOverrides);
  const client = await setup.creator.createClient('widgets', 'us-west-2', {
    credentials: testCredentials,
    ...options,
  });
  return { ...setup, client };
}
