/**
 * Shared fixtures for tests.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { FileLoader, InMemoryLoader } from '../model/loader.js';

export const FIXTURE_MODELS_PATH = fileURLToPath(new URL('./models', import.meta.url));

function readFixture(relative: string): unknown {
  return JSON.parse(readFileSync(new URL(`./models/${relative}`, import.meta.url), 'utf8'));
}

export const widgetsDescription = readFixture('widgets/2024-01-01/service-2.json');
export const widgetsPaginators = readFixture('widgets/2024-01-01/paginators-1.json');
export const widgetsWaiters = readFixture('widgets/2024-01-01/waiters-2.json');

/**
 * Retry rules used by client tests: up to 4 attempts on 503 and throttling,
 * with no delay.
 */
export const testRetryRules = {
  definitions: {
    service_unavailable: {
      appliesWhen: { response: { httpStatusCode: 503 } },
    },
  },
  retry: {
    __default__: {
      maxAttempts: 4,
      delay: { type: 'exponential', base: 0, growthFactor: 2 },
      policies: {
        serviceUnavailable: { $ref: 'service_unavailable' },
        throttling: { appliesWhen: { response: { serviceErrorCode: 'Throttling' } } },
        socketErrors: { appliesWhen: { socketErrors: ['connection', 'timeout'] } },
      },
    },
  },
};

export function widgetsFileLoader(): FileLoader {
  return new FileLoader([FIXTURE_MODELS_PATH]);
}

/**
 * In-memory loader with the widgets documents and the test retry rules.
 * Pass `retry: null` to leave `_retry` out.
 */
export function widgetsLoader(
  options: { paginators?: boolean; waiters?: boolean; retry?: unknown } = {}
): InMemoryLoader {
  const loader = new InMemoryLoader().addServiceModel(
    'widgets',
    '2024-01-01',
    'service',
    widgetsDescription
  );
  if (options.paginators ?? true) {
    loader.addServiceModel('widgets', '2024-01-01', 'paginators', widgetsPaginators);
  }
  if (options.waiters ?? true) {
    loader.addServiceModel('widgets', '2024-01-01', 'waiters', widgetsWaiters);
  }
  if (options.retry !== null) {
    loader.addData('_retry', options.retry ?? testRetryRules);
  }
  return loader;
}
