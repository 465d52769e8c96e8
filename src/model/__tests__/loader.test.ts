/**
 * Tests for document loaders
 */

import { describe, it, expect } from 'vitest';
import { FileLoader, InMemoryLoader, DEFAULT_DATA_PATH } from '../loader.js';
import { ConfigurationError, DataNotFoundError } from '../../error/index.js';
import { FIXTURE_MODELS_PATH, widgetsFileLoader } from '../../__fixtures__/index.js';

describe('FileLoader', () => {
  const loader = widgetsFileLoader();

  it('should list API versions oldest first', async () => {
    await expect(loader.listApiVersions('widgets')).resolves.toEqual(['2023-06-01', '2024-01-01']);
  });

  it('should load the latest version by default', async () => {
    const document = await loader.loadServiceModel('widgets', 'service');
    expect(document).toMatchObject({ metadata: { apiVersion: '2024-01-01' } });
  });

  it('should load an explicit version', async () => {
    const document = await loader.loadServiceModel('widgets', 'service', '2023-06-01');
    expect(document).toMatchObject({ metadata: { targetPrefix: 'WidgetService_20230601' } });
  });

  it('should load pagination and waiter documents', async () => {
    await expect(loader.loadServiceModel('widgets', 'paginators')).resolves.toHaveProperty(
      'pagination.DescribeWidgets'
    );
    await expect(loader.loadServiceModel('widgets', 'waiters')).resolves.toHaveProperty(
      'waiters.WidgetAvailable'
    );
  });

  it('should fail with DataNotFoundError for a missing document', async () => {
    await expect(loader.loadServiceModel('widgets', 'waiters', '2023-06-01')).rejects.toThrow(
      'Unable to load data for: widgets/2023-06-01/waiters-2'
    );
  });

  it('should fail with DataNotFoundError for an unknown service', async () => {
    await expect(loader.loadServiceModel('gizmos', 'service')).rejects.toBeInstanceOf(
      DataNotFoundError
    );
  });

  it('should search roots in order', async () => {
    const layered = new FileLoader([FIXTURE_MODELS_PATH, DEFAULT_DATA_PATH]);
    await expect(layered.loadData('_retry')).resolves.toHaveProperty('retry.__default__');
  });

  it('should load bundled endpoint rules from the default path', async () => {
    const bundled = new FileLoader();
    await expect(bundled.loadData('_endpoints')).resolves.toHaveProperty('_default');
  });

  it('should reject an empty search path list', () => {
    expect(() => new FileLoader([])).toThrow(ConfigurationError);
  });
});

describe('InMemoryLoader', () => {
  it('should serve added documents', async () => {
    const loader = new InMemoryLoader()
      .addServiceModel('widgets', '2024-01-01', 'service', { a: 1 })
      .addServiceModel('widgets', '2024-01-01', 'waiters', { b: 2 })
      .addData('_retry', { c: 3 });

    await expect(loader.loadServiceModel('widgets', 'service')).resolves.toEqual({ a: 1 });
    await expect(loader.loadServiceModel('widgets', 'waiters')).resolves.toEqual({ b: 2 });
    await expect(loader.loadData('_retry')).resolves.toEqual({ c: 3 });
  });

  it('should pick the latest version by default', async () => {
    const loader = new InMemoryLoader()
      .addServiceModel('widgets', '2024-01-01', 'service', { v: 'new' })
      .addServiceModel('widgets', '2020-01-01', 'service', { v: 'old' });

    await expect(loader.listApiVersions('widgets')).resolves.toEqual(['2020-01-01', '2024-01-01']);
    await expect(loader.loadServiceModel('widgets', 'service')).resolves.toEqual({ v: 'new' });
  });

  it('should fail with DataNotFoundError for missing documents', async () => {
    const loader = new InMemoryLoader().addServiceModel('widgets', '2024-01-01', 'service', {});

    await expect(loader.loadServiceModel('widgets', 'paginators')).rejects.toThrow(
      'Unable to load data for: widgets/2024-01-01/paginators-1'
    );
    await expect(loader.loadData('_endpoints')).rejects.toBeInstanceOf(DataNotFoundError);
    await expect(loader.loadServiceModel('gizmos', 'service')).rejects.toThrow(
      'Unable to load data for: gizmos'
    );
  });
});
