/**
 * Loaders for service descriptions and shared data files.
 *
 * @module model/loader
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, DataNotFoundError } from '../error/index.js';

/**
 * Kinds of per-service documents.
 */
export type ModelType = 'service' | 'paginators' | 'waiters';

/**
 * File base names for each model type.
 */
export const MODEL_FILE_NAMES: Readonly<Record<ModelType, string>> = {
  service: 'service-2',
  paginators: 'paginators-1',
  waiters: 'waiters-2',
};

/**
 * Source of declarative documents.
 */
export interface Loader {
  /**
   * Load one document for a service.
   *
   * @param apiVersion - Defaults to the latest available version
   * @throws {DataNotFoundError} If the service, version or document is absent
   */
  loadServiceModel(service: string, type: ModelType, apiVersion?: string): Promise<unknown>;

  /**
   * Load a shared document such as `_retry` or `_endpoints`.
   *
   * @throws {DataNotFoundError} If the document is absent
   */
  loadData(name: string): Promise<unknown>;

  /**
   * API versions available for a service, oldest first.
   */
  listApiVersions(service: string): Promise<string[]>;
}

/**
 * Directory holding the bundled `_retry.json` and `_endpoints.json`.
 */
export const DEFAULT_DATA_PATH = fileURLToPath(new URL('../../data', import.meta.url));

/**
 * Loader reading JSON files from a directory tree:
 *
 * ```text
 * <root>/_retry.json
 * <root>/<service>/<apiVersion>/service-2.json
 * <root>/<service>/<apiVersion>/paginators-1.json
 * <root>/<service>/<apiVersion>/waiters-2.json
 * ```
 *
 * Roots are searched in order; the first hit wins.
 */
export class FileLoader implements Loader {
  private readonly searchPaths: string[];

  constructor(searchPaths: string[] = [DEFAULT_DATA_PATH]) {
    if (searchPaths.length === 0) {
      throw new ConfigurationError('FileLoader requires at least one search path');
    }
    this.searchPaths = [...searchPaths];
  }

  async loadServiceModel(service: string, type: ModelType, apiVersion?: string): Promise<unknown> {
    const version = apiVersion ?? (await this.latestApiVersion(service));
    const relative = join(service, version, `${MODEL_FILE_NAMES[type]}.json`);
    return this.readFirst(relative, `${service}/${version}/${MODEL_FILE_NAMES[type]}`);
  }

  async loadData(name: string): Promise<unknown> {
    return this.readFirst(`${name}.json`, name);
  }

  async listApiVersions(service: string): Promise<string[]> {
    const versions = new Set<string>();
    for (const root of this.searchPaths) {
      const entries = await readdir(join(root, service), { withFileTypes: true }).catch(
        (error: unknown) => {
          if (isNotFound(error)) {
            return [];
          }
          throw error;
        }
      );
      for (const entry of entries) {
        if (entry.isDirectory()) {
          versions.add(entry.name);
        }
      }
    }
    return [...versions].sort();
  }

  private async latestApiVersion(service: string): Promise<string> {
    const versions = await this.listApiVersions(service);
    const latest = versions[versions.length - 1];
    if (latest === undefined) {
      throw new DataNotFoundError(service);
    }
    return latest;
  }

  private async readFirst(relative: string, dataPath: string): Promise<unknown> {
    for (const root of this.searchPaths) {
      let text: string;
      try {
        text = await readFile(join(root, relative), 'utf8');
      } catch (error) {
        if (isNotFound(error)) {
          continue;
        }
        throw error;
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Malformed JSON in ${join(root, relative)}: ${reason}`);
      }
    }
    throw new DataNotFoundError(dataPath);
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Documents for one service, keyed by API version.
 */
export type InMemoryServiceDocuments = Record<string, Partial<Record<ModelType, unknown>>>;

/**
 * Loader backed by in-memory documents, for tests and embedded models.
 *
 * @example
 * ```typescript
 * const loader = new InMemoryLoader()
 *   .addServiceModel('widgets', '2024-01-01', 'service', description)
 *   .addData('_retry', retryRules);
 * ```
 */
export class InMemoryLoader implements Loader {
  private readonly services = new Map<string, InMemoryServiceDocuments>();
  private readonly data = new Map<string, unknown>();

  addServiceModel(service: string, apiVersion: string, type: ModelType, document: unknown): this {
    const versions = this.services.get(service) ?? {};
    versions[apiVersion] = { ...versions[apiVersion], [type]: document };
    this.services.set(service, versions);
    return this;
  }

  addData(name: string, document: unknown): this {
    this.data.set(name, document);
    return this;
  }

  async loadServiceModel(service: string, type: ModelType, apiVersion?: string): Promise<unknown> {
    const versions = await this.listApiVersions(service);
    const version = apiVersion ?? versions[versions.length - 1];
    if (version === undefined) {
      throw new DataNotFoundError(service);
    }
    const document = this.services.get(service)?.[version]?.[type];
    if (document === undefined) {
      throw new DataNotFoundError(`${service}/${version}/${MODEL_FILE_NAMES[type]}`);
    }
    return document;
  }

  async loadData(name: string): Promise<unknown> {
    if (!this.data.has(name)) {
      throw new DataNotFoundError(name);
    }
    return this.data.get(name);
  }

  async listApiVersions(service: string): Promise<string[]> {
    return Object.keys(this.services.get(service) ?? {}).sort();
  }
}
