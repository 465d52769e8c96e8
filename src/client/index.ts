/**
 * Client module.
 *
 * @module client
 */

export { BaseClient, type ClientTypeState } from './base-client.js';
export { ClientCreator, ClientType, type ClientCreatorOptions } from './creator.js';
export type {
  ClientCollaborators,
  ClientMeta,
  ClientParts,
  CloneOverrides,
  CreateClientOptions,
  OperationMethod,
  OperationOutput,
} from './types.js';
