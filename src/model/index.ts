/**
 * Service model module.
 *
 * @module model
 */

export * from './schema.js';
export { Shape, ShapeResolver, type MemberLocation, type ShapeLookup } from './shapes.js';
export { ServiceModel, OperationModel, type HttpBinding } from './service.js';
export { methodNameFor, splitWords, normalizeWaiterName } from './names.js';
export {
  FileLoader,
  InMemoryLoader,
  DEFAULT_DATA_PATH,
  MODEL_FILE_NAMES,
  type Loader,
  type ModelType,
  type InMemoryServiceDocuments,
} from './loader.js';
