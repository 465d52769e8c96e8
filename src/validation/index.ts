/**
 * Validation module.
 *
 * @module validation
 */

export { ParamValidator } from './validator.js';
