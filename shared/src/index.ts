/**
 * Types, validators and reference data shared by the Shovels client packages
 */

export * from './types/index.js';

export { ValidationError, describeError } from './errors.js';

export { validatePaginationOptions, requireParams, toIdList } from './validation.js';

export { US_STATES } from './data/index.js';
