/**
 * Registry module: run-scoped record of accepted identifiers.
 */

export { IdentifierRegistry } from './registry.js';
