/**
 * @vastlint/schema - Versioned catalog of valid VAST nodes.
 *
 * This library provides functionality for:
 * - VAST version definitions
 * - Catalog types (NodeSpec, AttributeSpec, ChildSpec, Catalog)
 * - Catalog definition parsing (JSON and YAML files) and caching
 * - Catalog definition validation (structure and reference checks)
 * - The built-in VAST catalog
 */

// Error exports
export { SchemaError, getErrorMessage } from "./errors.js";

// Type exports
export * from "./types/index.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Validation exports
export * from "./validation/index.js";
