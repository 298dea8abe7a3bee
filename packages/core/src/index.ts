/**
 * @vastlint/core - Validation engine for VAST documents.
 *
 * This library provides functionality for:
 * - Parsing VAST markup into a generic node tree
 * - Validating the tree against a versioned catalog
 * - Pluggable node inspectors, pure and network-capable
 * - Probing media file URLs over HTTP (proxy-aware)
 * - Per-category result summaries
 */

// Error exports
export {
	VastLintError,
	EmptyDocumentError,
	MalformedDocumentError,
	InvalidRootError,
	MissingVersionError,
	CatalogError,
	NetworkError,
	AssetUrlError,
	CancellationError,
	isVastLintError,
	isCancellationError,
	getErrorMessage,
	wrapError,
	type VastLintErrorOptions,
} from "./errors.js";

// Logging exports
export * from "./logging/index.js";

// Parser exports
export * from "./parser/index.js";

// Hook exports
export * from "./hooks/index.js";

// Probe exports
export * from "./probe/index.js";

// Validation exports
export * from "./validation/index.js";

// Proxy exports
export * from "./proxy/index.js";

// Catalog re-exports
export { Catalog, NodeSpec, loadDefaultCatalog, type Version } from "@vastlint/schema";
