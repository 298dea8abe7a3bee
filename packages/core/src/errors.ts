/**
 * @title Errors
 * @description Error types for @vastlint/core.
 *
 * Only configuration, parse and document precondition failures surface as
 * thrown errors; everything found inside a well-formed document is
 * recorded in the result tree instead.
 *
 * @module errors
 */

import { getErrorMessage } from "@vastlint/schema";

/**
 * Options for constructing a VastLintError.
 */
export interface VastLintErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all vastlint errors.
 */
export class VastLintError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: VastLintErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "VastLintError";
		this.code = code;
		this.suggestion = options?.suggestion;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * The input holds no document: zero bytes, or no element at all.
 */
export class EmptyDocumentError extends VastLintError {
	constructor(message = "Document is empty") {
		super(message, "EMPTY_DOCUMENT", { suggestion: "Provide a VAST XML document with a root element" });
		this.name = "EmptyDocumentError";
	}
}

/**
 * The markup could not be tokenized into a well-formed tree.
 */
export class MalformedDocumentError extends VastLintError {
	/** One-based line of the failure, when known. */
	readonly line?: number;
	/** One-based column of the failure, when known. */
	readonly column?: number;

	constructor(message: string, options?: { line?: number; column?: number; cause?: unknown }) {
		super(message, "MALFORMED_DOCUMENT", { cause: options?.cause });
		this.name = "MalformedDocumentError";
		this.line = options?.line;
		this.column = options?.column;
	}
}

/**
 * The document root is not the catalog's designated root element.
 */
export class InvalidRootError extends VastLintError {
	readonly expected: string;
	readonly actual: string;

	constructor(expected: string, actual: string) {
		super(`Root element must be <${expected}>, got <${actual}>`, "INVALID_ROOT");
		this.name = "InvalidRootError";
		this.expected = expected;
		this.actual = actual;
	}
}

/**
 * The root element does not declare a version.
 */
export class MissingVersionError extends VastLintError {
	constructor(rootName: string, attribute: string) {
		super(`Missing ${attribute} attribute on <${rootName}>`, "MISSING_VERSION", {
			suggestion: `Declare the document version, e.g. <${rootName} ${attribute}="4.2">`,
		});
		this.name = "MissingVersionError";
	}
}

/**
 * The catalog handed to the engine cannot be used.
 */
export class CatalogError extends VastLintError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "CATALOG_ERROR", {
			suggestion: "Check the catalog passed in the validation options",
			cause: options?.cause,
		});
		this.name = "CatalogError";
	}
}

/**
 * Error related to network operations.
 */
export class NetworkError extends VastLintError {
	/** HTTP status code if available. */
	readonly statusCode?: number;

	constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
		super(message, "NETWORK_ERROR", {
			suggestion: "Check that the asset host is reachable",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
	}
}

/**
 * An asset URL cannot be probed.
 */
export class AssetUrlError extends VastLintError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "ASSET_URL_ERROR", { cause: options?.cause });
		this.name = "AssetUrlError";
	}
}

/**
 * Error thrown when an operation is cancelled by the caller.
 */
export class CancellationError extends VastLintError {
	constructor(message = "Operation cancelled by the caller.") {
		super(message, "CANCELLED");
		this.name = "CancellationError";
	}
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
	return error instanceof CancellationError;
}

/**
 * Check if an error is a VastLintError.
 */
export function isVastLintError(error: unknown): error is VastLintError {
	return error instanceof VastLintError;
}

/**
 * Wrap an unknown error as a VastLintError.
 */
export function wrapError(error: unknown, context?: string): VastLintError {
	if (isVastLintError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";
	return new VastLintError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}

export { getErrorMessage };
