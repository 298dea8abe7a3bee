import { describe, it, expect } from "vitest";
import {
	VastLintError,
	EmptyDocumentError,
	MalformedDocumentError,
	InvalidRootError,
	MissingVersionError,
	CatalogError,
	NetworkError,
	AssetUrlError,
	CancellationError,
	isCancellationError,
	isVastLintError,
	wrapError,
} from "../src/errors.js";

describe("VastLintError", () => {
	it("creates error with message and code", () => {
		const error = new VastLintError("Test message", "TEST_CODE");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("TEST_CODE");
		expect(error.name).toBe("VastLintError");
		expect(error.suggestion).toBeUndefined();
	});

	it("formats error without suggestion", () => {
		const error = new VastLintError("Test message", "CODE");

		expect(error.format()).toBe("VastLintError: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new VastLintError("Test message", "CODE", { suggestion: "Try this" });

		expect(error.format()).toBe("VastLintError: Test message\n  Suggestion: Try this");
	});

	it("keeps the cause", () => {
		const cause = new Error("root cause");
		const error = new VastLintError("Wrapped", "CODE", { cause });

		expect(error.cause).toBe(cause);
		expect(error instanceof Error).toBe(true);
	});
});

describe("document errors", () => {
	it("EmptyDocumentError has a default message", () => {
		const error = new EmptyDocumentError();

		expect(error.message).toBe("Document is empty");
		expect(error.code).toBe("EMPTY_DOCUMENT");
		expect(error.name).toBe("EmptyDocumentError");
	});

	it("MalformedDocumentError carries the position", () => {
		const error = new MalformedDocumentError("Malformed markup: Unexpected close tag", { line: 3, column: 7 });

		expect(error.code).toBe("MALFORMED_DOCUMENT");
		expect(error.line).toBe(3);
		expect(error.column).toBe(7);
	});

	it("InvalidRootError names both elements", () => {
		const error = new InvalidRootError("VAST", "VMAP");

		expect(error.message).toBe("Root element must be <VAST>, got <VMAP>");
		expect(error.expected).toBe("VAST");
		expect(error.actual).toBe("VMAP");
		expect(error.code).toBe("INVALID_ROOT");
	});

	it("MissingVersionError suggests a declaration", () => {
		const error = new MissingVersionError("VAST", "version");

		expect(error.message).toBe("Missing version attribute on <VAST>");
		expect(error.suggestion).toBe('Declare the document version, e.g. <VAST version="4.2">');
		expect(error.code).toBe("MISSING_VERSION");
	});

	it("CatalogError has its code", () => {
		expect(new CatalogError("no root").code).toBe("CATALOG_ERROR");
	});
});

describe("network errors", () => {
	it("NetworkError carries the status code", () => {
		const error = new NetworkError("HTTP 503", { statusCode: 503 });

		expect(error.statusCode).toBe(503);
		expect(error.code).toBe("NETWORK_ERROR");
	});

	it("AssetUrlError has its code", () => {
		expect(new AssetUrlError("asset URL is empty").code).toBe("ASSET_URL_ERROR");
	});

	it("CancellationError has a default message", () => {
		const error = new CancellationError();

		expect(error.message).toBe("Operation cancelled by the caller.");
		expect(isCancellationError(error)).toBe(true);
		expect(isCancellationError(new NetworkError("x"))).toBe(false);
	});
});

describe("isVastLintError", () => {
	it("returns true for subclasses", () => {
		expect(isVastLintError(new InvalidRootError("VAST", "Ad"))).toBe(true);
	});

	it("returns false for plain errors and other values", () => {
		expect(isVastLintError(new Error("x"))).toBe(false);
		expect(isVastLintError("x")).toBe(false);
	});
});

describe("wrapError", () => {
	it("returns VastLintError unchanged", () => {
		const original = new NetworkError("offline");

		expect(wrapError(original)).toBe(original);
	});

	it("wraps a plain error with context", () => {
		const wrapped = wrapError(new Error("boom"), "Loading catalog");

		expect(wrapped.message).toBe("Loading catalog: boom");
		expect(wrapped.code).toBe("UNKNOWN_ERROR");
	});

	it("wraps non-error values", () => {
		expect(wrapError("plain string").message).toBe("plain string");
	});
});
