import { describe, expect, it } from "vitest";
import { SchemaError, getErrorMessage } from "../src/errors.js";

describe("SchemaError", () => {
	it("has a code and no suggestion without a path", () => {
		const error = new SchemaError("Catalog file is empty");

		expect(error.code).toBe("SCHEMA_ERROR");
		expect(error.name).toBe("SchemaError");
		expect(error.suggestion).toBeUndefined();
		expect(error.format()).toBe("SchemaError: Catalog file is empty");
	});

	it("points at the catalog file", () => {
		const error = new SchemaError("Catalog file is empty", { schemaPath: "/catalogs/vast.yml" });

		expect(error.schemaPath).toBe("/catalogs/vast.yml");
		expect(error.suggestion).toBe("Check the catalog file at: /catalogs/vast.yml");
	});
});

describe("getErrorMessage", () => {
	it("reads error messages and stringifies other values", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage(42)).toBe("42");
	});
});
