import { describe, expect, it } from "vitest";
import {
	addAttributeResult,
	ensureAnalysis,
	markFailure,
	mergeAnalysis,
	type NodeResult,
} from "../../src/validation/results.js";

describe("ensureAnalysis", () => {
	it("creates a passing bucket once", () => {
		const result: NodeResult = { node: "Ad" };

		const first = ensureAnalysis(result, "compliance");
		const second = ensureAnalysis(result, "compliance");

		expect(first).toBe(second);
		expect(result.analyses).toEqual({ compliance: { category: "compliance", status: "pass" } });
	});
});

describe("markFailure", () => {
	it("fails the target and drops empty reasons", () => {
		const bucket: { status: "pass" | "fail" | "info"; reasons?: string[] } = { status: "pass" };

		markFailure(bucket, "first", "", "second");

		expect(bucket).toEqual({ status: "fail", reasons: ["first", "second"] });
	});

	it("fails without reasons", () => {
		const bucket: { status: "pass" | "fail" | "info"; reasons?: string[] } = { status: "pass" };

		markFailure(bucket);

		expect(bucket).toEqual({ status: "fail" });
	});
});

describe("addAttributeResult", () => {
	it("appends in order", () => {
		const analysis = ensureAnalysis({ node: "Ad" }, "compliance");

		addAttributeResult(analysis, { name: "id", status: "pass" });
		addAttributeResult(analysis, { name: "sequence", status: "pass" });

		expect(analysis.attributes?.map((attr) => attr.name)).toEqual(["id", "sequence"]);
	});
});

describe("mergeAnalysis", () => {
	it("stores a new category as a copy", () => {
		const result: NodeResult = { node: "MediaFile" };
		const reasons = ["slow host"];

		mergeAnalysis(result, { category: "latency", status: "fail", reasons });
		reasons.push("later");

		expect(result.analyses?.["latency"]).toEqual({ category: "latency", status: "fail", reasons: ["slow host"] });
	});

	it("never restores a failed bucket", () => {
		const result: NodeResult = { node: "MediaFile" };

		mergeAnalysis(result, { category: "custom", status: "fail", reasons: ["unreachable"] });
		mergeAnalysis(result, { category: "custom", status: "pass", attributes: [{ name: "type", status: "pass" }] });

		expect(result.analyses?.["custom"]).toEqual({
			category: "custom",
			status: "fail",
			reasons: ["unreachable"],
			attributes: [{ name: "type", status: "pass" }],
		});
	});

	it("fails a passing bucket and appends reasons", () => {
		const result: NodeResult = { node: "MediaFile" };

		mergeAnalysis(result, { category: "custom", status: "pass" });
		mergeAnalysis(result, { category: "custom", status: "fail", reasons: ["wrong type"] });

		expect(result.analyses?.["custom"]).toEqual({ category: "custom", status: "fail", reasons: ["wrong type"] });
	});
});
