/**
 * @title Validation Results
 * @description Result tree produced by a validation pass.
 *
 * The result tree mirrors the document. Each node carries one analysis
 * bucket per category. Empty collections are left out so that serialised
 * results stay compact.
 *
 * @module validation
 */

import type { Version } from "@vastlint/schema";

/** Category of the catalog-driven structural analysis. */
export const COMPLIANCE_CATEGORY = "compliance";

/** Default category of inspector contributions. */
export const CUSTOM_CATEGORY = "custom";

/** Number of failure reasons kept per category summary. */
export const SUMMARY_REASON_LIMIT = 5;

export type ResultStatus = "pass" | "fail" | "info";

/**
 * Outcome of checking a single attribute.
 */
export interface AttributeResult {
	name: string;
	/** Versions the attribute is valid in, when the catalog knows it. */
	versionSupport?: Version[];
	status: ResultStatus;
	reasons?: string[];
}

/**
 * One analysis bucket of a node.
 */
export interface NodeAnalysisResult {
	category: string;
	status: ResultStatus;
	reasons?: string[];
	attributes?: AttributeResult[];
}

/**
 * Result for one document node.
 */
export interface NodeResult {
	/** Local name of the node. */
	node: string;
	/** Versions the node is valid in, when the catalog knows it. */
	versionSupport?: Version[];
	/** Analysis buckets keyed by category. */
	analyses?: Record<string, NodeAnalysisResult>;
	/** Child results in document order. */
	children?: NodeResult[];
}

/**
 * Whole-tree aggregate for one category.
 */
export interface CategorySummary {
	category: string;
	totalNodes: number;
	failingNodes: number;
	status: ResultStatus;
	/** First failure reasons in document order, capped at {@link SUMMARY_REASON_LIMIT}. */
	reasons?: string[];
}

/**
 * Return value of a successful validation call.
 */
export interface ValidationResult {
	/** Version declared by the document (possibly unsupported). */
	version: Version;
	root: NodeResult;
	summaries?: Record<string, CategorySummary>;
}

/**
 * Get the bucket for a category, creating a passing one if absent.
 */
export function ensureAnalysis(result: NodeResult, category: string): NodeAnalysisResult {
	result.analyses ??= {};
	let analysis = result.analyses[category];
	if (!analysis) {
		analysis = { category, status: "pass" };
		result.analyses[category] = analysis;
	}
	return analysis;
}

/**
 * Flip a bucket (or attribute result) to fail and append reasons.
 * Empty reasons are dropped.
 */
export function markFailure(target: { status: ResultStatus; reasons?: string[] }, ...reasons: string[]): void {
	target.status = "fail";
	for (const reason of reasons) {
		if (reason === "") continue;
		target.reasons ??= [];
		target.reasons.push(reason);
	}
}

export function addAttributeResult(analysis: NodeAnalysisResult, result: AttributeResult): void {
	analysis.attributes ??= [];
	analysis.attributes.push(result);
}

/**
 * Merge an inspector contribution into a node result.
 *
 * A new category is stored as-is (defaulting to {@link CUSTOM_CATEGORY}).
 * For an existing category attribute results are concatenated and a failing
 * contribution fails the bucket; a passing one never restores it.
 */
export function mergeAnalysis(result: NodeResult, contribution: NodeAnalysisResult): void {
	const category = contribution.category || CUSTOM_CATEGORY;
	result.analyses ??= {};
	const existing = result.analyses[category];

	if (!existing) {
		result.analyses[category] = {
			category,
			status: contribution.status,
			...(contribution.reasons?.length ? { reasons: [...contribution.reasons] } : {}),
			...(contribution.attributes?.length ? { attributes: [...contribution.attributes] } : {}),
		};
		return;
	}

	for (const attribute of contribution.attributes ?? []) {
		addAttributeResult(existing, attribute);
	}
	if (contribution.status === "fail") {
		markFailure(existing, ...(contribution.reasons ?? []));
	}
}
