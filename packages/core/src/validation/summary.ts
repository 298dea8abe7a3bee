/**
 * @title Category Summaries
 * @description Whole-tree aggregation of node analyses per category.
 *
 * @module validation
 */

import { SUMMARY_REASON_LIMIT, type CategorySummary, type NodeResult } from "./results.js";

/**
 * Summarize every category found in a result tree.
 *
 * Nodes are visited in pre-order, so sampled reasons follow document order.
 *
 * @returns Summaries keyed by category, or undefined when no node has an analysis
 */
export function summarizeCategories(root: NodeResult): Record<string, CategorySummary> | undefined {
	const summaries: Record<string, CategorySummary> = {};
	let found = false;

	const walk = (node: NodeResult): void => {
		for (const [category, analysis] of Object.entries(node.analyses ?? {})) {
			let summary = summaries[category];
			if (!summary) {
				summary = { category, totalNodes: 0, failingNodes: 0, status: "pass" };
				summaries[category] = summary;
				found = true;
			}

			summary.totalNodes++;
			if (analysis.status !== "fail") {
				continue;
			}
			summary.failingNodes++;
			summary.status = "fail";
			for (const reason of analysis.reasons ?? []) {
				if ((summary.reasons?.length ?? 0) >= SUMMARY_REASON_LIMIT) break;
				summary.reasons ??= [];
				summary.reasons.push(reason);
			}
		}

		for (const child of node.children ?? []) {
			walk(child);
		}
	};

	walk(root);
	return found ? summaries : undefined;
}
