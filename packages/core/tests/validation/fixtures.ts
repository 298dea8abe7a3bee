import { Catalog, NodeSpec } from "@vastlint/schema";
import type { NodeResult } from "../../src/validation/results.js";

export const V4 = ["4.0", "4.1", "4.2", "4.3"];

/**
 * Small catalog: Root (version required) holding Child (4.2+), Ext and Asset.
 */
export function createTestCatalog(): Catalog {
	return new Catalog("Root", [
		new NodeSpec({
			name: "Root",
			versions: V4,
			attributes: [{ name: "version", versions: V4, required: true, allowEmpty: false }],
			children: [
				{ name: "Child", versions: ["4.2", "4.3"], optional: true, multiple: true },
				{ name: "Ext", versions: V4, optional: true, multiple: false },
			],
		}),
		new NodeSpec({
			name: "Child",
			versions: V4,
			attributes: [
				{ name: "id", versions: V4, required: false, allowEmpty: false },
				{ name: "label", versions: ["4.3"], required: false, allowEmpty: true },
			],
		}),
		new NodeSpec({
			name: "Ext",
			versions: V4,
			allowUnknownChildren: true,
			children: [{ name: "Child", versions: V4, optional: true, multiple: true }],
		}),
	]);
}

/**
 * First node with the given name, in pre-order.
 */
export function findNode(root: NodeResult, name: string): NodeResult | undefined {
	if (root.node === name) {
		return root;
	}
	for (const child of root.children ?? []) {
		const found = findNode(child, name);
		if (found) {
			return found;
		}
	}
	return undefined;
}
