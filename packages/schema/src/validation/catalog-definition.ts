/**
 * @title Catalog Definition Validation
 * @description Pure validation logic for catalog definition files.
 *
 * Checks the structure and references of a parsed catalog definition
 * (JSON or YAML) before it is turned into a {@link Catalog}. Returns an
 * array of findings with severity levels.
 *
 * @module validation
 */

import { isVastVersion } from "../types/version.js";

/**
 * Severity level for a catalog definition finding.
 */
export type CatalogDefinitionSeverity = "error" | "warning" | "information";

/**
 * A single finding from catalog definition analysis.
 */
export interface CatalogDefinitionFinding {
	/** Human-readable description of the issue. */
	message: string;
	severity: CatalogDefinitionSeverity;
	/** Machine-readable code identifying the check. */
	code: string;
	/** Dot-separated key path to the problematic location. */
	keyPath?: string;
}

export const ALLOWED_TOP_LEVEL_KEYS = new Set(["$schema", "root", "versionAttribute", "versionGroups", "nodes"]);
export const ALLOWED_NODE_KEYS = new Set(["versions", "allowUnknownChildren", "attributes", "children"]);
export const ALLOWED_ATTRIBUTE_KEYS = new Set(["versions", "required", "allowEmpty"]);
export const ALLOWED_CHILD_KEYS = new Set(["versions", "optional", "multiple"]);

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Outcome of resolving a `versions` entry.
 */
export type VersionListResolution =
	| { versions: string[]; error?: undefined }
	| { versions?: undefined; error: { code: string; message: string } };

/**
 * Resolve a `versions` entry: either the name of a version group or an
 * explicit list of version strings.
 *
 * @param value - Raw `versions` value
 * @param groups - Raw `versionGroups` object (may be undefined)
 */
export function resolveVersionList(value: unknown, groups: unknown): VersionListResolution {
	if (typeof value === "string") {
		const group = isRecord(groups) ? groups[value] : undefined;
		if (group === undefined) {
			return { error: { code: "unknown-version-group", message: `Unknown version group "${value}".` } };
		}
		return resolveVersionList(group, undefined);
	}

	if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
		return {
			error: {
				code: "invalid-versions",
				message: '"versions" must be a version group name or an array of version strings.',
			},
		};
	}

	return { versions: value.map((v) => v.trim()) };
}

/**
 * Validate a parsed catalog definition and return all findings.
 *
 * @param parsed - The parsed YAML/JSON object.
 * @returns Array of findings (empty when the definition is sound).
 */
export function validateCatalogDefinition(parsed: unknown): CatalogDefinitionFinding[] {
	if (!isRecord(parsed)) {
		return [
			{
				message: "Catalog definition must be an object.",
				severity: "error",
				code: "invalid-root-type",
			},
		];
	}

	const findings: CatalogDefinitionFinding[] = [];

	for (const key of Object.keys(parsed)) {
		if (!ALLOWED_TOP_LEVEL_KEYS.has(key)) {
			findings.push({
				message: `Unknown top-level key "${key}".`,
				severity: "warning",
				code: "unknown-top-level-key",
				keyPath: key,
			});
		}
	}

	const root = parsed["root"];
	if (typeof root !== "string" || root.trim() === "") {
		findings.push({
			message: '"root" must name the document root element.',
			severity: "error",
			code: "missing-root",
			keyPath: "root",
		});
	}

	const versionAttribute = parsed["versionAttribute"];
	if (versionAttribute !== undefined && (typeof versionAttribute !== "string" || versionAttribute.trim() === "")) {
		findings.push({
			message: '"versionAttribute" must be a non-empty string.',
			severity: "error",
			code: "invalid-version-attribute",
			keyPath: "versionAttribute",
		});
	}

	const groups = parsed["versionGroups"];
	if (groups !== undefined) {
		if (isRecord(groups)) {
			for (const [name, list] of Object.entries(groups)) {
				checkVersions(list, undefined, `versionGroups.${name}`, findings);
			}
		} else {
			findings.push({
				message: '"versionGroups" must be an object.',
				severity: "error",
				code: "invalid-version-groups",
				keyPath: "versionGroups",
			});
		}
	}

	const nodes = parsed["nodes"];
	if (!isRecord(nodes)) {
		findings.push({
			message: '"nodes" must be an object keyed by node name.',
			severity: "error",
			code: "invalid-nodes",
			keyPath: "nodes",
		});
		return findings;
	}

	if (typeof root === "string" && root.trim() !== "" && !(root in nodes)) {
		findings.push({
			message: `Root element "${root}" has no entry in "nodes".`,
			severity: "error",
			code: "root-node-missing",
			keyPath: "nodes",
		});
	}

	for (const [name, node] of Object.entries(nodes)) {
		validateNode(name, node, nodes, groups, findings);
	}

	return findings;
}

function validateNode(
	name: string,
	node: unknown,
	nodes: Record<string, unknown>,
	groups: unknown,
	findings: CatalogDefinitionFinding[],
): void {
	const path = `nodes.${name}`;
	if (!isRecord(node)) {
		findings.push({ message: `Node "${name}" must be an object.`, severity: "error", code: "invalid-node", keyPath: path });
		return;
	}

	checkUnknownKeys(node, ALLOWED_NODE_KEYS, path, "unknown-node-key", findings);
	checkVersions(node["versions"], groups, `${path}.versions`, findings);
	checkFlag(node, "allowUnknownChildren", path, findings);

	const attributes = node["attributes"];
	if (attributes !== undefined) {
		if (isRecord(attributes)) {
			for (const [attrName, attr] of Object.entries(attributes)) {
				const attrPath = `${path}.attributes.${attrName}`;
				if (!isRecord(attr)) {
					findings.push({
						message: `Attribute "${attrName}" of "${name}" must be an object.`,
						severity: "error",
						code: "invalid-attribute",
						keyPath: attrPath,
					});
					continue;
				}
				checkUnknownKeys(attr, ALLOWED_ATTRIBUTE_KEYS, attrPath, "unknown-attribute-key", findings);
				checkVersions(attr["versions"], groups, `${attrPath}.versions`, findings);
				checkFlag(attr, "required", attrPath, findings);
				checkFlag(attr, "allowEmpty", attrPath, findings);
			}
		} else {
			findings.push({
				message: `"attributes" of "${name}" must be an object.`,
				severity: "error",
				code: "invalid-attributes",
				keyPath: `${path}.attributes`,
			});
		}
	}

	const children = node["children"];
	if (children !== undefined) {
		if (isRecord(children)) {
			for (const [childName, child] of Object.entries(children)) {
				const childPath = `${path}.children.${childName}`;
				if (!isRecord(child)) {
					findings.push({
						message: `Child "${childName}" of "${name}" must be an object.`,
						severity: "error",
						code: "invalid-child",
						keyPath: childPath,
					});
					continue;
				}
				checkUnknownKeys(child, ALLOWED_CHILD_KEYS, childPath, "unknown-child-key", findings);
				checkVersions(child["versions"], groups, `${childPath}.versions`, findings);
				checkFlag(child, "optional", childPath, findings);
				checkFlag(child, "multiple", childPath, findings);
				if (!(childName in nodes)) {
					findings.push({
						message: `Child "${childName}" of "${name}" is not declared in "nodes".`,
						severity: "warning",
						code: "undeclared-child",
						keyPath: childPath,
					});
				}
			}
		} else {
			findings.push({
				message: `"children" of "${name}" must be an object.`,
				severity: "error",
				code: "invalid-children",
				keyPath: `${path}.children`,
			});
		}
	}
}

function checkUnknownKeys(
	value: Record<string, unknown>,
	allowed: Set<string>,
	path: string,
	code: string,
	findings: CatalogDefinitionFinding[],
): void {
	for (const key of Object.keys(value)) {
		if (!allowed.has(key)) {
			findings.push({ message: `Unknown key "${key}".`, severity: "warning", code, keyPath: `${path}.${key}` });
		}
	}
}

function checkFlag(value: Record<string, unknown>, key: string, path: string, findings: CatalogDefinitionFinding[]): void {
	const flag = value[key];
	if (flag !== undefined && typeof flag !== "boolean") {
		findings.push({
			message: `"${key}" must be a boolean.`,
			severity: "error",
			code: "invalid-flag",
			keyPath: `${path}.${key}`,
		});
	}
}

function checkVersions(value: unknown, groups: unknown, path: string, findings: CatalogDefinitionFinding[]): void {
	const resolved = resolveVersionList(value, groups);
	if (resolved.error) {
		findings.push({ ...resolved.error, severity: "error", keyPath: path });
		return;
	}
	// Group members are reported once, under versionGroups.
	if (typeof value === "string") {
		return;
	}
	for (const version of resolved.versions) {
		if (!isVastVersion(version)) {
			findings.push({
				message: `Version "${version}" is not a known VAST version.`,
				severity: "information",
				code: "unknown-version",
				keyPath: path,
			});
		}
	}
}
