/**
 * @title Catalog File Module
 * @description Catalog parsing from JSON and YAML definition files.
 *
 * Turns a catalog definition into a {@link Catalog}, refusing definitions
 * with error-level findings.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { Catalog, NodeSpec, type AttributeSpec, type ChildSpec } from "../types/catalog.js";
import {
	isRecord,
	resolveVersionList,
	validateCatalogDefinition,
	type CatalogDefinitionFinding,
} from "../validation/catalog-definition.js";
import { SchemaError, getErrorMessage } from "../errors.js";

/**
 * Options for catalog parsing.
 */
export interface CatalogParseOptions {
	/** Source path for error messages. */
	sourcePath?: string;
	/** Called with every non-error finding (warnings and information). */
	onFinding?: (finding: CatalogDefinitionFinding) => void;
}

/**
 * Detect the definition format from a file path based on its extension.
 */
function detectFormat(filePath: string): "json" | "yaml" {
	return filePath.endsWith(".json") ? "json" : "yaml";
}

/**
 * Build a catalog from a parsed definition object.
 *
 * @param raw - Parsed JSON/YAML value
 * @param options - Parse options
 * @returns Catalog
 * @throws SchemaError if the definition has error-level findings
 */
export function parseCatalogDefinition(raw: unknown, options: CatalogParseOptions = {}): Catalog {
	const { sourcePath, onFinding } = options;
	const findings = validateCatalogDefinition(raw);
	const errors = findings.filter((f) => f.severity === "error");

	if (errors.length > 0 || !isRecord(raw)) {
		const detail = errors.map((f) => (f.keyPath ? `${f.keyPath}: ${f.message}` : f.message)).join("; ");
		throw new SchemaError(`Invalid catalog definition: ${detail}`, { schemaPath: sourcePath });
	}

	for (const finding of findings) {
		onFinding?.(finding);
	}

	const groups = raw["versionGroups"];
	const root = raw["root"];
	const versionAttribute = raw["versionAttribute"];
	const nodes = raw["nodes"];

	if (typeof root !== "string" || !isRecord(nodes)) {
		throw new SchemaError("Invalid catalog definition: missing root or nodes", { schemaPath: sourcePath });
	}

	const versionsOf = (value: unknown, keyPath: string): string[] => {
		const resolved = resolveVersionList(value, groups);
		if (resolved.error) {
			throw new SchemaError(`Invalid catalog definition: ${keyPath}: ${resolved.error.message}`, {
				schemaPath: sourcePath,
			});
		}
		return resolved.versions;
	};

	const specs: NodeSpec[] = [];
	for (const [name, node] of Object.entries(nodes)) {
		if (!isRecord(node)) {
			continue;
		}

		const attributes: AttributeSpec[] = [];
		const rawAttributes = node["attributes"];
		if (isRecord(rawAttributes)) {
			for (const [attrName, attr] of Object.entries(rawAttributes)) {
				if (!isRecord(attr)) continue;
				attributes.push({
					name: attrName,
					versions: versionsOf(attr["versions"], `nodes.${name}.attributes.${attrName}`),
					required: attr["required"] === true,
					allowEmpty: attr["allowEmpty"] === true,
				});
			}
		}

		const children: ChildSpec[] = [];
		const rawChildren = node["children"];
		if (isRecord(rawChildren)) {
			for (const [childName, child] of Object.entries(rawChildren)) {
				if (!isRecord(child)) continue;
				children.push({
					name: childName,
					versions: versionsOf(child["versions"], `nodes.${name}.children.${childName}`),
					optional: child["optional"] === true,
					multiple: child["multiple"] === true,
				});
			}
		}

		specs.push(
			new NodeSpec({
				name,
				versions: versionsOf(node["versions"], `nodes.${name}`),
				attributes,
				children,
				allowUnknownChildren: node["allowUnknownChildren"] === true,
			}),
		);
	}

	return new Catalog(root.trim(), specs, {
		versionAttribute: typeof versionAttribute === "string" ? versionAttribute.trim() : undefined,
	});
}

/**
 * Parse catalog content from a YAML or JSON string.
 *
 * @param content - Catalog content (YAML or JSON)
 * @param format - Content format: "yaml" (default) or "json"
 * @param options - Parse options
 * @returns Parsed catalog
 * @throws SchemaError if parsing fails
 */
export function parseCatalogContent(
	content: string,
	format: "yaml" | "json" = "yaml",
	options: CatalogParseOptions = {},
): Catalog {
	let raw: unknown;
	try {
		raw = format === "json" ? JSON.parse(content) : yaml.load(content);
	} catch (error) {
		throw new SchemaError(`Failed to parse catalog: ${getErrorMessage(error)}`, {
			schemaPath: options.sourcePath,
			cause: error,
		});
	}

	if (raw === null || raw === undefined) {
		throw new SchemaError("Catalog file is empty", { schemaPath: options.sourcePath });
	}

	return parseCatalogDefinition(raw, options);
}

/**
 * Parse a catalog file from a path.
 *
 * @param catalogPath - Full path to a .json, .yml or .yaml catalog file
 * @param options - Parse options (sourcePath defaults to catalogPath)
 * @returns Parsed catalog
 * @throws SchemaError if reading or parsing fails
 */
export function parseCatalogFile(catalogPath: string, options: Omit<CatalogParseOptions, "sourcePath"> = {}): Catalog {
	let content: string;
	try {
		content = fs.readFileSync(catalogPath, "utf-8");
	} catch (error) {
		throw new SchemaError(`Failed to read catalog file: ${getErrorMessage(error)}`, {
			schemaPath: catalogPath,
			cause: error,
		});
	}
	return parseCatalogContent(content, detectFormat(catalogPath), { ...options, sourcePath: catalogPath });
}
