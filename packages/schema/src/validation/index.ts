/**
 * @title Validation Module
 * @description Barrel export for catalog definition validation.
 *
 * @module validation
 */

export {
	validateCatalogDefinition,
	resolveVersionList,
	isRecord,
	ALLOWED_TOP_LEVEL_KEYS,
	ALLOWED_NODE_KEYS,
	ALLOWED_ATTRIBUTE_KEYS,
	ALLOWED_CHILD_KEYS,
} from "./catalog-definition.js";

export type {
	CatalogDefinitionSeverity,
	CatalogDefinitionFinding,
	VersionListResolution,
} from "./catalog-definition.js";
