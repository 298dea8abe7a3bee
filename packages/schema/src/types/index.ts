/**
 * Public type exports for @vastlint/schema.
 */

export { VAST_VERSIONS, type VastVersion, type Version, isVastVersion } from "./version.js";

export {
	type VersionGated,
	type AttributeSpec,
	type ChildSpec,
	type NodeSpecInit,
	type CatalogOptions,
	DEFAULT_VERSION_ATTRIBUTE,
	NodeSpec,
	Catalog,
	supportsVersion,
} from "./catalog.js";
