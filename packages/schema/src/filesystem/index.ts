/**
 * Catalog file parsing, caching and the built-in catalog.
 */

export {
	parseCatalogDefinition,
	parseCatalogContent,
	parseCatalogFile,
	type CatalogParseOptions,
} from "./catalog-file.js";
export { CatalogCache } from "./catalog-cache.js";
export { loadDefaultCatalog, DEFAULT_CATALOG_PATH } from "./default-catalog.js";
