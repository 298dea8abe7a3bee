/**
 * @title Default Catalog
 * @description The built-in VAST catalog shipped with the package.
 *
 * @module filesystem
 */

import { fileURLToPath } from "node:url";
import type { Catalog } from "../types/catalog.js";
import { parseCatalogFile } from "./catalog-file.js";

/** Location of the built-in catalog definition. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../catalogs/vast.json", import.meta.url));

let defaultCatalog: Catalog | undefined;

/**
 * Load the built-in VAST catalog (3.0 to 4.3). Parsed once, then reused.
 *
 * @returns The default catalog
 * @throws SchemaError if the bundled definition cannot be read
 */
export function loadDefaultCatalog(): Catalog {
	defaultCatalog ??= parseCatalogFile(DEFAULT_CATALOG_PATH);
	return defaultCatalog;
}
