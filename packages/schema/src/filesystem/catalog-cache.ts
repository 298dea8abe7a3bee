/**
 * @title Catalog Cache Module
 * @description In-memory cache for parsed catalog files.
 *
 * Catalogs are loaded lazily on first access and kept until invalidated.
 *
 * @module filesystem
 */

import type { Catalog } from "../types/catalog.js";
import { parseCatalogFile } from "./catalog-file.js";
import { getErrorMessage } from "../errors.js";

/**
 * Cache for parsed catalog files, keyed by path.
 */
export class CatalogCache {
	private cache = new Map<string, Catalog>();
	private errors = new Map<string, string>();

	/**
	 * Get the catalog stored at a path, parsing it on first access.
	 *
	 * @param catalogPath - Path to the catalog file
	 * @returns Parsed catalog or null if it could not be loaded
	 */
	get(catalogPath: string): Catalog | null {
		const cached = this.cache.get(catalogPath);
		if (cached) {
			return cached;
		}

		try {
			const catalog = parseCatalogFile(catalogPath);
			this.errors.delete(catalogPath);
			this.cache.set(catalogPath, catalog);
			return catalog;
		} catch (error) {
			this.errors.set(catalogPath, getErrorMessage(error));
			return null;
		}
	}

	/**
	 * Get the load error for a catalog path, if any.
	 */
	getError(catalogPath: string): string | null {
		return this.errors.get(catalogPath) ?? null;
	}

	has(catalogPath: string): boolean {
		return this.cache.has(catalogPath);
	}

	invalidate(catalogPath: string): void {
		this.cache.delete(catalogPath);
		this.errors.delete(catalogPath);
	}

	clear(): void {
		this.cache.clear();
		this.errors.clear();
	}
}
