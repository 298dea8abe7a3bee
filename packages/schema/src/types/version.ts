/**
 * @title VAST Versions
 * @description The closed set of VAST specification versions.
 *
 * Versions are opaque comparison keys: the catalog gates nodes, attributes
 * and child relationships on them, but never orders or parses them.
 *
 * @module types
 */

/** Every VAST version a document may declare. */
export const VAST_VERSIONS = ["2.0", "3.0", "4.0", "4.1", "4.2", "4.3"] as const;

/**
 * A known VAST specification version.
 */
export type VastVersion = (typeof VAST_VERSIONS)[number];

/**
 * A version string as declared by a document or a catalog.
 * Documents may declare versions outside {@link VAST_VERSIONS}.
 */
export type Version = string;

const KNOWN_VERSIONS: ReadonlySet<string> = new Set(VAST_VERSIONS);

/**
 * Check whether a version string is one of the known VAST versions.
 */
export function isVastVersion(value: string): value is VastVersion {
	return KNOWN_VERSIONS.has(value);
}
