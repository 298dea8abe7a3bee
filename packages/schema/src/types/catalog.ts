/**
 * @title Catalog Types
 * @description Declarative, versioned description of valid VAST nodes.
 *
 * A catalog maps node local names to a {@link NodeSpec} listing the versions
 * a node is valid in, its allowed attributes and its allowed children.
 * Catalogs are data: they are built once and only read afterwards.
 *
 * @module types
 */

import type { Version } from "./version.js";

/** Default name of the root attribute carrying the document version. */
export const DEFAULT_VERSION_ATTRIBUTE = "version";

/**
 * Anything gated on a set of versions.
 */
export interface VersionGated {
	/** Versions in which the entry is valid. */
	versions: readonly Version[];
}

/**
 * A valid attribute of a node.
 */
export interface AttributeSpec extends VersionGated {
	name: string;
	/** Whether the attribute must be present. */
	required: boolean;
	/** Whether a blank value is accepted. */
	allowEmpty: boolean;
}

/**
 * A valid parent-child relationship.
 */
export interface ChildSpec extends VersionGated {
	name: string;
	optional: boolean;
	/** Informational only: multiplicity is not enforced. */
	multiple: boolean;
}

/**
 * Check whether a version-gated entry applies to the given version.
 */
export function supportsVersion(entry: VersionGated, version: Version): boolean {
	return entry.versions.includes(version);
}

/**
 * Fields used to construct a {@link NodeSpec}.
 */
export interface NodeSpecInit {
	name: string;
	versions: readonly Version[];
	attributes?: Iterable<AttributeSpec>;
	children?: Iterable<ChildSpec>;
	/** When set, descendants of this node bypass structural checks. */
	allowUnknownChildren?: boolean;
}

/**
 * Validation metadata for a single node.
 */
export class NodeSpec implements VersionGated {
	readonly name: string;
	readonly versions: readonly Version[];
	readonly allowUnknownChildren: boolean;
	private readonly attributeTable: ReadonlyMap<string, AttributeSpec>;
	private readonly childTable: ReadonlyMap<string, ChildSpec>;

	constructor(init: NodeSpecInit) {
		this.name = init.name;
		this.versions = [...init.versions];
		this.allowUnknownChildren = init.allowUnknownChildren ?? false;
		this.attributeTable = new Map([...(init.attributes ?? [])].map((attr) => [attr.name, attr]));
		this.childTable = new Map([...(init.children ?? [])].map((child) => [child.name, child]));
	}

	supportsVersion(version: Version): boolean {
		return supportsVersion(this, version);
	}

	lookupAttribute(name: string): AttributeSpec | undefined {
		return this.attributeTable.get(name);
	}

	lookupChild(name: string): ChildSpec | undefined {
		return this.childTable.get(name);
	}

	/**
	 * All attribute specs, in declaration order.
	 */
	attributes(): AttributeSpec[] {
		return [...this.attributeTable.values()];
	}

	/**
	 * All child specs, in declaration order.
	 */
	children(): ChildSpec[] {
		return [...this.childTable.values()];
	}

	requiredAttributes(): AttributeSpec[] {
		return this.attributes().filter((attr) => attr.required);
	}
}

/**
 * Options for constructing a {@link Catalog}.
 */
export interface CatalogOptions {
	/** Name of the root attribute declaring the document version (default: "version"). */
	versionAttribute?: string;
}

/**
 * Immutable mapping from node local name to {@link NodeSpec}.
 *
 * Lookups are case-sensitive. The entry for {@link Catalog.rootName} is
 * expected to exist; the engine refuses catalogs without it.
 */
export class Catalog {
	readonly rootName: string;
	readonly versionAttribute: string;
	private readonly nodes: ReadonlyMap<string, NodeSpec>;

	constructor(rootName: string, nodes: Iterable<NodeSpec>, options: CatalogOptions = {}) {
		this.rootName = rootName;
		this.versionAttribute = options.versionAttribute ?? DEFAULT_VERSION_ATTRIBUTE;
		this.nodes = new Map([...nodes].map((spec) => [spec.name, spec]));
	}

	lookup(name: string): NodeSpec | undefined {
		return this.nodes.get(name);
	}

	/**
	 * The spec of the designated root element, if the catalog declares one.
	 */
	get rootSpec(): NodeSpec | undefined {
		return this.lookup(this.rootName);
	}

	/**
	 * Versions the catalog accepts as a document version: those of the root spec.
	 */
	supportsVersion(version: Version): boolean {
		return this.rootSpec?.supportsVersion(version) ?? false;
	}

	get size(): number {
		return this.nodes.size;
	}

	names(): string[] {
		return [...this.nodes.keys()];
	}
}
