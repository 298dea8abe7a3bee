/**
 * @title Validation Engine
 * @description Walks a parsed document against a catalog and runs inspectors.
 *
 * Every node is visited once, depth-first in document order. Structural
 * findings land in the {@link COMPLIANCE_CATEGORY} bucket of each node;
 * inspectors contribute buckets of their own. Only empty, unparseable or
 * rootless documents reject; everything else is recorded in the result.
 *
 * @module validation
 */

import type { Catalog, NodeSpec, Version } from "@vastlint/schema";
import { supportsVersion } from "@vastlint/schema";
import { CatalogError, EmptyDocumentError, InvalidRootError, MissingVersionError, getErrorMessage } from "../errors.js";
import { createDefaultHookRegistry } from "../hooks/defaults.js";
import type { HookRegistry } from "../hooks/registry.js";
import type { NodeContext, NodeInspector } from "../hooks/types.js";
import { getAttribute, parseDocument, type DocumentAttribute, type DocumentNode } from "../parser/tree.js";
import { createDeadline } from "../probe/http.js";
import {
	COMPLIANCE_CATEGORY,
	CUSTOM_CATEGORY,
	addAttributeResult,
	ensureAnalysis,
	markFailure,
	mergeAnalysis,
	type AttributeResult,
	type NodeAnalysisResult,
	type NodeResult,
	type ValidationResult,
} from "./results.js";
import {
	mergeValidateOptions,
	resolveValidateOptions,
	type ResolvedValidateOptions,
	type ValidateOptions,
} from "./options.js";
import { summarizeCategories } from "./summary.js";

/**
 * State carried through one traversal.
 */
interface Traversal {
	version: Version;
	options: ResolvedValidateOptions;
	visited: number;
}

/**
 * Namespace declarations, `xml:` attributes and XML Schema instance
 * attributes. Only left out of attribute checks on request.
 */
function isNamespaceAttribute(attr: DocumentAttribute): boolean {
	const name = attr.qualifiedName;
	return name === "xmlns" || name.startsWith("xmlns:") || name.startsWith("xml:") || name.startsWith("xsi:");
}

function checkStructure(
	node: DocumentNode,
	spec: NodeSpec | undefined,
	parentSpec: NodeSpec | undefined,
	insideUnknown: boolean,
	version: Version,
	analysis: NodeAnalysisResult,
): void {
	if (!spec) {
		if (!insideUnknown) {
			markFailure(analysis, `node ${node.name} is not recognized by the catalog`);
		}
		return;
	}

	if (!spec.supportsVersion(version)) {
		markFailure(analysis, `node ${node.name} is not supported in version ${version}`);
	}

	if (parentSpec && !insideUnknown) {
		const childSpec = parentSpec.lookupChild(node.name);
		if (!childSpec) {
			markFailure(analysis, `node ${node.name} is not a valid child of ${parentSpec.name}`);
		} else if (!supportsVersion(childSpec, version)) {
			markFailure(analysis, `node ${node.name} is not allowed under ${parentSpec.name} in version ${version}`);
		}
	}
}

function checkAttributes(
	node: DocumentNode,
	spec: NodeSpec | undefined,
	version: Version,
	analysis: NodeAnalysisResult,
	ignoreNamespaceAttributes: boolean,
): void {
	const seen = new Set<string>();

	for (const attr of node.attributes) {
		if (ignoreNamespaceAttributes && isNamespaceAttribute(attr)) {
			continue;
		}
		seen.add(attr.name);
		const result: AttributeResult = { name: attr.name, status: "pass" };

		const attrSpec = spec?.lookupAttribute(attr.name);
		if (!spec) {
			const reason = `node is not recognized; attribute ${attr.name} cannot be validated`;
			markFailure(result, reason);
			markFailure(analysis, reason);
		} else if (!attrSpec) {
			const reason = `attribute ${attr.name} is not allowed on ${spec.name}`;
			markFailure(result, reason);
			markFailure(analysis, reason);
		} else {
			result.versionSupport = [...attrSpec.versions];
			if (!supportsVersion(attrSpec, version)) {
				const reason = `attribute ${attr.name} is not supported in version ${version}`;
				markFailure(result, reason);
				markFailure(analysis, reason);
			}
			if (attr.value.trim() === "" && !attrSpec.allowEmpty) {
				const reason = `attribute ${attr.name} cannot be empty`;
				markFailure(result, reason);
				markFailure(analysis, reason);
			}
		}

		addAttributeResult(analysis, result);
	}

	for (const required of spec?.requiredAttributes() ?? []) {
		if (seen.has(required.name)) {
			continue;
		}
		const reason = `missing required attribute ${required.name}`;
		addAttributeResult(analysis, {
			name: required.name,
			versionSupport: [...required.versions],
			status: "fail",
			reasons: [reason],
		});
		markFailure(analysis, reason);
	}
}

function createNodeContext(node: DocumentNode, version: Version): NodeContext {
	return {
		name: node.name,
		text: node.text,
		attributes: node.attributes,
		version,
		attribute: (name) => getAttribute(node, name),
	};
}

function recordInspectorFailure(result: NodeResult, inspector: NodeInspector, error: unknown, traversal: Traversal): void {
	const message = getErrorMessage(error);
	traversal.options.logger.debug(`${inspector.kind} inspector for ${result.node} failed: ${message}`);
	mergeAnalysis(result, { category: CUSTOM_CATEGORY, status: "fail", reasons: [message] });
}

async function runInspectors(node: DocumentNode, result: NodeResult, traversal: Traversal): Promise<void> {
	const { options } = traversal;
	const context = createNodeContext(node, traversal.version);

	for (const inspector of options.hooks.pureInspectors(node.name)) {
		try {
			const contribution = inspector.inspect(context);
			if (contribution) {
				mergeAnalysis(result, contribution);
			}
		} catch (error) {
			recordInspectorFailure(result, inspector, error, traversal);
		}
	}

	if (!options.runNetwork) {
		return;
	}
	const networkInspectors = options.hooks.networkInspectors(node.name);
	if (networkInspectors.length === 0) {
		return;
	}

	const deadline = createDeadline(options.timeout, options.signal);
	try {
		for (const inspector of networkInspectors) {
			try {
				const contribution = await inspector.inspect(context, {
					signal: deadline.signal,
					client: options.client,
					timeout: options.timeout,
					logger: options.logger,
				});
				if (contribution) {
					mergeAnalysis(result, contribution);
				}
			} catch (error) {
				recordInspectorFailure(result, inspector, error, traversal);
			}
		}
	} finally {
		deadline.clear();
	}
}

async function visitNode(
	node: DocumentNode,
	spec: NodeSpec | undefined,
	parentSpec: NodeSpec | undefined,
	insideUnknown: boolean,
	traversal: Traversal,
): Promise<NodeResult> {
	traversal.visited++;
	const { version, options } = traversal;
	const result: NodeResult = { node: node.name };
	if (spec) {
		result.versionSupport = [...spec.versions];
	}

	const compliance = ensureAnalysis(result, COMPLIANCE_CATEGORY);
	checkStructure(node, spec, parentSpec, insideUnknown, version, compliance);
	if (!insideUnknown) {
		checkAttributes(node, spec, version, compliance, options.ignoreNamespaceAttributes);
	}

	if (options.runCustom) {
		await runInspectors(node, result, traversal);
	}

	const childrenInsideUnknown = insideUnknown || spec?.allowUnknownChildren === true;
	for (const child of node.children) {
		const childResult = await visitNode(
			child,
			options.catalog.lookup(child.name),
			spec,
			childrenInsideUnknown,
			traversal,
		);
		result.children ??= [];
		result.children.push(childResult);
	}

	return result;
}

function readVersion(root: DocumentNode, catalog: Catalog): Version {
	const version = getAttribute(root, catalog.versionAttribute)?.trim() ?? "";
	if (version === "") {
		throw new MissingVersionError(catalog.rootName, catalog.versionAttribute);
	}
	return version;
}

/**
 * Validate a document.
 *
 * @param raw - Document markup as a string or UTF-8 bytes
 * @param options - Catalog, inspectors and network settings
 * @returns The result tree with per-category summaries
 * @throws EmptyDocumentError when the input is empty or has no element
 * @throws CatalogError when the catalog lacks its root spec
 * @throws MalformedDocumentError when the markup cannot be parsed
 * @throws InvalidRootError when the root is not the catalog root
 * @throws MissingVersionError when the root declares no version
 *
 * @example
 * ```typescript
 * const result = await validate(xml, { disableNetworkValidators: true });
 * if (result.summaries?.compliance?.status === "fail") {
 *   console.log(result.summaries.compliance.reasons);
 * }
 * ```
 */
export async function validate(raw: string | Uint8Array, options: ValidateOptions = {}): Promise<ValidationResult> {
	if (raw.length === 0) {
		throw new EmptyDocumentError();
	}
	return runValidation(raw, resolveValidateOptions(options));
}

async function runValidation(raw: string | Uint8Array, options: ResolvedValidateOptions): Promise<ValidationResult> {
	const { catalog, logger } = options;
	const rootSpec = catalog.rootSpec;
	if (!rootSpec) {
		throw new CatalogError(`Catalog has no spec for root element <${catalog.rootName}>`);
	}

	const root = parseDocument(raw);
	if (root.name !== catalog.rootName) {
		throw new InvalidRootError(catalog.rootName, root.name);
	}
	const version = readVersion(root, catalog);

	const traversal: Traversal = { version, options, visited: 0 };
	const rootResult = await visitNode(root, rootSpec, undefined, false, traversal);

	if (!rootSpec.supportsVersion(version)) {
		logger.warn(`Document declares unsupported ${catalog.rootName} version "${version}"`);
		markFailure(ensureAnalysis(rootResult, COMPLIANCE_CATEGORY), `unsupported ${catalog.rootName} version "${version}"`);
	}

	logger.debug(`Validated ${traversal.visited} nodes against ${catalog.rootName} ${version}`);

	const summaries = summarizeCategories(rootResult);
	return summaries ? { version, root: rootResult, summaries } : { version, root: rootResult };
}

/**
 * Long-lived validator holding a catalog, a hook registry and default options.
 *
 * Each validator owns its registry, so inspectors registered on one
 * instance never reach another.
 *
 * @example
 * ```typescript
 * const validator = new Validator({ http: { timeout: 5000 } });
 * validator.hooks.register("AdTitle", pureInspector(checkTitle));
 * const result = await validator.validate(xml);
 * ```
 */
export class Validator {
	readonly hooks: HookRegistry;
	private readonly options: ValidateOptions;

	constructor(options: ValidateOptions = {}) {
		this.hooks = options.hooks ?? createDefaultHookRegistry();
		this.options = { ...options, hooks: this.hooks };
	}

	/**
	 * Validate a document with this validator's options, optionally overridden per call.
	 */
	async validate(raw: string | Uint8Array, overrides?: ValidateOptions): Promise<ValidationResult> {
		return validate(raw, mergeValidateOptions(this.options, overrides));
	}
}
