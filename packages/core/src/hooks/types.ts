/**
 * @title Node Inspectors
 * @description Extension capability for contributing analysis to nodes.
 *
 * An inspector is either pure (synchronous, no I/O) or network-capable
 * (asynchronous, receives a cancellable signal and an HTTP client).
 *
 * @module hooks
 */

import type { Version } from "@vastlint/schema";
import type { Logger } from "../logging/log.js";
import type { DocumentAttribute } from "../parser/tree.js";
import type { NodeAnalysisResult } from "../validation/results.js";

/**
 * Fetch-compatible HTTP client used by network inspectors.
 */
export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

/**
 * What an inspector sees of the node being visited.
 */
export interface NodeContext {
	/** Local name of the node. */
	name: string;
	/** Trimmed text content. */
	text: string;
	/** Attributes in document order. */
	attributes: readonly DocumentAttribute[];
	/** Version declared by the document. */
	version: Version;
	/** Attribute value by local name (last occurrence wins). */
	attribute(name: string): string | undefined;
}

/**
 * Resources handed to network inspectors.
 */
export interface NetworkContext {
	/** Aborted when the per-node deadline passes or the caller cancels. */
	signal: AbortSignal;
	client: HttpClient;
	/** Per-node deadline in milliseconds. */
	timeout: number;
	logger: Logger;
}

/**
 * Synchronous inspector. Returning undefined contributes nothing.
 */
export interface PureInspector {
	readonly kind: "pure";
	inspect(context: NodeContext): NodeAnalysisResult | undefined;
}

/**
 * Asynchronous inspector that may perform network requests.
 * A rejected promise is recorded as a failure, never propagated.
 */
export interface NetworkInspector {
	readonly kind: "network";
	inspect(context: NodeContext, network: NetworkContext): Promise<NodeAnalysisResult | undefined>;
}

export type NodeInspector = PureInspector | NetworkInspector;

/**
 * Wrap a function as a {@link PureInspector}.
 */
export function pureInspector(inspect: (context: NodeContext) => NodeAnalysisResult | undefined): PureInspector {
	return { kind: "pure", inspect };
}

/**
 * Wrap a function as a {@link NetworkInspector}.
 */
export function networkInspector(
	inspect: (context: NodeContext, network: NetworkContext) => Promise<NodeAnalysisResult | undefined>,
): NetworkInspector {
	return { kind: "network", inspect };
}
