/**
 * @title Hook Registry
 * @description Caller-owned registry of node inspectors keyed by node name.
 *
 * Pure and network inspectors live in separate collections. Lists are
 * replaced rather than mutated on registration, and reads hand out copies,
 * so registering during a validation never changes a list it is already
 * iterating.
 *
 * @module hooks
 */

import type { NetworkInspector, NodeInspector, PureInspector } from "./types.js";

/**
 * Inspectors registered per node name. Names are matched case-insensitively.
 *
 * @example
 * ```typescript
 * const hooks = createDefaultHookRegistry();
 * hooks.register("AdTitle", pureInspector((ctx) =>
 *   ctx.text === "" ? { category: "content", status: "fail", reasons: ["ad title is blank"] } : undefined,
 * ));
 * await validate(xml, { hooks });
 * ```
 */
export class HookRegistry {
	private pure = new Map<string, readonly PureInspector[]>();
	private network = new Map<string, readonly NetworkInspector[]>();

	/**
	 * Register an inspector for a node name. Undefined inspectors are ignored.
	 *
	 * @param nodeName - Local name of the node to inspect
	 * @param inspector - Pure or network inspector
	 */
	register(nodeName: string, inspector: NodeInspector | undefined): void {
		if (!inspector) {
			return;
		}
		const key = nodeName.toLowerCase();
		if (inspector.kind === "pure") {
			this.pure.set(key, [...(this.pure.get(key) ?? []), inspector]);
		} else {
			this.network.set(key, [...(this.network.get(key) ?? []), inspector]);
		}
	}

	/**
	 * Pure inspectors for a node name, in registration order.
	 */
	pureInspectors(nodeName: string): PureInspector[] {
		return [...(this.pure.get(nodeName.toLowerCase()) ?? [])];
	}

	/**
	 * Network inspectors for a node name, in registration order.
	 */
	networkInspectors(nodeName: string): NetworkInspector[] {
		return [...(this.network.get(nodeName.toLowerCase()) ?? [])];
	}

	/**
	 * Remove every inspector registered for a node name.
	 */
	unregisterAll(nodeName: string): void {
		const key = nodeName.toLowerCase();
		this.pure.delete(key);
		this.network.delete(key);
	}

	/**
	 * An independent registry holding the same inspectors.
	 */
	clone(): HookRegistry {
		const copy = new HookRegistry();
		copy.pure = new Map(this.pure);
		copy.network = new Map(this.network);
		return copy;
	}
}
