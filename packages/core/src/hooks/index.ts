/**
 * Node inspectors and the hook registry.
 */

export {
	networkInspector,
	pureInspector,
	type HttpClient,
	type NetworkContext,
	type NetworkInspector,
	type NodeContext,
	type NodeInspector,
	type PureInspector,
} from "./types.js";
export { HookRegistry } from "./registry.js";
export { createDefaultHookRegistry } from "./defaults.js";
